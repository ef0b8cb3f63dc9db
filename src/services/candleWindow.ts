import type { Candle } from "../types";
import { EngineError } from "../utils/errors";

function isValidCandle(candle: Candle): boolean {
	return [
		candle.openTime,
		candle.open,
		candle.high,
		candle.low,
		candle.close,
		candle.volume,
	].every((value) => Number.isFinite(value));
}

/**
 * Drops the still-forming last candle and checks the rest is a strictly
 * increasing series of finite values. Anything else is malformed.
 */
export function closedWindow(symbol: string, candles: readonly Candle[]): Candle[] {
	if (candles.length < 2) {
		throw new EngineError(
			"malformed",
			`Received ${candles.length} candles for ${symbol}; need at least one closed candle`,
		);
	}

	const closed = candles.slice(0, -1);
	for (let i = 0; i < closed.length; i++) {
		if (!isValidCandle(closed[i])) {
			throw new EngineError("malformed", `Non-numeric candle at ${i} for ${symbol}`);
		}
		if (i > 0 && closed[i].openTime <= closed[i - 1].openTime) {
			throw new EngineError(
				"malformed",
				`Candles for ${symbol} are not ordered by open time at ${i}`,
			);
		}
	}
	return closed;
}
