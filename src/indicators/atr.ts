import type { Candle } from "../types";
import { type IndicatorResult, insufficient, rollingMean, sufficient } from "./result";

/** True range per candle; the first candle has no previous close and maps to `null`. */
export function trueRanges(candles: readonly Candle[]): Array<number | null> {
	return candles.map((curr, i) => {
		if (i === 0) return null;
		const prev = candles[i - 1];
		return Math.max(
			curr.high - curr.low,
			Math.abs(curr.high - prev.close),
			Math.abs(curr.low - prev.close),
		);
	});
}

export function atrSeries(
	candles: readonly Candle[],
	period: number,
): Array<number | null> {
	if (period < 1) throw new Error(`Invalid ATR period ${period}`);
	return rollingMean(trueRanges(candles), period);
}

export function atr(
	candles: readonly Candle[],
	period: number,
): IndicatorResult<number> {
	if (candles.length < period + 1) {
		return insufficient(period + 1, candles.length);
	}
	const series = atrSeries(candles, period);
	const value = series[series.length - 1];
	if (value === null || value === undefined) {
		return insufficient(period + 1, candles.length);
	}
	return sufficient(value);
}
