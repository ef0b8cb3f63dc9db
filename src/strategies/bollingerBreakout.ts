import { bollinger } from "../indicators/bollinger";
import { type IndicatorResult, insufficient, sufficient } from "../indicators/result";
import type { BollingerStrategyConfig, Candle } from "../types";
import type { StrategyEvaluation } from "./types";

export function bollingerRequired(config: BollingerStrategyConfig): number {
	return config.period;
}

/**
 * Close outside the bands. In `breakout` direction a close above the upper
 * band is LONG; in `reversion` direction it is SHORT. Magnitude is the percent
 * distance beyond the broken band.
 */
export function evaluateBollinger(
	candles: readonly Candle[],
	config: BollingerStrategyConfig,
): IndicatorResult<StrategyEvaluation> {
	const closes = candles.map((c) => c.close);
	const bands = bollinger(closes, config.period, config.stdDev);
	if (!bands.ok) {
		return insufficient(bands.required, bands.available);
	}

	const close = closes[closes.length - 1];
	const { upper, lower } = bands.value;
	const aboveUpper = close > upper;
	const belowLower = close < lower;
	const abovePct = aboveUpper && upper !== 0 ? ((close - upper) / upper) * 100 : 0;
	const belowPct = belowLower && lower !== 0 ? ((lower - close) / lower) * 100 : 0;

	const breakout = config.direction === "breakout";
	return sufficient({
		snapshot: { close, bands: bands.value },
		long: breakout ? aboveUpper : belowLower,
		short: breakout ? belowLower : aboveUpper,
		magnitude: {
			LONG: breakout ? abovePct : belowPct,
			SHORT: breakout ? belowPct : abovePct,
		},
		threshold: config.entryPct,
	});
}
