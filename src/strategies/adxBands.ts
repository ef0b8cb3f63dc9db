import { adx } from "../indicators/adx";
import { atr } from "../indicators/atr";
import { bollinger } from "../indicators/bollinger";
import { type IndicatorResult, insufficient, sufficient } from "../indicators/result";
import type { AdxBandsStrategyConfig, Candle } from "../types";
import type { StrategyEvaluation } from "./types";

export function adxBandsRequired(config: AdxBandsStrategyConfig): number {
	return Math.max(config.period, 2 * config.adxPeriod + 1);
}

export function evaluateAdxBands(
	candles: readonly Candle[],
	config: AdxBandsStrategyConfig,
): IndicatorResult<StrategyEvaluation> {
	const required = adxBandsRequired(config);
	if (candles.length < required) {
		return insufficient(required, candles.length);
	}

	const closes = candles.map((c) => c.close);
	const bands = bollinger(closes, config.period, config.stdDev);
	const trend = adx(candles, config.adxPeriod);
	if (!bands.ok || !trend.ok) {
		return insufficient(required, candles.length);
	}

	const range = atr(candles, config.adxPeriod);
	const close = closes[closes.length - 1];
	const { upper, lower, width } = bands.value;
	const { adx: strength, adxPrev, plusDi, minusDi } = trend.value;

	// width is null when the mid band is zero
	const wideEnough = width !== null && width >= config.minBandWidth;
	const trending = strength >= config.adxMin && strength > adxPrev;

	return sufficient({
		snapshot: {
			close,
			bands: bands.value,
			atr: range.ok ? range.value : undefined,
			adx: strength,
			adxPrev,
			plusDi,
			minusDi,
		},
		long: wideEnough && trending && close > upper && plusDi > minusDi,
		short: wideEnough && trending && close < lower && minusDi > plusDi,
		magnitude: { LONG: strength, SHORT: strength },
		threshold: config.adxEntry,
	});
}
