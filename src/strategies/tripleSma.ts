import { type IndicatorResult, insufficient, sufficient } from "../indicators/result";
import { tripleSma, tripleSmaRequired } from "../indicators/tripleSma";
import type { Candle, TripleSmaStrategyConfig } from "../types";
import type { StrategyEvaluation } from "./types";

function periodsOf(config: TripleSmaStrategyConfig) {
	return {
		fast: config.fastPeriod,
		mid: config.midPeriod,
		slow: config.slowPeriod,
		slopeLookback: config.slopeLookback,
	};
}

export function tripleSmaStrategyRequired(config: TripleSmaStrategyConfig): number {
	return Math.max(tripleSmaRequired(periodsOf(config)), config.breakoutLookback + 1);
}

/**
 * Fast/mid cross on the latest bar, full fast > mid > slow alignment, enough
 * fast slope and fast/slow separation, and a close through the extreme of the
 * prior `breakoutLookback` candles. Every sub-condition must hold.
 */
export function evaluateTripleSma(
	candles: readonly Candle[],
	config: TripleSmaStrategyConfig,
): IndicatorResult<StrategyEvaluation> {
	const required = tripleSmaStrategyRequired(config);
	if (candles.length < required) {
		return insufficient(required, candles.length);
	}

	const closes = candles.map((c) => c.close);
	const smas = tripleSma(closes, periodsOf(config));
	if (!smas.ok) {
		return insufficient(smas.required, smas.available);
	}

	const last = candles[candles.length - 1];
	const prior = candles.slice(-config.breakoutLookback - 1, -1);
	const priorHigh = Math.max(...prior.map((c) => c.high));
	const priorLow = Math.min(...prior.map((c) => c.low));
	const v = smas.value;

	const long =
		v.crossUp &&
		v.alignedUp &&
		v.fastSlopePct >= config.minSlopePct &&
		v.separationPct >= config.minSeparationPct &&
		last.close > priorHigh;
	const short =
		v.crossDown &&
		v.alignedDown &&
		-v.fastSlopePct >= config.minSlopePct &&
		-v.separationPct >= config.minSeparationPct &&
		last.close < priorLow;

	return sufficient({
		snapshot: {
			close: last.close,
			smaFast: v.fast,
			smaMid: v.mid,
			smaSlow: v.slow,
			fastSlopePct: v.fastSlopePct,
			separationPct: v.separationPct,
			priorHigh,
			priorLow,
		},
		long,
		short,
		magnitude: {
			LONG: Math.max(0, v.separationPct),
			SHORT: Math.max(0, -v.separationPct),
		},
		threshold: config.entryThreshold,
	});
}
