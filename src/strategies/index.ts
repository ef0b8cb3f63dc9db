import type { IndicatorResult } from "../indicators/result";
import type { Candle, DetectorPolicy, StrategyConfig } from "../types";
import { adxBandsRequired, evaluateAdxBands } from "./adxBands";
import { bollingerRequired, evaluateBollinger } from "./bollingerBreakout";
import { evaluateTripleSma, tripleSmaStrategyRequired } from "./tripleSma";
import type { StrategyEvaluation } from "./types";

export type { StrategyEvaluation } from "./types";

export function evaluateStrategy(
	candles: readonly Candle[],
	config: StrategyConfig,
): IndicatorResult<StrategyEvaluation> {
	switch (config.kind) {
		case "bollinger":
			return evaluateBollinger(candles, config);
		case "adxBands":
			return evaluateAdxBands(candles, config);
		case "tripleSma":
			return evaluateTripleSma(candles, config);
	}
}

export function requiredCandles(config: StrategyConfig): number {
	switch (config.kind) {
		case "bollinger":
			return bollingerRequired(config);
		case "adxBands":
			return adxBandsRequired(config);
		case "tripleSma":
			return tripleSmaStrategyRequired(config);
	}
}

/** Band strategies latch per breakout episode; the SMA cross de-duplicates by last side. */
export function policyFor(config: StrategyConfig): DetectorPolicy {
	if (config.policy) return config.policy;
	return config.kind === "tripleSma" ? "dedup" : "latch";
}
