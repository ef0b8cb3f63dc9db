import type { IndicatorSnapshot, Side } from "../types";

export type StrategyEvaluation = {
	snapshot: IndicatorSnapshot;
	long: boolean;
	short: boolean;
	/** Strength per side, compared against `threshold` to gate entries. */
	magnitude: Record<Side, number>;
	threshold: number;
};
