import { type IndicatorResult, insufficient, rollingMean, sufficient } from "./result";

export type SmaOptions = {
	requireFull?: boolean;
};

/**
 * Mean of the trailing `period` values. Below `period` samples the available
 * ones are averaged unless `requireFull` is set.
 */
export function sma(
	values: readonly number[],
	period: number,
	options: SmaOptions = {},
): IndicatorResult<number> {
	if (period < 1) throw new Error(`Invalid SMA period ${period}`);
	const required = options.requireFull ? period : 1;
	if (values.length < required) {
		return insufficient(required, values.length);
	}

	const window = values.slice(-period);
	const sum = window.reduce((acc, val) => acc + val, 0);
	return sufficient(sum / window.length);
}

export function smaSeries(
	values: readonly number[],
	period: number,
): Array<number | null> {
	if (period < 1) throw new Error(`Invalid SMA period ${period}`);
	return rollingMean(values, period);
}
