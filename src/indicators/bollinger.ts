import type { BandValues } from "../types";
import { type IndicatorResult, insufficient, sufficient } from "./result";

export function bollinger(
	closes: readonly number[],
	period: number,
	stdDev: number,
): IndicatorResult<BandValues> {
	if (period < 1) throw new Error(`Invalid Bollinger period ${period}`);
	if (closes.length < period) {
		return insufficient(period, closes.length);
	}

	const window = closes.slice(-period);
	const mid = window.reduce((acc, val) => acc + val, 0) / period;
	// population deviation over the window
	const variance =
		window.reduce((acc, val) => acc + (val - mid) ** 2, 0) / period;
	const sigma = Math.sqrt(variance);
	const upper = mid + stdDev * sigma;
	const lower = mid - stdDev * sigma;

	return sufficient({
		mid,
		upper,
		lower,
		sigma,
		width: mid === 0 ? null : (upper - lower) / mid,
	});
}
