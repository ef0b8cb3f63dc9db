import { type IndicatorResult, insufficient, sufficient } from "./result";
import { smaSeries } from "./sma";

export type TripleSmaValues = {
	fast: number;
	mid: number;
	slow: number;
	prevFast: number;
	prevMid: number;
	crossUp: boolean;
	crossDown: boolean;
	alignedUp: boolean;
	alignedDown: boolean;
	/** Signed percent change of the fast SMA over the slope lookback. */
	fastSlopePct: number;
	/** Signed percent distance of the fast SMA from the slow SMA. */
	separationPct: number;
};

export type TripleSmaPeriods = {
	fast: number;
	mid: number;
	slow: number;
	slopeLookback: number;
};

export function tripleSmaRequired(periods: TripleSmaPeriods): number {
	return Math.max(
		periods.slow + 1,
		periods.mid + 1,
		periods.fast + periods.slopeLookback,
	);
}

function percentChange(from: number, to: number): number {
	if (from === 0) return 0;
	return ((to - from) / from) * 100;
}

export function tripleSma(
	closes: readonly number[],
	periods: TripleSmaPeriods,
): IndicatorResult<TripleSmaValues> {
	if (!(periods.fast < periods.mid && periods.mid < periods.slow)) {
		throw new Error(
			`Triple SMA periods must be increasing, got ${periods.fast}/${periods.mid}/${periods.slow}`,
		);
	}
	if (periods.slopeLookback < 1) {
		throw new Error(`Invalid slope lookback ${periods.slopeLookback}`);
	}

	const required = tripleSmaRequired(periods);
	if (closes.length < required) {
		return insufficient(required, closes.length);
	}

	const last = closes.length - 1;
	const fastSeries = smaSeries(closes, periods.fast);
	const midSeries = smaSeries(closes, periods.mid);
	const slowSeries = smaSeries(closes, periods.slow);

	const fast = fastSeries[last];
	const prevFast = fastSeries[last - 1];
	const fastAgo = fastSeries[last - periods.slopeLookback];
	const mid = midSeries[last];
	const prevMid = midSeries[last - 1];
	const slow = slowSeries[last];

	if (
		fast === null ||
		prevFast === null ||
		fastAgo === null ||
		mid === null ||
		prevMid === null ||
		slow === null
	) {
		return insufficient(required, closes.length);
	}

	return sufficient({
		fast,
		mid,
		slow,
		prevFast,
		prevMid,
		crossUp: prevFast <= prevMid && fast > mid,
		crossDown: prevFast >= prevMid && fast < mid,
		alignedUp: fast > mid && mid > slow,
		alignedDown: fast < mid && mid < slow,
		fastSlopePct: percentChange(fastAgo, fast),
		separationPct: percentChange(slow, fast),
	});
}
