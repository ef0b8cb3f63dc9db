import type { Candle } from "../types";
import { atrSeries } from "./atr";
import {
	type IndicatorResult,
	insufficient,
	lastDefined,
	rollingMean,
	sufficient,
} from "./result";

export type AdxValues = {
	adx: number;
	adxPrev: number;
	plusDi: number;
	minusDi: number;
};

type DirectionalMovement = {
	plus: Array<number | null>;
	minus: Array<number | null>;
};

export function directionalMovement(
	candles: readonly Candle[],
): DirectionalMovement {
	const plus: Array<number | null> = [];
	const minus: Array<number | null> = [];

	for (let i = 0; i < candles.length; i++) {
		if (i === 0) {
			plus.push(null);
			minus.push(null);
			continue;
		}
		const upMove = candles[i].high - candles[i - 1].high;
		const downMove = candles[i - 1].low - candles[i].low;
		plus.push(upMove > downMove && upMove > 0 ? upMove : 0);
		minus.push(downMove > upMove && downMove > 0 ? downMove : 0);
	}

	return { plus, minus };
}

/** Directional index over the period using rolling means; the latest value and the one before it. */
export function adx(
	candles: readonly Candle[],
	period: number,
): IndicatorResult<AdxValues> {
	if (period < 1) throw new Error(`Invalid ADX period ${period}`);
	const required = 2 * period + 1;
	if (candles.length < required) {
		return insufficient(required, candles.length);
	}

	const atrs = atrSeries(candles, period);
	const dm = directionalMovement(candles);
	const plusMean = rollingMean(dm.plus, period);
	const minusMean = rollingMean(dm.minus, period);

	const plusDi: Array<number | null> = [];
	const minusDi: Array<number | null> = [];
	const dx: Array<number | null> = [];

	for (let i = 0; i < candles.length; i++) {
		const range = atrs[i];
		const up = plusMean[i];
		const down = minusMean[i];
		if (range === null || up === null || down === null) {
			plusDi.push(null);
			minusDi.push(null);
			dx.push(null);
			continue;
		}
		const pdi = range > 0 ? (100 * up) / range : 0;
		const mdi = range > 0 ? (100 * down) / range : 0;
		const sum = pdi + mdi;
		plusDi.push(pdi);
		minusDi.push(mdi);
		dx.push(sum > 0 ? (100 * Math.abs(pdi - mdi)) / sum : 0);
	}

	const adxSeries = rollingMean(dx, period);
	const current = lastDefined(adxSeries);
	const previous = lastDefined(adxSeries, 1);
	const pdi = lastDefined(plusDi);
	const mdi = lastDefined(minusDi);

	if (current === null || previous === null || pdi === null || mdi === null) {
		return insufficient(required, candles.length);
	}

	return sufficient({ adx: current, adxPrev: previous, plusDi: pdi, minusDi: mdi });
}
