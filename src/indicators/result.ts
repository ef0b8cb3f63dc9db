export type IndicatorResult<T> =
	| { ok: true; value: T }
	| {
			ok: false;
			reason: "insufficient_data";
			required: number;
			available: number;
	  };

export function sufficient<T>(value: T): IndicatorResult<T> {
	return { ok: true, value };
}

export function insufficient<T>(
	required: number,
	available: number,
): IndicatorResult<T> {
	return { ok: false, reason: "insufficient_data", required, available };
}

/** Rolling mean over `period`, `null` until the window is full or while an input is missing. */
export function rollingMean(
	values: ReadonlyArray<number | null>,
	period: number,
): Array<number | null> {
	const out: Array<number | null> = [];
	for (let i = 0; i < values.length; i++) {
		if (i + 1 < period) {
			out.push(null);
			continue;
		}
		let sum = 0;
		let complete = true;
		for (let j = i - period + 1; j <= i; j++) {
			const v = values[j];
			if (v === null) {
				complete = false;
				break;
			}
			sum += v;
		}
		out.push(complete ? sum / period : null);
	}
	return out;
}

export function lastDefined(
	values: ReadonlyArray<number | null>,
	offset = 0,
): number | null {
	const idx = values.length - 1 - offset;
	if (idx < 0) return null;
	return values[idx] ?? null;
}
