import { describe, expect, it } from "vitest";
import { bollinger } from "../../src/indicators/bollinger";

function populationSigma(values: number[]): number {
	const mean = values.reduce((a, b) => a + b, 0) / values.length;
	return Math.sqrt(values.reduce((a, b) => a + (b - mean) ** 2, 0) / values.length);
}

describe("bollinger", () => {
	it("computes mid, bands and width", () => {
		const result = bollinger([1, 2, 3, 4, 5], 5, 2);
		if (!result.ok) throw new Error("expected bands");

		expect(result.value.mid).toBe(3);
		expect(result.value.sigma).toBeCloseTo(Math.SQRT2, 10);
		expect(result.value.upper).toBeCloseTo(3 + 2 * Math.SQRT2, 10);
		expect(result.value.lower).toBeCloseTo(3 - 2 * Math.SQRT2, 10);
		expect(result.value.width).toBeCloseTo((4 * Math.SQRT2) / 3, 10);
	});

	it("places the bands k sigma either side of the mid", () => {
		const closes = [10, 12, 11, 15, 14, 13, 16, 12];
		const period = 6;
		const k = 2.5;
		const result = bollinger(closes, period, k);
		if (!result.ok) throw new Error("expected bands");

		const sigma = populationSigma(closes.slice(-period));
		const { upper, mid, lower } = result.value;
		expect(upper - mid).toBeCloseTo(k * sigma, 10);
		expect(mid - lower).toBeCloseTo(k * sigma, 10);
	});

	it("only uses the trailing window", () => {
		const result = bollinger([1000, 5, 5, 5], 3, 2);
		expect(result).toEqual({
			ok: true,
			value: { mid: 5, upper: 5, lower: 5, sigma: 0, width: 0 },
		});
	});

	it("leaves the width undefined when the mid band is zero", () => {
		const result = bollinger([-1, 1], 2, 2);
		if (!result.ok) throw new Error("expected bands");
		expect(result.value.mid).toBe(0);
		expect(result.value.width).toBeNull();
	});

	it("requires a full window", () => {
		expect(bollinger([1, 2, 3], 8, 2)).toEqual({
			ok: false,
			reason: "insufficient_data",
			required: 8,
			available: 3,
		});
	});
});
