import { describe, expect, it } from "vitest";
import {
	type DetectorInput,
	createSignalState,
	detectSignal,
} from "../../src/services/signalDetector";
import type { SignalState } from "../../src/types";

function input(side: "LONG" | "SHORT" | null, magnitude = 1, threshold = 2): DetectorInput {
	return {
		long: side === "LONG",
		short: side === "SHORT",
		magnitude: { LONG: side === "LONG" ? magnitude : 0, SHORT: side === "SHORT" ? magnitude : 0 },
		threshold,
	};
}

const latch = { policy: "latch", tradeActive: false } as const;
const dedup = { policy: "dedup", tradeActive: false } as const;

describe("detectSignal with the latch policy", () => {
	it("alerts once per breakout episode", () => {
		const state = createSignalState();
		const emitted = [
			input("LONG"),
			input("LONG"),
			input("LONG"),
			input(null),
			input("LONG"),
		].map((step) => detectSignal(state, step, latch));

		expect(emitted.map((events) => events.length)).toEqual([1, 0, 0, 0, 1]);
		expect(emitted[0]).toEqual([{ type: "alert", side: "LONG", magnitude: 1 }]);
	});

	it("alerts again when the side flips without a quiet bar", () => {
		const state = createSignalState();
		detectSignal(state, input("LONG"), latch);
		expect(detectSignal(state, input("SHORT"), latch)).toEqual([
			{ type: "alert", side: "SHORT", magnitude: 1 },
		]);
		expect(state.latchedSide).toBe("SHORT");
	});

	it("emits an entry with the alert when the magnitude clears the threshold", () => {
		const state = createSignalState();
		expect(detectSignal(state, input("LONG", 3), latch)).toEqual([
			{ type: "alert", side: "LONG", magnitude: 3 },
			{ type: "entry", side: "LONG", magnitude: 3 },
		]);
	});

	it("arms an entry later in the episode without a second alert", () => {
		const state = createSignalState();
		detectSignal(state, input("LONG", 1), latch);
		expect(detectSignal(state, input("LONG", 2.5), latch)).toEqual([
			{ type: "entry", side: "LONG", magnitude: 2.5 },
		]);
	});

	it("holds entries back while a trade is active", () => {
		const state = createSignalState();
		expect(
			detectSignal(state, input("LONG", 3), { policy: "latch", tradeActive: true }),
		).toEqual([{ type: "alert", side: "LONG", magnitude: 3 }]);
	});

	it("clears the latch once neither side holds", () => {
		const state = createSignalState();
		detectSignal(state, input("LONG"), latch);
		detectSignal(state, input(null), latch);
		expect(state).toEqual({ latchedSide: null, lastEmittedSide: "LONG" });
	});
});

describe("detectSignal with the dedup policy", () => {
	it("emits only when the side differs from the last one", () => {
		const state = createSignalState();
		const emitted = [
			input("LONG"),
			input(null),
			input("LONG"),
			input("SHORT"),
			input("SHORT"),
			input("LONG"),
		].map((step) => detectSignal(state, step, dedup));

		expect(emitted.map((events) => events.length)).toEqual([1, 0, 0, 1, 0, 1]);
		expect(state.lastEmittedSide).toBe("LONG");
	});

	it("pairs the entry with the alert", () => {
		const state = createSignalState();
		expect(detectSignal(state, input("SHORT", 5), dedup)).toEqual([
			{ type: "alert", side: "SHORT", magnitude: 5 },
			{ type: "entry", side: "SHORT", magnitude: 5 },
		]);
	});
});

describe("detectSignal with both sides holding", () => {
	it("emits nothing and leaves the state unchanged", () => {
		const state: SignalState = { latchedSide: "LONG", lastEmittedSide: "LONG" };
		const both: DetectorInput = {
			long: true,
			short: true,
			magnitude: { LONG: 5, SHORT: 5 },
			threshold: 1,
		};

		expect(detectSignal(state, both, latch)).toEqual([]);
		expect(detectSignal(state, both, dedup)).toEqual([]);
		expect(state).toEqual({ latchedSide: "LONG", lastEmittedSide: "LONG" });
	});
});
