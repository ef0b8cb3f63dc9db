import type { StrategyEvaluation } from "../strategies";
import type {
	DetectorPolicy,
	Side,
	SignalEvent,
	SignalState,
} from "../types";

export type DetectorInput = Pick<
	StrategyEvaluation,
	"long" | "short" | "magnitude" | "threshold"
>;

export type DetectorOptions = {
	policy: DetectorPolicy;
	tradeActive: boolean;
};

export function createSignalState(): SignalState {
	return { latchedSide: null, lastEmittedSide: null };
}

export function isAmbiguous(input: DetectorInput): boolean {
	return input.long && input.short;
}

function activeSide(input: DetectorInput): Side | null {
	if (input.long) return "LONG";
	if (input.short) return "SHORT";
	return null;
}

function entryArmed(
	input: DetectorInput,
	side: Side,
	options: DetectorOptions,
): boolean {
	return input.magnitude[side] >= input.threshold && !options.tradeActive;
}

function latchStep(
	state: SignalState,
	input: DetectorInput,
	options: DetectorOptions,
): SignalEvent[] {
	const side = activeSide(input);
	if (!side) {
		state.latchedSide = null;
		return [];
	}

	const events: SignalEvent[] = [];
	const magnitude = input.magnitude[side];

	if (state.latchedSide !== side) {
		events.push({ type: "alert", side, magnitude });
		state.latchedSide = side;
	}
	if (entryArmed(input, side, options)) {
		events.push({ type: "entry", side, magnitude });
	}
	if (events.length) {
		state.lastEmittedSide = side;
	}
	return events;
}

function dedupStep(
	state: SignalState,
	input: DetectorInput,
	options: DetectorOptions,
): SignalEvent[] {
	const side = activeSide(input);
	if (!side || state.lastEmittedSide === side) return [];

	const magnitude = input.magnitude[side];
	const events: SignalEvent[] = [{ type: "alert", side, magnitude }];
	if (entryArmed(input, side, options)) {
		events.push({ type: "entry", side, magnitude });
	}
	state.lastEmittedSide = side;
	return events;
}

/**
 * Advances the per-instrument signal state for one evaluated cycle.
 *
 * Alerts fire once per episode (latch) or once per side change (dedup).
 * Entries are gated separately on magnitude and on no trade being active.
 * When both sides hold at once nothing is emitted and the state is left as is.
 */
export function detectSignal(
	state: SignalState,
	input: DetectorInput,
	options: DetectorOptions,
): SignalEvent[] {
	if (isAmbiguous(input)) return [];

	return options.policy === "latch"
		? latchStep(state, input, options)
		: dedupStep(state, input, options);
}
