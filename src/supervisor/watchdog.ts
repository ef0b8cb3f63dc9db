import { type Subscription, interval } from "rxjs";

export type WatchdogOptions = {
	stallMs: number;
	checkIntervalMs: number;
	onStall: (elapsedMs: number) => void;
	onRecover?: (stalledForMs: number) => void;
	now?: () => number;
};

export type WatchdogStatus = {
	stalled: boolean;
	elapsedMs: number;
};

/**
 * Tracks when the poll loop last completed a cycle and reports a stall once
 * per episode. It never restarts the loop.
 */
export class Watchdog {
	private lastCompletedAt: number;
	private stalled = false;
	private subscription: Subscription | null = null;
	private readonly now: () => number;

	constructor(private readonly options: WatchdogOptions) {
		this.now = options.now ?? Date.now;
		this.lastCompletedAt = this.now();
	}

	get lastCycleCompletedAt(): number {
		return this.lastCompletedAt;
	}

	markCycleComplete(at: number = this.now()): void {
		const previous = this.lastCompletedAt;
		this.lastCompletedAt = at;
		if (this.stalled) {
			this.stalled = false;
			this.options.onRecover?.(at - previous);
		}
	}

	check(at: number = this.now()): WatchdogStatus {
		const elapsedMs = at - this.lastCompletedAt;
		if (elapsedMs > this.options.stallMs && !this.stalled) {
			this.stalled = true;
			this.options.onStall(elapsedMs);
		}
		return { stalled: this.stalled, elapsedMs };
	}

	start(): void {
		if (this.subscription) return;
		this.subscription = interval(this.options.checkIntervalMs).subscribe(() =>
			this.check(),
		);
	}

	stop(): void {
		this.subscription?.unsubscribe();
		this.subscription = null;
	}
}
