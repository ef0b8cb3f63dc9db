import type { EventEmitter } from "node:events";
import {
	BehaviorSubject,
	type Subscription,
	firstValueFrom,
	fromEvent,
	merge,
	race,
	timer,
} from "rxjs";
import { filter, map } from "rxjs/operators";

/** Cooperative stop flag checked by the poll loop at cycle boundaries. */
export class ShutdownSignal {
	private readonly reason$ = new BehaviorSubject<string | null>(null);

	get requested(): boolean {
		return this.reason$.getValue() !== null;
	}

	get reason(): string | null {
		return this.reason$.getValue();
	}

	request(reason: string): void {
		if (this.requested) return;
		this.reason$.next(reason);
	}

	install(
		target: EventEmitter,
		signals: readonly string[] = ["SIGINT", "SIGTERM"],
	): Subscription {
		return merge(
			...signals.map((signal) =>
				fromEvent(target, signal).pipe(map(() => signal)),
			),
		).subscribe((signal) => this.request(signal));
	}

	/** Resolves after `ms`, or earlier once shutdown is requested. */
	async wait(ms: number): Promise<void> {
		if (this.requested || ms <= 0) return;
		await firstValueFrom(
			race(
				timer(ms).pipe(map(() => undefined)),
				this.reason$.pipe(
					filter((reason) => reason !== null),
					map(() => undefined),
				),
			),
		);
	}
}
