import { evaluateStrategy, policyFor } from "../strategies";
import type { StrategyEvaluation } from "../strategies";
import { checkConnectivity } from "../supervisor/connectivity";
import { type RetryOptions, withRetry } from "../supervisor/retry";
import type { ShutdownSignal } from "../supervisor/shutdown";
import type { Watchdog } from "../supervisor/watchdog";
import type {
	Instrument,
	InstrumentState,
	MarketDataProvider,
	Notifier,
	SignalEvent,
} from "../types";
import { type EngineError, classifyError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { closedWindow } from "./candleWindow";
import {
	formatAlert,
	formatEntry,
	formatOffline,
	formatOnline,
	formatRelease,
	formatShutdown,
	formatTimestamp,
} from "./messages";
import { createSignalState, detectSignal, isAmbiguous } from "./signalDetector";
import type { SignalLog } from "./signalLog";
import {
	type OpenOutcome,
	type TradeLifecycle,
	createTradeRecord,
} from "./tradeLifecycle";

export type InstrumentOutcome =
	| { symbol: string; status: "signal"; events: SignalEvent[]; entry?: OpenOutcome }
	| { symbol: string; status: "quiet" }
	| { symbol: string; status: "ambiguous" }
	| { symbol: string; status: "warming"; required: number; available: number }
	| { symbol: string; status: "skipped"; error: EngineError }
	| { symbol: string; status: "error"; error: EngineError };

export type ConnectivityCheck = {
	ping: () => Promise<unknown>;
	timeoutMs: number;
	cooldownMs: number;
};

export type PollLoopOptions = {
	instruments: readonly Instrument[];
	marketData: MarketDataProvider;
	notifier: Notifier;
	shutdown: ShutdownSignal;
	logger: Logger;
	retry: RetryOptions;
	intervalMs: number;
	trades?: TradeLifecycle;
	signalLog?: SignalLog;
	watchdog?: Watchdog;
	connectivity?: ConnectivityCheck;
	/** IANA zone for message timestamps; UTC when omitted. */
	timezone?: string;
	now?: () => number;
};

/**
 * Fixed-interval cycle over every instrument, one at a time. A failure in one
 * instrument is logged and the cycle moves on to the next one.
 */
export class PollLoop {
	private readonly states = new Map<string, InstrumentState>();
	private readonly now: () => number;
	private readonly logger: Logger;
	private readonly timezone: string;
	private offline = false;

	constructor(private readonly options: PollLoopOptions) {
		this.now = options.now ?? Date.now;
		this.logger = options.logger;
		this.timezone = options.timezone ?? "UTC";
	}

	private stamp(): string {
		return formatTimestamp(this.now(), this.timezone);
	}

	stateFor(symbol: string): InstrumentState {
		let state = this.states.get(symbol);
		if (!state) {
			state = { signal: createSignalState(), trade: createTradeRecord() };
			this.states.set(symbol, state);
		}
		return state;
	}

	async run(): Promise<void> {
		const { shutdown, intervalMs } = this.options;
		this.logger.info(
			{
				symbols: this.options.instruments.map((i) => i.symbol),
				intervalMs,
				trading: Boolean(this.options.trades),
			},
			"Poll loop started",
		);

		while (!shutdown.requested) {
			const startedAt = this.now();
			try {
				if (await this.reachable()) {
					await this.runCycle();
					this.options.watchdog?.markCycleComplete(this.now());
				}
			} catch (err) {
				const error = classifyError(err);
				this.logger.error(
					{ kind: error.kind, err: error.message },
					"Poll cycle failed",
				);
			}

			const elapsed = this.now() - startedAt;
			await shutdown.wait(Math.max(0, intervalMs - elapsed));
		}

		this.logger.info({ reason: shutdown.reason }, "Poll loop stopped");
		await this.options.notifier.sendMessage(formatShutdown(shutdown.reason));
	}

	/** Pings the exchange when configured; pauses the whole cycle while it is unreachable. */
	private async reachable(): Promise<boolean> {
		const check = this.options.connectivity;
		if (!check) return true;

		const status = await checkConnectivity(check.ping, check.timeoutMs, this.now);
		if (status.reachable) {
			this.logger.debug({ latencyMs: status.latencyMs }, "Connectivity check ok");
			if (this.offline) {
				this.offline = false;
				await this.options.notifier.sendMessage(formatOnline(status.latencyMs));
			}
			return true;
		}

		this.logger.warn(
			{
				latencyMs: status.latencyMs,
				kind: status.error.kind,
				err: status.error.message,
				cooldownMs: check.cooldownMs,
			},
			"Exchange unreachable; pausing cycle",
		);
		if (!this.offline) {
			this.offline = true;
			await this.options.notifier.sendMessage(
				formatOffline(status, Math.round(check.cooldownMs / 1000)),
			);
		}
		await this.options.shutdown.wait(check.cooldownMs);
		return false;
	}

	async runCycle(): Promise<InstrumentOutcome[]> {
		const outcomes: InstrumentOutcome[] = [];

		for (const instrument of this.options.instruments) {
			if (this.options.shutdown.requested) break;
			try {
				outcomes.push(await this.processInstrument(instrument));
			} catch (err) {
				const error = classifyError(err);
				this.logger.error(
					{ symbol: instrument.symbol, kind: error.kind, err: error.message },
					"Instrument processing failed",
				);
				outcomes.push({ symbol: instrument.symbol, status: "error", error });
			}
		}

		return outcomes;
	}

	private async processInstrument(instrument: Instrument): Promise<InstrumentOutcome> {
		const { symbol } = instrument;
		const state = this.stateFor(symbol);
		const { trades } = this.options;

		if (trades) {
			const reconciled = await trades.reconcile(instrument, state.trade);
			if (reconciled.status === "released") {
				await this.options.notifier.sendMessage(formatRelease(this.stamp(), symbol, reconciled.side));
			}
		}

		const fetched = await withRetry(
			async () =>
				closedWindow(
					symbol,
					await this.options.marketData.fetchCandles(
						symbol,
						instrument.interval,
						instrument.candleLimit,
					),
				),
			{
				...this.options.retry,
				logger: this.logger,
				label: "Candle fetch",
				context: { symbol },
			},
		);
		if (!fetched.ok) {
			this.logger.error(
				{ symbol, kind: fetched.error.kind, err: fetched.error.message },
				"Skipping instrument after fetch failure",
			);
			return { symbol, status: "skipped", error: fetched.error };
		}

		const evaluated = evaluateStrategy(fetched.value, instrument.strategy);
		if (!evaluated.ok) {
			this.logger.debug(
				{ symbol, required: evaluated.required, available: evaluated.available },
				"Not enough closed candles yet",
			);
			return {
				symbol,
				status: "warming",
				required: evaluated.required,
				available: evaluated.available,
			};
		}

		const evaluation = evaluated.value;
		if (isAmbiguous(evaluation)) {
			this.logger.warn(
				{ symbol, snapshot: evaluation.snapshot },
				"Long and short conditions both hold; no signal",
			);
			return { symbol, status: "ambiguous" };
		}

		const events = detectSignal(state.signal, evaluation, {
			policy: policyFor(instrument.strategy),
			tradeActive: state.trade.status !== "NONE",
		});
		if (!events.length) return { symbol, status: "quiet" };

		let entry: OpenOutcome | undefined;
		for (const event of events) {
			if (event.type === "alert") {
				await this.handleAlert(instrument, event, evaluation);
			} else {
				entry = await this.handleEntry(instrument, event, evaluation);
			}
		}

		return { symbol, status: "signal", events, entry };
	}

	private async handleAlert(
		instrument: Instrument,
		event: SignalEvent,
		evaluation: StrategyEvaluation,
	): Promise<void> {
		const { symbol } = instrument;
		this.logger.info(
			{ symbol, side: event.side, magnitude: event.magnitude, close: evaluation.snapshot.close },
			"Alert",
		);
		await this.options.notifier.sendMessage(
			formatAlert(this.stamp(), symbol, event.side, event.magnitude, evaluation.snapshot),
		);
		await this.options.signalLog?.record({
			at: this.now(),
			symbol,
			type: "alert",
			side: event.side,
			price: evaluation.snapshot.close,
			magnitude: event.magnitude,
			indicators: evaluation.snapshot,
		});
	}

	private async handleEntry(
		instrument: Instrument,
		event: SignalEvent,
		evaluation: StrategyEvaluation,
	): Promise<OpenOutcome | undefined> {
		const { symbol } = instrument;
		const { trades } = this.options;
		if (!trades) {
			this.logger.info(
				{ symbol, side: event.side, magnitude: event.magnitude },
				"Entry condition met; trading disabled",
			);
			return undefined;
		}

		const state = this.stateFor(symbol);
		const outcome = await trades.open(instrument, state.trade, event.side);
		if (outcome.status !== "opened") return outcome;

		const protection = await trades.attachProtection(instrument, state.trade);
		await this.options.notifier.sendMessage(
			formatEntry(
				this.stamp(),
				symbol,
				event.side,
				outcome.entryPrice,
				outcome.quantity,
				protection,
			),
		);
		await this.options.signalLog?.record({
			at: this.now(),
			symbol,
			type: "entry",
			side: event.side,
			price: outcome.entryPrice,
			magnitude: event.magnitude,
			indicators: evaluation.snapshot,
			targets: {
				stopLoss: protection.pair.stopLoss,
				takeProfit: protection.pair.takeProfit,
			},
		});
		return outcome;
	}
}
