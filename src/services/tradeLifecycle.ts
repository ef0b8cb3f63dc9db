import { type RetryOptions, withRetry } from "../supervisor/retry";
import type {
	ConditionalOrderType,
	ExchangeGateway,
	Instrument,
	ProtectionConfig,
	ProtectiveOrderPair,
	Side,
	TradeRecord,
} from "../types";
import { type EngineError, classifyError } from "../utils/errors";
import type { Logger } from "../utils/logger";

export type OpenOutcome =
	| { status: "opened"; entryPrice: number; quantity: number; recovered?: boolean }
	| { status: "active" }
	| { status: "already_open" }
	| { status: "rejected"; error: EngineError }
	| { status: "failed"; error: EngineError };

export type ProtectionLeg = "submitted" | "failed";

export type ProtectionOutcome = {
	pair: ProtectiveOrderPair;
	stopLoss: ProtectionLeg;
	takeProfit: ProtectionLeg;
};

export type ReconcileOutcome =
	| { status: "idle" }
	| { status: "held" }
	| { status: "released"; side?: Side; entryPrice?: number }
	| { status: "unknown"; error: EngineError };

export type TradeLifecycleOptions = {
	exchange: ExchangeGateway;
	logger: Logger;
	retry: RetryOptions;
	now?: () => number;
};

export function createTradeRecord(): TradeRecord {
	return { status: "NONE" };
}

function oppositeSide(side: Side): Side {
	return side === "LONG" ? "SHORT" : "LONG";
}

/** Stop and target trigger prices at fixed percent offsets from the entry. */
export function protectiveOrders(
	entryPrice: number,
	side: Side,
	protection: ProtectionConfig,
): ProtectiveOrderPair {
	const stop = protection.stopLossPct / 100;
	const target = protection.takeProfitPct / 100;

	return side === "LONG"
		? {
				stopLoss: entryPrice * (1 - stop),
				takeProfit: entryPrice * (1 + target),
				closeSide: oppositeSide(side),
			}
		: {
				stopLoss: entryPrice * (1 + stop),
				takeProfit: entryPrice * (1 - target),
				closeSide: oppositeSide(side),
			};
}

function resetTrade(trade: TradeRecord): void {
	trade.status = "NONE";
	trade.side = undefined;
	trade.entryPrice = undefined;
	trade.quantity = undefined;
	trade.openedAt = undefined;
}

/**
 * Opens at most one position per instrument. Local state is only a cache:
 * the exchange position query is consulted before every open and on every
 * reconcile. Market orders are never retried; position reads are.
 */
export class TradeLifecycle {
	private readonly exchange: ExchangeGateway;
	private readonly logger: Logger;
	private readonly retry: RetryOptions;
	private readonly now: () => number;

	constructor(options: TradeLifecycleOptions) {
		this.exchange = options.exchange;
		this.logger = options.logger;
		this.retry = options.retry;
		this.now = options.now ?? Date.now;
	}

	private positionOpen(symbol: string) {
		return withRetry(() => this.exchange.hasOpenPosition(symbol), {
			...this.retry,
			logger: this.logger,
			label: "Position query",
			context: { symbol },
		});
	}

	/**
	 * After an order failure that is not a rejection the order may still have
	 * filled. Returns the entry price of the position it left, or `null`.
	 */
	private async filledDespiteError(symbol: string, side: Side): Promise<number | null> {
		const read = await withRetry(
			() => this.exchange.positionEntryPrice(symbol, side),
			{
				...this.retry,
				logger: this.logger,
				label: "Position read-back",
				context: { symbol },
			},
		);
		if (read.ok) return read.value;

		this.logger.error(
			{ symbol, side, kind: read.error.kind, err: read.error.message },
			"Position read-back failed; order outcome unknown",
		);
		return null;
	}

	async open(
		instrument: Instrument,
		trade: TradeRecord,
		side: Side,
	): Promise<OpenOutcome> {
		const { symbol, quantity } = instrument;

		if (trade.status !== "NONE") {
			this.logger.info(
				{ symbol, status: trade.status },
				"Trade already tracked; skipping entry",
			);
			return { status: "active" };
		}

		const existing = await this.positionOpen(symbol);
		if (!existing.ok) {
			this.logger.error(
				{ symbol, kind: existing.error.kind, err: existing.error.message },
				"Could not confirm position state; entry skipped",
			);
			return { status: "failed", error: existing.error };
		}
		if (existing.value) {
			this.logger.warn(
				{ symbol, side },
				"Exchange reports an open position; entry skipped",
			);
			return { status: "already_open" };
		}

		trade.status = "OPENING";
		trade.side = side;

		try {
			const entryPrice = await this.exchange.submitMarketOrder(
				symbol,
				side,
				quantity,
			);
			trade.status = "ACTIVE";
			trade.entryPrice = entryPrice;
			trade.quantity = quantity;
			trade.openedAt = this.now();

			this.logger.info({ symbol, side, entryPrice, quantity }, "Position opened");
			return { status: "opened", entryPrice, quantity };
		} catch (err) {
			const error = classifyError(err);
			const adoptedPrice =
				error.kind === "rejected" ? null : await this.filledDespiteError(symbol, side);
			if (adoptedPrice !== null) {
				trade.status = "ACTIVE";
				trade.entryPrice = adoptedPrice;
				trade.quantity = quantity;
				trade.openedAt = this.now();

				this.logger.warn(
					{ symbol, side, entryPrice: adoptedPrice, kind: error.kind, err: error.message },
					"Market order reported an error but the position is open; adopting it",
				);
				return { status: "opened", entryPrice: adoptedPrice, quantity, recovered: true };
			}

			resetTrade(trade);
			this.logger.error(
				{ symbol, side, kind: error.kind, code: error.code, err: error.message },
				"Market order failed",
			);
			return error.kind === "rejected"
				? { status: "rejected", error }
				: { status: "failed", error };
		}
	}

	private async submitLeg(
		instrument: Instrument,
		positionSide: Side,
		type: ConditionalOrderType,
		triggerPrice: number,
		quantity: number,
	): Promise<ProtectionLeg> {
		try {
			await this.exchange.submitConditionalOrder({
				symbol: instrument.symbol,
				positionSide,
				triggerPrice,
				type,
				quantity,
			});
			return "submitted";
		} catch (err) {
			const error = classifyError(err);
			this.logger.error(
				{
					symbol: instrument.symbol,
					type,
					triggerPrice,
					kind: error.kind,
					err: error.message,
				},
				"Protective order failed; position left with partial protection",
			);
			return "failed";
		}
	}

	/** Places stop-loss and take-profit for an ACTIVE trade. A failed leg never closes the entry. */
	async attachProtection(
		instrument: Instrument,
		trade: TradeRecord,
	): Promise<ProtectionOutcome> {
		const { side, entryPrice, quantity } = trade;
		if (
			trade.status !== "ACTIVE" ||
			side === undefined ||
			entryPrice === undefined ||
			quantity === undefined
		) {
			throw new Error(`No active trade to protect for ${instrument.symbol}`);
		}

		const pair = protectiveOrders(entryPrice, side, instrument.protection);
		const stopLoss = await this.submitLeg(
			instrument,
			side,
			"STOP_LOSS",
			pair.stopLoss,
			quantity,
		);
		const takeProfit = await this.submitLeg(
			instrument,
			side,
			"TAKE_PROFIT",
			pair.takeProfit,
			quantity,
		);

		this.logger.info(
			{ symbol: instrument.symbol, side, ...pair, stopLoss, takeProfit },
			"Protective orders processed",
		);
		return { pair, stopLoss, takeProfit };
	}

	/** Frees the slot once the exchange no longer reports the position. */
	async reconcile(
		instrument: Instrument,
		trade: TradeRecord,
	): Promise<ReconcileOutcome> {
		if (trade.status !== "ACTIVE") return { status: "idle" };

		const open = await this.positionOpen(instrument.symbol);
		if (!open.ok) {
			this.logger.warn(
				{ symbol: instrument.symbol, kind: open.error.kind, err: open.error.message },
				"Position reconcile failed; keeping trade active",
			);
			return { status: "unknown", error: open.error };
		}
		if (open.value) return { status: "held" };

		const { side, entryPrice } = trade;
		resetTrade(trade);
		this.logger.info(
			{ symbol: instrument.symbol, side, entryPrice },
			"Position closed on exchange; instrument released",
		);
		return { status: "released", side, entryPrice };
	}
}
