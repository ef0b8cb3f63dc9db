import { USDMClient } from "binance";
import { z } from "zod";
import { config } from "../config";
import type {
	Candle,
	CandleInterval,
	ConditionalOrderRequest,
	ExchangeGateway,
	MarketDataProvider,
	Side,
} from "../types";
import { EngineError } from "../utils/errors";
import { logger } from "../utils/logger";

const isTestnet = config.binance.baseUrl.includes("testnet");

export const restClient = new USDMClient({
	api_key: config.binance.apiKey,
	api_secret: config.binance.apiSecret,
	baseUrl: config.binance.baseUrl,
	beautifyResponses: true,
	testnet: isTestnet,
});

const NumericString = z.union([z.string(), z.number()]).transform(Number);

const SymbolMetaSchema = z.object({
	symbol: z.string(),
	status: z.string(),
	filters: z.array(
		z
			.object({
				filterType: z.string(),
				tickSize: NumericString.optional(),
				stepSize: NumericString.optional(),
			})
			.passthrough(),
	),
});

type SymbolMeta = z.infer<typeof SymbolMetaSchema>;

const symbolCache = new Map<string, SymbolMeta>();

async function ensureSymbolMeta(symbol: string): Promise<SymbolMeta> {
	const cached = symbolCache.get(symbol);
	if (cached) return cached;

	const info = await restClient.getExchangeInfo();
	const symbols = z.array(SymbolMetaSchema).parse(info.symbols);
	for (const meta of symbols) {
		symbolCache.set(meta.symbol, meta);
	}

	const meta = symbolCache.get(symbol);
	if (!meta) {
		throw new EngineError("rejected", `Symbol metadata not found for ${symbol}`);
	}
	return meta;
}

function decimalsOf(step: number): number {
	return Math.max(0, Math.ceil(-Math.log10(step)));
}

export function applyTickSize(price: number, meta: SymbolMeta): number {
	const tickSize = meta.filters.find((f) => f.filterType === "PRICE_FILTER")?.tickSize;
	if (!tickSize) return Number(price.toFixed(6));

	const adjusted = Math.round(price / tickSize) * tickSize;
	return Number(adjusted.toFixed(decimalsOf(tickSize)));
}

export function applyStepSize(quantity: number, meta: SymbolMeta): number {
	const marketLot = meta.filters.find((f) => f.filterType === "MARKET_LOT_SIZE");
	const lot = meta.filters.find((f) => f.filterType === "LOT_SIZE");
	const step = marketLot?.stepSize || lot?.stepSize;
	if (!step) return quantity;

	const adjusted = Math.floor(quantity / step) * step;
	return Number(adjusted.toFixed(decimalsOf(step)));
}

export async function fetchKlines(
	symbol: string,
	interval: CandleInterval,
	limit: number,
): Promise<Candle[]> {
	const data = await restClient.getKlines({ symbol, interval, limit });
	if (!Array.isArray(data) || data.length === 0) {
		throw new EngineError("malformed", `Empty kline response for ${symbol}`);
	}

	return data.map((kline) => ({
		openTime: Number(kline[0]),
		open: Number(kline[1]),
		high: Number(kline[2]),
		low: Number(kline[3]),
		close: Number(kline[4]),
		volume: Number(kline[5]),
		closeTime: Number(kline[6]),
	}));
}

async function openPositions(symbol: string) {
	const positions = await restClient.getPositionsV3();
	return positions.filter(
		(p) => p.symbol === symbol && Number(p.positionAmt) !== 0,
	);
}

function orderSide(side: Side): "BUY" | "SELL" {
	return side === "LONG" ? "BUY" : "SELL";
}

function closingSide(positionSide: Side): "BUY" | "SELL" {
	return positionSide === "LONG" ? "SELL" : "BUY";
}

/** Position-mode tagging: hedge mode names the leg, one-way mode reduces. */
function legTag(positionSide: Side, closing: boolean) {
	if (config.trading.hedgeMode) return { positionSide };
	return closing ? { reduceOnly: "true" as const } : {};
}

async function positionEntry(symbol: string, side: Side): Promise<number | null> {
	const positions = await openPositions(symbol);
	const leg = positions.find((p) =>
		config.trading.hedgeMode ? p.positionSide === side : true,
	);
	const entry = leg ? Number(leg.entryPrice) : 0;
	return entry > 0 ? entry : null;
}

async function fillPrice(
	symbol: string,
	side: Side,
	reportedAvg: number,
): Promise<number> {
	if (reportedAvg > 0) return reportedAvg;

	// ACK responses carry no average price; read it back from the position
	const entry = await positionEntry(symbol, side);
	if (entry === null) {
		throw new EngineError("malformed", `No fill price reported for ${symbol}`);
	}
	return entry;
}

export const binanceMarketData: MarketDataProvider = {
	fetchCandles: fetchKlines,
};

export const binanceExchange: ExchangeGateway = {
	async hasOpenPosition(symbol: string): Promise<boolean> {
		const positions = await openPositions(symbol);
		return positions.length > 0;
	},

	positionEntryPrice: positionEntry,

	async submitMarketOrder(
		symbol: string,
		side: Side,
		quantity: number,
	): Promise<number> {
		const meta = await ensureSymbolMeta(symbol);
		const qty = applyStepSize(quantity, meta);
		if (qty <= 0) {
			throw new EngineError("rejected", `Calculated quantity is zero for ${symbol}`);
		}

		const order = await restClient.submitNewOrder({
			symbol,
			side: orderSide(side),
			type: "MARKET",
			quantity: qty,
			...legTag(side, false),
		});

		logger.info(
			{ symbol, side, qty, orderId: order.orderId, status: order.status },
			"Market order placed",
		);
		return fillPrice(symbol, side, Number(order.avgPrice));
	},

	async submitConditionalOrder(request: ConditionalOrderRequest): Promise<void> {
		const meta = await ensureSymbolMeta(request.symbol);
		const stopPrice = applyTickSize(request.triggerPrice, meta);

		const order = await restClient.submitNewOrder({
			symbol: request.symbol,
			side: closingSide(request.positionSide),
			type: request.type === "STOP_LOSS" ? "STOP_MARKET" : "TAKE_PROFIT_MARKET",
			quantity: applyStepSize(request.quantity, meta),
			stopPrice,
			workingType: "MARK_PRICE",
			...legTag(request.positionSide, true),
		});

		logger.info(
			{ symbol: request.symbol, type: request.type, stopPrice, orderId: order.orderId },
			"Conditional order placed",
		);
	},

	async ping(): Promise<void> {
		await restClient.testConnectivity();
	},

	async verifyCredentials(): Promise<void> {
		if (!config.binance.apiKey || !config.binance.apiSecret) {
			throw new EngineError("auth", "Binance API key or secret missing");
		}
		await restClient.getBalanceV3();
	},

	async setLeverage(symbol: string, leverage: number): Promise<void> {
		await restClient.setLeverage({ symbol, leverage });
	},
};
