export type Candle = {
	openTime: number;
	closeTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
};

export type Side = "LONG" | "SHORT";

export type CandleInterval =
	| "1m"
	| "3m"
	| "5m"
	| "15m"
	| "30m"
	| "1h"
	| "2h"
	| "4h"
	| "6h"
	| "8h"
	| "12h"
	| "1d"
	| "3d"
	| "1w"
	| "1M";

export type DetectorPolicy = "latch" | "dedup";

export type BollingerStrategyConfig = {
	kind: "bollinger";
	period: number;
	stdDev: number;
	entryPct: number;
	direction: "breakout" | "reversion";
	policy?: DetectorPolicy;
};

export type AdxBandsStrategyConfig = {
	kind: "adxBands";
	period: number;
	stdDev: number;
	adxPeriod: number;
	adxMin: number;
	adxEntry: number;
	minBandWidth: number;
	policy?: DetectorPolicy;
};

export type TripleSmaStrategyConfig = {
	kind: "tripleSma";
	fastPeriod: number;
	midPeriod: number;
	slowPeriod: number;
	slopeLookback: number;
	minSlopePct: number;
	minSeparationPct: number;
	breakoutLookback: number;
	entryThreshold: number;
	policy?: DetectorPolicy;
};

export type StrategyConfig =
	| BollingerStrategyConfig
	| AdxBandsStrategyConfig
	| TripleSmaStrategyConfig;

export type ProtectionConfig = {
	stopLossPct: number;
	takeProfitPct: number;
};

export type Instrument = {
	symbol: string;
	interval: CandleInterval;
	candleLimit: number;
	quantity: number;
	leverage?: number;
	strategy: StrategyConfig;
	protection: ProtectionConfig;
};

export type BandValues = {
	mid: number;
	upper: number;
	lower: number;
	sigma: number;
	width: number | null;
};

export type IndicatorSnapshot = {
	close: number;
	bands?: BandValues;
	atr?: number;
	adx?: number;
	adxPrev?: number;
	plusDi?: number;
	minusDi?: number;
	smaFast?: number;
	smaMid?: number;
	smaSlow?: number;
	fastSlopePct?: number;
	separationPct?: number;
	priorHigh?: number;
	priorLow?: number;
};

export type SignalState = {
	latchedSide: Side | null;
	lastEmittedSide: Side | null;
};

export type TradeStatus = "NONE" | "OPENING" | "ACTIVE";

export type TradeRecord = {
	status: TradeStatus;
	side?: Side;
	entryPrice?: number;
	quantity?: number;
	openedAt?: number;
};

export type InstrumentState = {
	signal: SignalState;
	trade: TradeRecord;
};

export type ProtectiveOrderPair = {
	stopLoss: number;
	takeProfit: number;
	closeSide: Side;
};

export type SignalEventType = "alert" | "entry";

export type SignalEvent = {
	type: SignalEventType;
	side: Side;
	magnitude: number;
};

export type ConditionalOrderType = "STOP_LOSS" | "TAKE_PROFIT";

export type ConditionalOrderRequest = {
	symbol: string;
	positionSide: Side;
	triggerPrice: number;
	type: ConditionalOrderType;
	quantity: number;
};

export interface MarketDataProvider {
	fetchCandles(
		symbol: string,
		interval: CandleInterval,
		limit: number,
	): Promise<Candle[]>;
}

export interface ExchangeGateway {
	hasOpenPosition(symbol: string): Promise<boolean>;
	/** Entry price of the open position on `side`, or `null` when there is none. */
	positionEntryPrice(symbol: string, side: Side): Promise<number | null>;
	submitMarketOrder(symbol: string, side: Side, quantity: number): Promise<number>;
	submitConditionalOrder(request: ConditionalOrderRequest): Promise<void>;
	ping(): Promise<void>;
	verifyCredentials(): Promise<void>;
	setLeverage(symbol: string, leverage: number): Promise<void>;
}

export interface Notifier {
	sendMessage(text: string): Promise<void>;
	sendDocument(filePath: string, caption: string): Promise<void>;
}
