import { describe, expect, it } from "vitest";
import {
	TradeLifecycle,
	createTradeRecord,
	protectiveOrders,
} from "../../src/services/tradeLifecycle";
import { EngineError } from "../../src/utils/errors";
import {
	FakeExchange,
	LEVEL,
	bollingerInstrument,
	captureLogger,
	fastRetry,
	networkError,
} from "../helpers/fakes";

const instrument = bollingerInstrument("ARPAUSDT");

function setup() {
	const exchange = new FakeExchange();
	const { logger, lines } = captureLogger();
	const trades = new TradeLifecycle({
		exchange,
		logger,
		retry: fastRetry,
		now: () => 1_700_000_000_000,
	});
	return { exchange, lines, trades };
}

describe("protectiveOrders", () => {
	it("places the stop below and the target above a long entry", () => {
		const pair = protectiveOrders(200, "LONG", { stopLossPct: 1, takeProfitPct: 2 });
		expect(pair.stopLoss).toBeCloseTo(198, 10);
		expect(pair.takeProfit).toBeCloseTo(204, 10);
		expect(pair.closeSide).toBe("SHORT");
	});

	it("mirrors the offsets for a short entry", () => {
		const pair = protectiveOrders(200, "SHORT", { stopLossPct: 1, takeProfitPct: 2 });
		expect(pair.stopLoss).toBeCloseTo(202, 10);
		expect(pair.takeProfit).toBeCloseTo(196, 10);
		expect(pair.closeSide).toBe("LONG");
	});
});

describe("TradeLifecycle.open", () => {
	it("opens a position and records it as active", async () => {
		const { exchange, trades } = setup();
		const trade = createTradeRecord();

		const outcome = await trades.open(instrument, trade, "LONG");

		expect(outcome).toEqual({ status: "opened", entryPrice: 101.5, quantity: 10 });
		expect(trade).toEqual({
			status: "ACTIVE",
			side: "LONG",
			entryPrice: 101.5,
			quantity: 10,
			openedAt: 1_700_000_000_000,
		});
		expect(exchange.marketOrders).toEqual([
			{ symbol: "ARPAUSDT", side: "LONG", quantity: 10 },
		]);
	});

	it("refuses a second entry while the local trade is tracked", async () => {
		const { exchange, trades } = setup();
		const trade = createTradeRecord();
		await trades.open(instrument, trade, "LONG");

		expect(await trades.open(instrument, trade, "SHORT")).toEqual({ status: "active" });
		expect(exchange.marketOrders).toHaveLength(1);
	});

	it("defers to a position the exchange already holds", async () => {
		const { exchange, trades } = setup();
		exchange.openPositions.add("ARPAUSDT");
		const trade = createTradeRecord();

		expect(await trades.open(instrument, trade, "LONG")).toEqual({
			status: "already_open",
		});
		expect(trade.status).toBe("NONE");
		expect(exchange.marketOrders).toEqual([]);
	});

	it("retries the position query through network errors", async () => {
		const { exchange, trades } = setup();
		exchange.positionErrors = [networkError(), networkError()];

		const outcome = await trades.open(instrument, createTradeRecord(), "LONG");

		expect(outcome.status).toBe("opened");
		expect(exchange.positionQueries).toBe(3);
	});

	it("skips the entry when the position state cannot be confirmed", async () => {
		const { exchange, lines, trades } = setup();
		exchange.positionErrors = [networkError(), networkError(), networkError()];

		const outcome = await trades.open(instrument, createTradeRecord(), "LONG");

		expect(outcome.status).toBe("failed");
		expect(exchange.marketOrders).toEqual([]);
		expect(lines.filter((l) => l.level === LEVEL.error).map((l) => l.msg)).toEqual([
			"Could not confirm position state; entry skipped",
		]);
	});

	it("resets the trade when the exchange rejects the order", async () => {
		const { exchange, trades } = setup();
		exchange.marketOrderError = Object.assign(new Error("Margin is insufficient."), {
			code: -2019,
		});
		const trade = createTradeRecord();

		const outcome = await trades.open(instrument, trade, "LONG");

		expect(outcome.status).toBe("rejected");
		expect(outcome.status === "rejected" && outcome.error.code).toBe(-2019);
		expect(exchange.entryReads).toBe(0);
		expect(trade).toEqual({
			status: "NONE",
			side: undefined,
			entryPrice: undefined,
			quantity: undefined,
			openedAt: undefined,
		});
	});

	it("does not retry a market order that failed in transit", async () => {
		const { exchange, trades } = setup();
		exchange.marketOrderError = networkError();
		const trade = createTradeRecord();

		const outcome = await trades.open(instrument, trade, "SHORT");

		expect(outcome.status).toBe("failed");
		expect(exchange.positionQueries).toBe(1);
		expect(exchange.entryReads).toBe(1);
		expect(trade.status).toBe("NONE");
	});

	it("adopts the position when the order filled but its response was lost", async () => {
		const { exchange, lines, trades } = setup();
		exchange.errorAfterFill = networkError();
		const trade = createTradeRecord();

		const outcome = await trades.open(instrument, trade, "LONG");

		expect(outcome).toEqual({
			status: "opened",
			entryPrice: 101.5,
			quantity: 10,
			recovered: true,
		});
		expect(trade).toEqual({
			status: "ACTIVE",
			side: "LONG",
			entryPrice: 101.5,
			quantity: 10,
			openedAt: 1_700_000_000_000,
		});
		expect(lines.find((l) => l.level === LEVEL.warn)?.msg).toBe(
			"Market order reported an error but the position is open; adopting it",
		);

		const protection = await trades.attachProtection(instrument, trade);
		expect([protection.stopLoss, protection.takeProfit]).toEqual(["submitted", "submitted"]);
		expect(exchange.conditionalOrders).toHaveLength(2);
		expect(await trades.reconcile(instrument, trade)).toEqual({ status: "held" });
	});

	it("adopts a filled position when the fill price could not be read", async () => {
		const { exchange, trades } = setup();
		exchange.errorAfterFill = new EngineError("malformed", "No fill price reported for ARPAUSDT");
		const trade = createTradeRecord();

		expect((await trades.open(instrument, trade, "SHORT")).status).toBe("opened");
		expect(trade.status).toBe("ACTIVE");
		expect(trade.side).toBe("SHORT");
	});
});

describe("TradeLifecycle.attachProtection", () => {
	it("submits both legs at the computed triggers", async () => {
		const { exchange, trades } = setup();
		const trade = createTradeRecord();
		exchange.fillPrice = 200;
		await trades.open(instrument, trade, "LONG");

		const outcome = await trades.attachProtection(instrument, trade);

		expect(outcome.stopLoss).toBe("submitted");
		expect(outcome.takeProfit).toBe("submitted");
		expect(exchange.conditionalOrders.map((o) => o.type)).toEqual([
			"STOP_LOSS",
			"TAKE_PROFIT",
		]);
		expect(exchange.conditionalOrders[0]).toMatchObject({
			symbol: "ARPAUSDT",
			positionSide: "LONG",
			quantity: 10,
		});
		expect(exchange.conditionalOrders[0].triggerPrice).toBeCloseTo(198, 10);
		expect(exchange.conditionalOrders[1].triggerPrice).toBeCloseTo(204, 10);
	});

	it("keeps the entry when one leg fails", async () => {
		const { exchange, lines, trades } = setup();
		const trade = createTradeRecord();
		await trades.open(instrument, trade, "SHORT");
		exchange.conditionalErrors.STOP_LOSS = new EngineError("rejected", "Order would immediately trigger");

		const outcome = await trades.attachProtection(instrument, trade);

		expect(outcome.stopLoss).toBe("failed");
		expect(outcome.takeProfit).toBe("submitted");
		expect(trade.status).toBe("ACTIVE");
		expect(exchange.openPositions.has("ARPAUSDT")).toBe(true);
		expect(
			lines.some(
				(l) =>
					l.level === LEVEL.error &&
					l.msg === "Protective order failed; position left with partial protection",
			),
		).toBe(true);
	});

	it("refuses to protect a trade that is not active", async () => {
		const { trades } = setup();
		await expect(
			trades.attachProtection(instrument, createTradeRecord()),
		).rejects.toThrow("No active trade to protect for ARPAUSDT");
	});
});

describe("TradeLifecycle.reconcile", () => {
	it("has nothing to do without an active trade", async () => {
		const { exchange, trades } = setup();
		expect(await trades.reconcile(instrument, createTradeRecord())).toEqual({
			status: "idle",
		});
		expect(exchange.positionQueries).toBe(0);
	});

	it("keeps the trade while the exchange holds the position", async () => {
		const { trades } = setup();
		const trade = createTradeRecord();
		await trades.open(instrument, trade, "LONG");

		expect(await trades.reconcile(instrument, trade)).toEqual({ status: "held" });
		expect(trade.status).toBe("ACTIVE");
	});

	it("releases the instrument once the position is gone", async () => {
		const { exchange, trades } = setup();
		const trade = createTradeRecord();
		await trades.open(instrument, trade, "LONG");
		exchange.openPositions.delete("ARPAUSDT");

		expect(await trades.reconcile(instrument, trade)).toEqual({
			status: "released",
			side: "LONG",
			entryPrice: 101.5,
		});
		expect(trade.status).toBe("NONE");
		expect((await trades.open(instrument, trade, "SHORT")).status).toBe("opened");
	});

	it("stays active when the position cannot be read", async () => {
		const { exchange, trades } = setup();
		const trade = createTradeRecord();
		await trades.open(instrument, trade, "LONG");
		exchange.positionErrors = [
			Object.assign(new Error("Invalid API-key"), { code: -2015 }),
		];

		const outcome = await trades.reconcile(instrument, trade);

		expect(outcome.status).toBe("unknown");
		expect(outcome.status === "unknown" && outcome.error.kind).toBe("auth");
		expect(trade.status).toBe("ACTIVE");
	});
});
