import fs from "node:fs";
import { z } from "zod";
import type { CandleInterval, Instrument } from "../types";

export const CANDLE_INTERVALS = [
	"1m",
	"3m",
	"5m",
	"15m",
	"30m",
	"1h",
	"2h",
	"4h",
	"6h",
	"8h",
	"12h",
	"1d",
	"3d",
	"1w",
	"1M",
] as const satisfies readonly CandleInterval[];

const PolicySchema = z.enum(["latch", "dedup"]);
const Positive = z.number().positive();
const Period = z.number().int().min(1);

const BollingerSchema = z.object({
	kind: z.literal("bollinger"),
	period: Period.default(20),
	stdDev: Positive.default(2),
	entryPct: z.number().min(0).default(0.2),
	direction: z.enum(["breakout", "reversion"]).default("breakout"),
	policy: PolicySchema.optional(),
});

const AdxBandsSchema = z.object({
	kind: z.literal("adxBands"),
	period: Period.default(20),
	stdDev: Positive.default(2),
	adxPeriod: Period.default(14),
	adxMin: z.number().min(0).default(20),
	adxEntry: z.number().min(0).default(25),
	minBandWidth: z.number().min(0).default(0),
	policy: PolicySchema.optional(),
});

const TripleSmaSchema = z
	.object({
		kind: z.literal("tripleSma"),
		fastPeriod: Period.default(9),
		midPeriod: Period.default(21),
		slowPeriod: Period.default(50),
		slopeLookback: Period.default(3),
		minSlopePct: z.number().min(0).default(0),
		minSeparationPct: z.number().min(0).default(0),
		breakoutLookback: Period.default(10),
		entryThreshold: z.number().min(0).default(0),
		policy: PolicySchema.optional(),
	})
	.refine((s) => s.fastPeriod < s.midPeriod && s.midPeriod < s.slowPeriod, {
		message: "fastPeriod < midPeriod < slowPeriod is required",
	});

export const StrategySchema = z.union([
	BollingerSchema,
	AdxBandsSchema,
	TripleSmaSchema,
]);

export const InstrumentSchema = z.object({
	symbol: z.string().min(1).toUpperCase(),
	interval: z.enum(CANDLE_INTERVALS).default("1m"),
	candleLimit: z.number().int().min(2).max(1500).default(200),
	quantity: Positive,
	leverage: z.number().int().min(1).max(125).optional(),
	strategy: StrategySchema,
	protection: z
		.object({
			stopLossPct: Positive.default(1),
			takeProfitPct: Positive.default(2),
		})
		.default({}),
});

export const InstrumentListSchema = z
	.array(InstrumentSchema)
	.min(1)
	.superRefine((list, ctx) => {
		const seen = new Set<string>();
		list.forEach((instrument, index) => {
			if (seen.has(instrument.symbol)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `Duplicate instrument ${instrument.symbol}`,
					path: [index, "symbol"],
				});
			}
			seen.add(instrument.symbol);
		});
	});

export function parseInstruments(raw: unknown): Instrument[] {
	return InstrumentListSchema.parse(raw);
}

export function loadInstruments(filePath: string): Instrument[] {
	const content = fs.readFileSync(filePath, "utf8");
	return parseInstruments(JSON.parse(content));
}
