import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

function flag(name: string, fallback: boolean): boolean {
	return (process.env[name] || String(fallback)).toLowerCase() === "true";
}

function num(name: string, fallback: number): number {
	const raw = process.env[name];
	if (raw === undefined || raw === "") return fallback;
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new Error(`Environment variable ${name} must be numeric, got "${raw}"`);
	}
	return value;
}

const useTestnet = flag("BINANCE_USE_TESTNET", true);
const futuresUrl =
	process.env.BINANCE_FUTURES_URL ||
	(useTestnet
		? "https://testnet.binancefuture.com"
		: "https://fapi.binance.com");

export const config = Object.freeze({
	binance: Object.freeze({
		apiKey: process.env.BINANCE_API_KEY || "",
		apiSecret: process.env.BINANCE_API_SECRET || "",
		baseUrl: futuresUrl,
		testnet: useTestnet,
	}),
	trading: Object.freeze({
		enabled: flag("TRADING_ENABLED", false),
		hedgeMode: flag("HEDGE_MODE", true),
	}),
	telegram: Object.freeze({
		botToken: process.env.TELEGRAM_BOT_TOKEN || "",
		chatId: process.env.TELEGRAM_CHAT_ID || "",
		timeoutMs: num("TELEGRAM_TIMEOUT_MS", 10_000),
	}),
	loop: Object.freeze({
		intervalSec: num("LOOP_INTERVAL_SEC", 2),
		connectivityCheckEnabled: flag("CONNECTIVITY_CHECK", true),
		connectivityTimeoutMs: num("CONNECTIVITY_TIMEOUT_MS", 3_000),
		offlineCooldownSec: num("OFFLINE_COOLDOWN_SEC", 30),
	}),
	retry: Object.freeze({
		attempts: num("FETCH_RETRY_ATTEMPTS", 3),
		baseDelayMs: num("FETCH_RETRY_BASE_MS", 1_000),
		factor: num("FETCH_RETRY_FACTOR", 2),
		maxDelayMs: num("FETCH_RETRY_MAX_MS", 10_000),
	}),
	watchdog: Object.freeze({
		stallSec: num("WATCHDOG_STALL_SEC", 120),
		checkIntervalSec: num("WATCHDOG_CHECK_SEC", 30),
	}),
	scheduling: Object.freeze({
		reportCron: process.env.REPORT_CRON || "5 0 * * *", // 00:05 UTC
		timezone: process.env.REPORT_TIMEZONE || "UTC",
	}),
	paths: Object.freeze({
		instruments: path.resolve(
			process.cwd(),
			process.env.INSTRUMENTS_FILE || "config/instruments.json",
		),
		signalLogDir: path.join(process.cwd(), "data/signals"),
	}),
});

export type AppConfig = typeof config;
