import dayjs from "dayjs";
import timezone from "dayjs/plugin/timezone";
import utc from "dayjs/plugin/utc";
import type { ConnectivityResult } from "../supervisor/connectivity";
import type { IndicatorSnapshot, Side } from "../types";
import type { ProtectionOutcome } from "./tradeLifecycle";

dayjs.extend(utc);
dayjs.extend(timezone);

/** Wall-clock time in `tz`, prefixed to trade and alert messages. */
export function formatTimestamp(at: number, tz: string): string {
	return dayjs(at).tz(tz).format("YYYY-MM-DD HH:mm:ss");
}

function fmtPrice(value: number): string {
	return value.toFixed(8).replace(/\.?0+$/, "");
}

function sideIcon(side: Side): string {
	return side === "LONG" ? "🟢" : "🔴";
}

export function formatAlert(
	stamp: string,
	symbol: string,
	side: Side,
	magnitude: number,
	snapshot: IndicatorSnapshot,
): string {
	return [
		`${stamp} ⚠️ ALERT ${side} ${symbol}`,
		`Price: ${fmtPrice(snapshot.close)}`,
		`Strength: ${magnitude.toFixed(2)}`,
	].join("\n");
}

export function formatEntry(
	stamp: string,
	symbol: string,
	side: Side,
	entryPrice: number,
	quantity: number,
	protection: ProtectionOutcome,
): string {
	const { pair } = protection;
	return [
		`${stamp} ${sideIcon(side)} ${side} EXECUTED ${symbol}`,
		`Entry: ${fmtPrice(entryPrice)}`,
		`Qty: ${quantity}`,
		`SL: ${fmtPrice(pair.stopLoss)} (${protection.stopLoss})`,
		`TP: ${fmtPrice(pair.takeProfit)} (${protection.takeProfit})`,
	].join("\n");
}

export function formatRelease(stamp: string, symbol: string, side?: Side): string {
	const label = side ? `${symbol} ${side}` : symbol;
	return `${stamp} 🔁 ${label} trade closed, instrument free for new entries`;
}

export function formatOffline(result: ConnectivityResult, cooldownSec: number): string {
	const reason = result.reachable ? "" : ` (${result.error.message})`;
	return `📡 Exchange unreachable${reason}; pausing ${cooldownSec}s`;
}

export function formatOnline(latencyMs: number): string {
	return `📡 Exchange reachable again (${latencyMs}ms)`;
}

export function formatStall(elapsedMs: number): string {
	return `⏱️ Poll loop stalled: no completed cycle for ${Math.round(elapsedMs / 1000)}s`;
}

export function formatStartup(symbols: readonly string[], trading: boolean): string {
	const mode = trading ? "alerts + entries" : "alerts only";
	return `🚀 Bot started (${mode}): ${symbols.join(", ")}`;
}

export function formatShutdown(reason: string | null): string {
	return `🛑 Bot stopped${reason ? ` (${reason})` : ""}`;
}
