import path from "node:path";
import type { IndicatorSnapshot, SignalEventType, Side } from "../types";
import type { Logger } from "../utils/logger";
import { appendLine, utcDay } from "../utils/storage";

export type SignalLogEntry = {
	at: number;
	symbol: string;
	type: SignalEventType;
	side: Side;
	price: number;
	magnitude: number;
	indicators: IndicatorSnapshot;
	targets?: { stopLoss: number; takeProfit: number };
};

/** Append-only audit trail of detected signals, one JSON line each, one file per UTC day. */
export class SignalLog {
	constructor(
		private readonly dir: string,
		private readonly logger: Logger,
	) {}

	pathFor(day: string): string {
		return path.join(this.dir, `signals-${day}.log`);
	}

	async record(entry: SignalLogEntry): Promise<void> {
		const line = JSON.stringify({ ...entry, at: new Date(entry.at).toISOString() });
		try {
			await appendLine(this.pathFor(utcDay(entry.at)), line);
			this.logger.debug(
				{ symbol: entry.symbol, type: entry.type, side: entry.side },
				"Signal recorded",
			);
		} catch (err) {
			this.logger.error({ symbol: entry.symbol, err }, "Failed to record signal");
		}
	}
}
