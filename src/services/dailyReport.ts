import cron, { type ScheduledTask } from "node-cron";
import type { Notifier } from "../types";
import type { Logger } from "../utils/logger";
import { fileExists, utcDay } from "../utils/storage";
import type { SignalLog } from "./signalLog";

const DAY_MS = 24 * 60 * 60 * 1000;

export type DailyReportOptions = {
	expression: string;
	timezone: string;
	signalLog: SignalLog;
	notifier: Notifier;
	logger: Logger;
	now?: () => number;
};

/** Sends the given day's signal log as a document. Returns false when there was nothing to send. */
export async function sendDailyReport(
	signalLog: SignalLog,
	notifier: Notifier,
	day: string,
	log: Logger,
): Promise<boolean> {
	const filePath = signalLog.pathFor(day);
	if (!(await fileExists(filePath))) {
		log.info({ day }, "No signals recorded; skipping daily report");
		return false;
	}

	await notifier.sendDocument(filePath, `Signals ${day}`);
	log.info({ day, filePath }, "Daily signal report sent");
	return true;
}

export function scheduleDailyReport(options: DailyReportOptions): ScheduledTask {
	if (!cron.validate(options.expression)) {
		throw new Error(`Invalid report cron expression: ${options.expression}`);
	}
	const now = options.now ?? Date.now;

	return cron.schedule(
		options.expression,
		async () => {
			const day = utcDay(now() - DAY_MS);
			try {
				await sendDailyReport(options.signalLog, options.notifier, day, options.logger);
			} catch (err) {
				options.logger.error({ day, err }, "Daily report job failed");
			}
		},
		{ timezone: options.timezone },
	);
}
