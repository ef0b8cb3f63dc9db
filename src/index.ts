import { binanceExchange, binanceMarketData } from "./clients/binance";
import { createTelegramNotifier } from "./clients/telegram";
import { config } from "./config";
import { loadInstruments } from "./config/instruments";
import { scheduleDailyReport } from "./services/dailyReport";
import { formatStall, formatStartup } from "./services/messages";
import { createSafeNotifier } from "./services/notifier";
import { PollLoop } from "./services/pollLoop";
import { SignalLog } from "./services/signalLog";
import { TradeLifecycle } from "./services/tradeLifecycle";
import { withRetry } from "./supervisor/retry";
import { ShutdownSignal } from "./supervisor/shutdown";
import { Watchdog } from "./supervisor/watchdog";
import type { Instrument, Notifier } from "./types";
import { logger } from "./utils/logger";

async function prepareTrading(
	instruments: readonly Instrument[],
): Promise<TradeLifecycle> {
	const verified = await withRetry(() => binanceExchange.verifyCredentials(), {
		...config.retry,
		logger,
		label: "Credential check",
	});
	if (!verified.ok) {
		throw verified.error;
	}

	for (const instrument of instruments) {
		if (instrument.leverage === undefined) continue;
		try {
			await binanceExchange.setLeverage(instrument.symbol, instrument.leverage);
			logger.info(
				{ symbol: instrument.symbol, leverage: instrument.leverage },
				"Leverage set",
			);
		} catch (err) {
			logger.error({ symbol: instrument.symbol, err }, "Failed to set leverage");
		}
	}

	return new TradeLifecycle({
		exchange: binanceExchange,
		logger: logger.child({ component: "trades" }),
		retry: config.retry,
	});
}

function createWatchdog(notifier: Notifier): Watchdog {
	return new Watchdog({
		stallMs: config.watchdog.stallSec * 1000,
		checkIntervalMs: config.watchdog.checkIntervalSec * 1000,
		onStall: (elapsedMs) => {
			logger.error({ elapsedMs }, "Poll loop stalled");
			void notifier.sendMessage(formatStall(elapsedMs));
		},
		onRecover: (stalledForMs) => {
			logger.info({ stalledForMs }, "Poll loop recovered");
		},
	});
}

async function bootstrap(): Promise<void> {
	logger.info("Starting band sentinel");

	const instruments = loadInstruments(config.paths.instruments);
	const notifier = createSafeNotifier(
		createTelegramNotifier(config.telegram),
		logger.child({ component: "notifier" }),
	);

	let trades: TradeLifecycle | undefined;
	if (config.trading.enabled) {
		try {
			trades = await prepareTrading(instruments);
		} catch (err) {
			logger.fatal({ err }, "Exchange credentials rejected; refusing to start");
			process.exitCode = 1;
			return;
		}
	} else {
		logger.warn("Trading disabled; running in alert-only mode");
	}

	const shutdown = new ShutdownSignal();
	const signals = shutdown.install(process);
	const watchdog = createWatchdog(notifier);
	const signalLog = new SignalLog(config.paths.signalLogDir, logger);
	const report = scheduleDailyReport({
		expression: config.scheduling.reportCron,
		timezone: config.scheduling.timezone,
		signalLog,
		notifier,
		logger,
	});

	const loop = new PollLoop({
		instruments,
		marketData: binanceMarketData,
		notifier,
		shutdown,
		logger: logger.child({ component: "loop" }),
		retry: config.retry,
		intervalMs: config.loop.intervalSec * 1000,
		trades,
		signalLog,
		watchdog,
		connectivity: config.loop.connectivityCheckEnabled
			? {
					ping: () => binanceExchange.ping(),
					timeoutMs: config.loop.connectivityTimeoutMs,
					cooldownMs: config.loop.offlineCooldownSec * 1000,
				}
			: undefined,
		timezone: config.scheduling.timezone,
	});

	await notifier.sendMessage(
		formatStartup(
			instruments.map((i) => i.symbol),
			Boolean(trades),
		),
	);

	watchdog.start();
	try {
		await loop.run();
	} finally {
		watchdog.stop();
		report.stop();
		signals.unsubscribe();
	}
}

bootstrap().catch((err) => {
	logger.fatal({ err }, "Fatal error");
	process.exitCode = 1;
});
