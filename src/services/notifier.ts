import type { Notifier } from "../types";
import { EngineError } from "../utils/errors";
import type { Logger } from "../utils/logger";

function notifyError(err: unknown): EngineError {
	const message = err instanceof Error ? err.message : String(err);
	return new EngineError("notify", message, { cause: err });
}

/** Fire-and-forget wrapper: delivery failures are logged and never reach the caller. */
export function createSafeNotifier(inner: Notifier, log: Logger): Notifier {
	return {
		async sendMessage(text: string): Promise<void> {
			try {
				await inner.sendMessage(text);
			} catch (err) {
				const error = notifyError(err);
				log.error({ kind: error.kind, err: error.message }, "Failed to send notification");
			}
		},
		async sendDocument(filePath: string, caption: string): Promise<void> {
			try {
				await inner.sendDocument(filePath, caption);
			} catch (err) {
				const error = notifyError(err);
				log.error(
					{ kind: error.kind, filePath, err: error.message },
					"Failed to send document",
				);
			}
		},
	};
}
