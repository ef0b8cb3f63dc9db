import {
	type EngineError,
	type Result,
	classifyError,
	fail,
	isRetryable,
	ok,
} from "../utils/errors";
import type { Logger } from "../utils/logger";
import { sleep as defaultSleep } from "../utils/time";

export type RetryPolicy = {
	attempts: number;
	baseDelayMs: number;
	factor: number;
	maxDelayMs: number;
};

export type RetryOptions = RetryPolicy & {
	sleep?: (ms: number) => Promise<void>;
	logger?: Logger;
	label?: string;
	context?: Record<string, unknown>;
};

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
	const delay = policy.baseDelayMs * policy.factor ** (attempt - 1);
	return Math.min(delay, policy.maxDelayMs);
}

/**
 * Runs `operation` up to `attempts` times. Only transient and malformed
 * failures are retried; the last classified error is returned on exhaustion.
 */
export async function withRetry<T>(
	operation: (attempt: number) => Promise<T>,
	options: RetryOptions,
): Promise<Result<T>> {
	const attempts = Math.max(1, Math.floor(options.attempts));
	const wait = options.sleep ?? defaultSleep;
	let lastError: EngineError | undefined;

	for (let attempt = 1; attempt <= attempts; attempt++) {
		try {
			return ok(await operation(attempt));
		} catch (err) {
			lastError = classifyError(err);
			if (!isRetryable(lastError.kind) || attempt === attempts) {
				break;
			}

			const delayMs = backoffDelay(options, attempt);
			options.logger?.warn(
				{
					...options.context,
					attempt,
					attempts,
					delayMs,
					kind: lastError.kind,
					err: lastError.message,
				},
				`${options.label ?? "Operation"} failed, retrying`,
			);
			await wait(delayMs);
		}
	}

	if (!lastError) {
		throw new Error("Retry loop finished without a result");
	}
	return fail(lastError);
}
