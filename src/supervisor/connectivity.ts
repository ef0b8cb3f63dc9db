import { defer, firstValueFrom } from "rxjs";
import { timeout } from "rxjs/operators";
import { type EngineError, classifyError } from "../utils/errors";

export type ConnectivityResult =
	| { reachable: true; latencyMs: number }
	| { reachable: false; latencyMs: number; error: EngineError };

export async function checkConnectivity(
	ping: () => Promise<unknown>,
	timeoutMs: number,
	now: () => number = Date.now,
): Promise<ConnectivityResult> {
	const startedAt = now();
	try {
		await firstValueFrom(defer(() => ping()).pipe(timeout(timeoutMs)), {
			defaultValue: undefined,
		});
		return { reachable: true, latencyMs: now() - startedAt };
	} catch (err) {
		return {
			reachable: false,
			latencyMs: now() - startedAt,
			error: classifyError(err),
		};
	}
}
