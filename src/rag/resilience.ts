import { childLogger } from '@obs/logger';
import { BackendUnavailableError, isTransient } from './errors';

const log = childLogger({ mod: 'rag.resilience' });

export interface ResilienceOptions {
	timeoutMs?: number;
	maxRetries?: number;
	backoffBaseMs?: number;
	jitter?: boolean;
	sleep?: (ms: number) => Promise<void>;
	/** Caller's signal; once aborted no further attempt is made. */
	signal?: AbortSignal;
}

export const DEFAULT_RESILIENCE = {
	timeoutMs: 10_000,
	maxRetries: 2,
	backoffBaseMs: 200,
	jitter: true,
} as const;

function defaultSleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `op` with its own AbortSignal and rejects with BackendUnavailableError
 * when it does not settle within `timeoutMs`. Aborting `outer` aborts the
 * signal handed to `op` as well.
 */
export async function withTimeout<T>(
	backend: string,
	op: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number = DEFAULT_RESILIENCE.timeoutMs,
	outer?: AbortSignal
): Promise<T> {
	const controller = new AbortController();
	const forward = () => controller.abort(outer?.reason);
	if (outer?.aborted) {
		forward();
	} else {
		outer?.addEventListener('abort', forward, { once: true });
	}
	let timer: NodeJS.Timeout | undefined;
	const expired = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			controller.abort();
			reject(
				new BackendUnavailableError(
					backend,
					`timed out after ${timeoutMs}ms`
				)
			);
		}, timeoutMs);
	});
	try {
		return await Promise.race([op(controller.signal), expired]);
	} finally {
		clearTimeout(timer);
		outer?.removeEventListener('abort', forward);
	}
}

/**
 * Bounded timeout plus exponential backoff. Only transient failures
 * (BackendUnavailableError) are retried; anything else is thrown at once.
 */
export async function withRetry<T>(
	backend: string,
	op: (signal: AbortSignal) => Promise<T>,
	opts: ResilienceOptions = {}
): Promise<T> {
	const {
		timeoutMs = DEFAULT_RESILIENCE.timeoutMs,
		maxRetries = DEFAULT_RESILIENCE.maxRetries,
		backoffBaseMs = DEFAULT_RESILIENCE.backoffBaseMs,
		jitter = DEFAULT_RESILIENCE.jitter,
		sleep = defaultSleep,
		signal,
	} = opts;

	let attempt = 0;
	// eslint-disable-next-line no-constant-condition
	while (true) {
		try {
			return await withTimeout(backend, op, timeoutMs, signal);
		} catch (err) {
			attempt++;
			if (signal?.aborted || !isTransient(err) || attempt > maxRetries) {
				throw err;
			}
			const delay =
				backoffBaseMs * 2 ** (attempt - 1) +
				(jitter ? Math.floor(Math.random() * backoffBaseMs) : 0);
			log.warn({
				msg: 'retry.backoff',
				backend,
				attempt,
				delayMs: delay,
				error: err instanceof Error ? err.message : String(err),
			});
			await sleep(delay);
			if (signal?.aborted) {
				throw err;
			}
		}
	}
}
