export type RagErrorCode =
	| 'E_CONFIG'
	| 'E_BACKEND'
	| 'E_DIMENSION'
	| 'E_QUERY'
	| 'E_TIMEOUT';

export class RagError extends Error {
	readonly code: RagErrorCode;
	/** Only transient errors are retried. */
	readonly transient: boolean;

	constructor(
		code: RagErrorCode,
		message: string,
		opts?: { transient?: boolean; cause?: unknown }
	) {
		super(message);
		this.name = 'RagError';
		this.code = code;
		this.transient = opts?.transient ?? false;
		if (opts?.cause) {
			this.cause = opts.cause;
		}
	}
}

export class ConfigurationError extends RagError {
	constructor(
		message: string,
		public readonly issues: string[] = [],
		cause?: unknown
	) {
		super(
			'E_CONFIG',
			issues.length ? `${message}:\n- ${issues.join('\n- ')}` : message,
			{ cause }
		);
		this.name = 'ConfigurationError';
	}
}

export class BackendUnavailableError extends RagError {
	constructor(
		public readonly backend: string,
		message: string,
		cause?: unknown
	) {
		super('E_BACKEND', `${backend}: ${message}`, {
			transient: true,
			cause,
		});
		this.name = 'BackendUnavailableError';
	}
}

export class DimensionMismatchError extends RagError {
	constructor(
		public readonly expected: number,
		public readonly actual: number,
		public readonly chunkId?: string
	) {
		super(
			'E_DIMENSION',
			chunkId
				? `Chunk ${chunkId} has vector length ${actual}, collection expects ${expected}`
				: `Vector length ${actual} does not match collection dimension ${expected}`
		);
		this.name = 'DimensionMismatchError';
	}
}

export class InvalidQueryError extends RagError {
	constructor(message: string) {
		super('E_QUERY', message);
		this.name = 'InvalidQueryError';
	}
}

export class RequestTimeoutError extends RagError {
	constructor(
		public readonly elapsedMs: number,
		cause?: unknown
	) {
		super('E_TIMEOUT', `Request aborted after ${elapsedMs}ms`, { cause });
		this.name = 'RequestTimeoutError';
	}
}

export function isRagError(e: unknown): e is RagError {
	return e instanceof RagError;
}

export function isTransient(e: unknown): boolean {
	return isRagError(e) && e.transient;
}

function messageOf(err: unknown): string {
	if (err instanceof Error) {
		return err.message;
	}
	return typeof err === 'string' ? err : 'unknown error';
}

/**
 * Client libraries throw plain errors for refused connections, 5xx responses
 * and the like. Anything that is not already typed is reported as the backend
 * being unavailable, keeping the original error as `cause`.
 */
export function toRagError(err: unknown, backend: string): RagError {
	if (isRagError(err)) {
		return err;
	}
	return new BackendUnavailableError(backend, messageOf(err), err);
}
