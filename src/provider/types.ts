export interface IProvider {
	readonly name: 'openai';
	embed(
		texts: string[],
		model?: string,
		signal?: AbortSignal
	): Promise<number[][]>;
}

export type ProviderErrorCode = 'E_AUTH' | 'E_PROVIDER' | 'E_TIMEOUT';

export class ProviderError extends Error {
	code: ProviderErrorCode;
	status?: number;
	constructor(
		code: ProviderErrorCode,
		message: string,
		opts?: { status?: number; cause?: unknown }
	) {
		super(message);
		this.name = 'ProviderError';
		this.code = code;
		this.status = opts?.status;
		if (opts?.cause) {
			this.cause = opts.cause;
		}
	}
}

export function isProviderError(e: unknown): e is ProviderError {
	return e instanceof Error && e.name === 'ProviderError';
}
