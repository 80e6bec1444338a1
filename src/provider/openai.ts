import { getLogger } from '@obs/logger';
import OpenAI from 'openai';
import { type IProvider, ProviderError } from './types';

function field(obj: unknown, prop: string): unknown {
	return typeof obj === 'object' && obj !== null
		? Reflect.get(obj, prop)
		: undefined;
}

function toStatus(err: unknown): number | undefined {
	const status = field(err, 'status');
	if (typeof status === 'number') {
		return status;
	}
	const nested = field(field(err, 'response'), 'status');
	return typeof nested === 'number' ? nested : undefined;
}

function toMessage(err: unknown): string | undefined {
	const message = field(err, 'message');
	if (typeof message === 'string') {
		return message;
	}
	const nested = field(field(field(field(err, 'response'), 'data'), 'error'), 'message');
	return typeof nested === 'string' ? nested : undefined;
}

export function mapOpenAIError(err: unknown): ProviderError {
	const status = toStatus(err);
	const message = toMessage(err) ?? 'OpenAI error';
	const name = field(err, 'name');
	const isAbort =
		(typeof name === 'string' && /abort|cancel|timeout/i.test(name)) ||
		/aborted|aborterror|canceled?|timed out/i.test(message);

	if (status === 401 || /unauthorized|invalid api key/i.test(message)) {
		return new ProviderError('E_AUTH', message, { status, cause: err });
	}
	if (isAbort) {
		return new ProviderError('E_TIMEOUT', message, { status, cause: err });
	}
	return new ProviderError('E_PROVIDER', message, { status, cause: err });
}

export interface OpenAIProviderOptions {
	apiKey?: string;
	baseURL?: string;
	organization?: string;
	defaultEmbeddingModel?: string;
	// retries are owned by the caller's backoff loop
	maxRetries?: number;
}

function ensureApiKey(envKey?: string): string {
	const key =
		typeof envKey === 'string' ? envKey : process.env.OPENAI_API_KEY;
	if (!key?.trim()) {
		throw new ProviderError(
			'E_AUTH',
			'Missing OpenAI API key. Set OPENAI_API_KEY in your environment.'
		);
	}
	return key;
}

export class OpenAIProvider implements IProvider {
	readonly name = 'openai' as const;
	private client: OpenAI;
	private defaultEmbeddingModel: string;

	constructor(opts: OpenAIProviderOptions = {}) {
		const apiKey = ensureApiKey(opts.apiKey);
		this.client = new OpenAI({
			apiKey,
			baseURL: opts.baseURL,
			organization: opts.organization,
			maxRetries: opts.maxRetries ?? 0,
		});
		this.defaultEmbeddingModel =
			opts.defaultEmbeddingModel ?? 'text-embedding-3-small';
	}

	async embed(
		texts: string[],
		model?: string,
		signal?: AbortSignal
	): Promise<number[][]> {
		try {
			const res = await this.client.embeddings.create(
				{
					model: model ?? this.defaultEmbeddingModel,
					input: texts,
				},
				{ signal }
			);
			// The API may return items out of order; `index` is authoritative
			return [...res.data]
				.sort((a, b) => a.index - b.index)
				.map((d) => d.embedding);
		} catch (err) {
			const mapped = mapOpenAIError(err);
			getLogger().error({
				msg: 'openai-embed-error',
				code: mapped.code,
				status: mapped.status,
				error: mapped.message,
			});
			throw mapped;
		}
	}
}
