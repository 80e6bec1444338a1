import { z } from 'zod';
import { ProviderError } from './types';

export interface RerankRequest {
	query: string;
	documents: string[];
	topN?: number;
}

export interface RerankResult {
	/** Position of the document in the request. */
	index: number;
	score: number;
}

/** A hosted pairwise (query, passage) scoring model. */
export interface IRerankProvider {
	readonly model: string;
	rerank(req: RerankRequest, signal?: AbortSignal): Promise<RerankResult[]>;
}

// Cohere and Jina share this response shape
const RerankResponseZ = z.object({
	results: z.array(
		z.object({
			index: z.number().int().min(0),
			relevance_score: z.number(),
		})
	),
});

export interface HttpRerankProviderOptions {
	/** Base URL; `/rerank` is appended. */
	url: string;
	apiKey?: string;
	model: string;
	fetchImpl?: typeof fetch;
}

export class HttpRerankProvider implements IRerankProvider {
	readonly model: string;
	private readonly endpoint: string;
	private readonly apiKey?: string;
	private readonly fetchImpl: typeof fetch;

	constructor(opts: HttpRerankProviderOptions) {
		this.endpoint = `${opts.url.replace(/\/+$/, '')}/rerank`;
		this.apiKey = opts.apiKey;
		this.model = opts.model;
		this.fetchImpl = opts.fetchImpl ?? fetch;
	}

	async rerank(req: RerankRequest, signal?: AbortSignal): Promise<RerankResult[]> {
		const headers: Record<string, string> = {
			'Content-Type': 'application/json',
		};
		if (this.apiKey) {
			headers.Authorization = `Bearer ${this.apiKey}`;
		}

		let response: Response;
		try {
			response = await this.fetchImpl(this.endpoint, {
				method: 'POST',
				headers,
				body: JSON.stringify({
					model: this.model,
					query: req.query,
					documents: req.documents,
					top_n: req.topN ?? req.documents.length,
				}),
				signal,
			});
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			const aborted = err instanceof Error && err.name === 'AbortError';
			throw new ProviderError(aborted ? 'E_TIMEOUT' : 'E_PROVIDER', message, {
				cause: err,
			});
		}

		if (!response.ok) {
			const errorText = await response.text();
			const code =
				response.status === 401 || response.status === 403
					? 'E_AUTH'
					: 'E_PROVIDER';
			throw new ProviderError(
				code,
				`Rerank API error: ${response.status} ${errorText}`.trim(),
				{ status: response.status }
			);
		}

		let body: unknown;
		try {
			body = await response.json();
		} catch (err) {
			throw new ProviderError('E_PROVIDER', 'Rerank API returned invalid JSON', {
				status: response.status,
				cause: err,
			});
		}
		const parsed = RerankResponseZ.safeParse(body);
		if (!parsed.success) {
			throw new ProviderError('E_PROVIDER', 'Rerank API returned an unexpected body', {
				status: response.status,
				cause: parsed.error,
			});
		}
		return parsed.data.results
			.filter((r) => r.index < req.documents.length)
			.map((r) => ({ index: r.index, score: r.relevance_score }));
	}
}
