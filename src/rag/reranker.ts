import { childLogger } from '@obs/logger';
import { HttpRerankProvider, type IRerankProvider } from '@provider/rerank';
import { isProviderError } from '@provider/types';
import type { RerankerConfig } from '@store/schema';
import {
	BackendUnavailableError,
	ConfigurationError,
	isRagError,
	isTransient,
	type RagError,
} from './errors';
import { type ResilienceOptions, withRetry } from './resilience';
import type { Candidate, RerankStrategy } from './types';

const log = childLogger({ mod: 'rag.reranker' });

export interface RerankOutcome {
	candidates: Candidate[];
	/** False whenever the cross-encoder did not rescore the pool. */
	reranked: boolean;
	strategy: RerankStrategy;
	fallbackReason?: string;
}

export interface Reranker {
	readonly strategy: RerankStrategy;
	rerank(
		query: string,
		candidates: Candidate[],
		keep: number,
		signal?: AbortSignal
	): Promise<RerankOutcome>;
}

function truncate(candidates: Candidate[], keep: number): Candidate[] {
	return candidates.slice(0, Math.max(0, keep));
}

/** Keeps the retrieval order and cuts the pool to `keep`. */
export class PassThroughReranker implements Reranker {
	readonly strategy = 'pass-through' as const;

	async rerank(
		_query: string,
		candidates: Candidate[],
		keep: number
	): Promise<RerankOutcome> {
		return await Promise.resolve({
			candidates: truncate(candidates, keep),
			reranked: false,
			strategy: this.strategy,
		});
	}
}

function toRerankError(err: unknown): RagError {
	if (isRagError(err)) {
		return err;
	}
	if (isProviderError(err) && err.code === 'E_AUTH') {
		return new ConfigurationError(
			`Rerank endpoint rejected credentials: ${err.message}`,
			[],
			err
		);
	}
	return new BackendUnavailableError(
		'rerank',
		err instanceof Error ? err.message : String(err),
		err
	);
}

interface Scored {
	candidate: Candidate;
	position: number;
	score: number;
}

/** New score descending, then retrieval position, then chunk id. */
function compareScored(a: Scored, b: Scored): number {
	const d = b.score - a.score;
	if (d !== 0) {
		return d;
	}
	if (a.position !== b.position) {
		return a.position - b.position;
	}
	if (a.candidate.chunkId === b.candidate.chunkId) {
		return 0;
	}
	return a.candidate.chunkId < b.candidate.chunkId ? -1 : 1;
}

/**
 * Scores every (query, passage) pair through a hosted rerank model. A
 * transient failure, after retries, degrades to pass-through and is reported
 * through `reranked: false` and `fallbackReason`.
 */
export class CrossEncoderReranker implements Reranker {
	readonly strategy = 'cross-encoder' as const;
	private readonly provider: IRerankProvider;
	private readonly resilience?: ResilienceOptions;
	private readonly fallback = new PassThroughReranker();

	constructor(provider: IRerankProvider, resilience?: ResilienceOptions) {
		this.provider = provider;
		this.resilience = resilience;
	}

	async rerank(
		query: string,
		candidates: Candidate[],
		keep: number,
		signal?: AbortSignal
	): Promise<RerankOutcome> {
		if (candidates.length === 0) {
			return { candidates: [], reranked: false, strategy: this.strategy };
		}

		let scores: Map<number, number>;
		try {
			scores = await this.score(query, candidates, signal);
		} catch (err) {
			if (signal?.aborted || !isTransient(err)) {
				throw err;
			}
			const reason = err instanceof Error ? err.message : String(err);
			log.warn({
				msg: 'rerank.degraded',
				model: this.provider.model,
				pool: candidates.length,
				reason,
			});
			const out = await this.fallback.rerank(query, candidates, keep);
			return { ...out, strategy: this.strategy, fallbackReason: reason };
		}

		const scored: Scored[] = candidates.map((candidate, position) => ({
			candidate,
			position,
			score: scores.get(position) ?? Number.NEGATIVE_INFINITY,
		}));
		scored.sort(compareScored);

		log.debug({
			msg: 'rerank.done',
			model: this.provider.model,
			pool: candidates.length,
			keep,
		});

		return {
			candidates: truncate(
				scored.map(({ candidate, score }) => ({
					...candidate,
					score,
					retrievalScore: candidate.score,
					rerankScore: score,
				})),
				keep
			),
			reranked: true,
			strategy: this.strategy,
		};
	}

	private async score(
		query: string,
		candidates: Candidate[],
		signal?: AbortSignal
	): Promise<Map<number, number>> {
		const results = await withRetry(
			'rerank',
			async (timeoutSignal) => {
				try {
					return await this.provider.rerank(
						{
							query,
							documents: candidates.map((c) => c.text),
							topN: candidates.length,
						},
						timeoutSignal
					);
				} catch (err) {
					throw toRerankError(err);
				}
			},
			{ ...this.resilience, signal }
		);
		const scores = new Map<number, number>();
		for (const r of results) {
			scores.set(r.index, r.score);
		}
		if (scores.size !== candidates.length) {
			throw new BackendUnavailableError(
				'rerank',
				`response scored ${scores.size} of ${candidates.length} passages`
			);
		}
		return scores;
	}
}

export interface RerankerDeps {
	provider?: IRerankProvider;
	resilience?: ResilienceOptions;
	fetchImpl?: typeof fetch;
}

/**
 * The cross-encoder needs an endpoint; without one the configuration is
 * rejected rather than silently downgraded.
 */
export function createReranker(
	config: RerankerConfig,
	deps: RerankerDeps = {}
): Reranker {
	if (config.strategy === 'pass-through') {
		return new PassThroughReranker();
	}
	if (deps.provider) {
		return new CrossEncoderReranker(deps.provider, deps.resilience);
	}
	if (!config.url) {
		throw new ConfigurationError(
			'Cross-encoder reranking needs an endpoint',
			['reranker.url (RERANK_URL)']
		);
	}
	return new CrossEncoderReranker(
		new HttpRerankProvider({
			url: config.url,
			apiKey: config.apiKey,
			model: config.model,
			fetchImpl: deps.fetchImpl,
		}),
		deps.resilience
	);
}
