import { childLogger } from '@obs/logger';
import type { Embedder } from './embeddings';
import { BackendUnavailableError, InvalidQueryError } from './errors';
import type { Candidate, QueryFilter, VectorStoreAdapter } from './types';

const log = childLogger({ mod: 'rag.retrieval' });

export const DEFAULT_OVER_FETCH_FACTOR = 4;

export interface RetrieveCandidatesOptions {
	/** Number of passages the caller finally wants. */
	keep: number;
	/** Retrieval width is `keep * overFetchFactor` (default 4). */
	overFetchFactor?: number;
	filter?: QueryFilter;
	signal?: AbortSignal;
}

export interface CandidateRetriever {
	retrieveCandidates(
		query: string,
		opts: RetrieveCandidatesOptions
	): Promise<Candidate[]>;
}

export function assertQuery(query: string): string {
	const trimmed = typeof query === 'string' ? query.trim() : '';
	if (!trimmed) {
		throw new InvalidQueryError('Query must be a non-empty string');
	}
	return trimmed;
}

/**
 * Embeds the query once and asks the store for an over-fetched pool. The pool
 * is returned as the store ordered it; truncation to `keep` happens later.
 */
export function createCandidateRetriever(
	store: VectorStoreAdapter,
	embedder: Embedder
): CandidateRetriever {
	return {
		async retrieveCandidates(query, opts) {
			const text = assertQuery(query);
			if (!Number.isInteger(opts.keep) || opts.keep < 1) {
				throw new InvalidQueryError(
					`topK must be an integer >= 1, got ${opts.keep}`
				);
			}
			const factor = Math.max(
				1,
				Math.floor(opts.overFetchFactor ?? DEFAULT_OVER_FETCH_FACTOR)
			);
			const topKRetrieve = opts.keep * factor;

			const [vector] = await embedder.embed([text], opts.signal);
			if (!vector) {
				throw new BackendUnavailableError(
					'embeddings',
					'no vector returned for query'
				);
			}
			const started = Date.now();
			const candidates = await store.query(
				vector,
				topKRetrieve,
				opts.filter,
				opts.signal
			);
			log.debug({
				msg: 'rag.retrieve',
				backend: store.backend,
				keep: opts.keep,
				topKRetrieve,
				returned: candidates.length,
				ms: Date.now() - started,
			});
			return candidates;
		},
	};
}
