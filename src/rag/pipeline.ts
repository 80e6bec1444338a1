import { childLogger } from '@obs/logger';
import { OpenAIProvider } from '@provider/openai';
import { isProviderError } from '@provider/types';
import type { RagConfig } from '@store/schema';
import { assembleContext } from './context';
import {
	type Embedder,
	embedChunks,
	type IngestChunk,
	ProviderEmbedder,
} from './embeddings';
import {
	ConfigurationError,
	InvalidQueryError,
	RequestTimeoutError,
} from './errors';
import { createVectorStore, type VectorStoreDeps } from './factory';
import type { ResilienceOptions } from './resilience';
import {
	createReranker,
	PassThroughReranker,
	type Reranker,
	type RerankerDeps,
} from './reranker';
import { assertQuery, createCandidateRetriever } from './retrieval';
import type {
	CollectionStats,
	ContextBundle,
	QueryFilter,
	VectorStoreAdapter,
} from './types';

const log = childLogger({ mod: 'rag.pipeline' });

export interface RetrieveContextOptions {
	topK?: number;
	useReranker?: boolean;
	maxContextSize?: number;
	filter?: QueryFilter;
	/** Aborting rejects the call with RequestTimeoutError. */
	signal?: AbortSignal;
}

export interface RagCore {
	readonly store: VectorStoreAdapter;
	readonly embedder: Embedder;
	readonly reranker: Reranker;
	retrieveContext(
		query: string,
		opts?: RetrieveContextOptions
	): Promise<ContextBundle>;
	ingest(chunks: IngestChunk[]): Promise<number>;
	getCollectionStats(): Promise<CollectionStats>;
	deleteChunks(ids: Iterable<string>): Promise<number>;
	close(): Promise<void>;
}

export interface RagCoreDeps {
	cwd?: string;
	store?: VectorStoreAdapter;
	embedder?: Embedder;
	reranker?: Reranker;
	storeDeps?: Omit<VectorStoreDeps, 'resilience' | 'cwd'>;
	rerankerDeps?: Omit<RerankerDeps, 'resilience'>;
	sleep?: (ms: number) => Promise<void>;
}

function resilienceFrom(
	config: RagConfig,
	sleep?: (ms: number) => Promise<void>
): ResilienceOptions {
	const { timeoutMs, maxRetries, backoffBaseMs } = config.resilience;
	return { timeoutMs, maxRetries, backoffBaseMs, sleep };
}

function createEmbedder(
	config: RagConfig,
	resilience: ResilienceOptions
): Embedder {
	let provider: OpenAIProvider;
	try {
		provider = new OpenAIProvider({
			apiKey: config.embedding.apiKey,
			defaultEmbeddingModel: config.embedding.model,
		});
	} catch (err) {
		if (isProviderError(err)) {
			throw new ConfigurationError(err.message, [
				'embedding.apiKey (OPENAI_API_KEY)',
			]);
		}
		throw err;
	}
	return new ProviderEmbedder(provider, {
		model: config.embedding.model,
		dimension: config.vectorStore.embeddingDim,
		batchSize: config.embedding.batchSize,
		resilience,
	});
}

function positiveInt(name: string, v: number): number {
	if (!Number.isInteger(v) || v < 1) {
		throw new InvalidQueryError(`${name} must be an integer >= 1, got ${v}`);
	}
	return v;
}

/**
 * Runs `run` under a request deadline. The deadline or the caller's signal
 * rejects with RequestTimeoutError; nothing partial is returned.
 */
async function withDeadline<T>(
	timeoutMs: number,
	outer: AbortSignal | undefined,
	run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
	const controller = new AbortController();
	const started = Date.now();
	let onAbort = () => {};
	const aborted = new Promise<never>((_, reject) => {
		onAbort = () =>
			reject(new RequestTimeoutError(Date.now() - started, outer?.reason));
		controller.signal.addEventListener('abort', onAbort, { once: true });
	});
	const forward = () => controller.abort();
	const timer = setTimeout(forward, timeoutMs);
	if (outer?.aborted) {
		controller.abort();
	} else {
		outer?.addEventListener('abort', forward, { once: true });
	}
	try {
		return await Promise.race([run(controller.signal), aborted]);
	} finally {
		clearTimeout(timer);
		outer?.removeEventListener('abort', forward);
		controller.signal.removeEventListener('abort', onAbort);
	}
}

/**
 * Builds the store, embedder and reranker once; they are shared by every
 * request until `close()`.
 */
export async function createRagCore(
	config: RagConfig,
	deps: RagCoreDeps = {}
): Promise<RagCore> {
	const resilience = resilienceFrom(config, deps.sleep);
	const embedder = deps.embedder ?? createEmbedder(config, resilience);
	const reranker =
		deps.reranker ??
		createReranker(config.reranker, { ...deps.rerankerDeps, resilience });
	const store =
		deps.store ??
		(await createVectorStore(config.vectorStore, {
			...deps.storeDeps,
			cwd: deps.cwd,
			resilience: { ...config.resilience, sleep: deps.sleep },
		}));

	if (embedder.dimension !== store.dimension) {
		await store.close();
		throw new ConfigurationError(
			`Embedding dimension ${embedder.dimension} does not match vector store dimension ${store.dimension}`
		);
	}

	const retriever = createCandidateRetriever(store, embedder);
	const passThrough = new PassThroughReranker();
	const defaults = config.retrieval;

	return {
		store,
		embedder,
		reranker,

		async retrieveContext(query, opts = {}) {
			const text = assertQuery(query);
			const topK = positiveInt('topK', opts.topK ?? defaults.topK);
			const maxContextSize = positiveInt(
				'maxContextSize',
				opts.maxContextSize ?? defaults.maxContextSize
			);
			const stage =
				(opts.useReranker ?? defaults.useReranker) ? reranker : passThrough;

			const started = Date.now();
			const bundle = await withDeadline(
				config.resilience.requestTimeoutMs,
				opts.signal,
				async (signal) => {
					const candidates = await retriever.retrieveCandidates(text, {
						keep: topK,
						overFetchFactor: defaults.overFetchFactor,
						filter: opts.filter,
						signal,
					});
					const outcome = await stage.rerank(text, candidates, topK, signal);
					return assembleContext(outcome.candidates, {
						maxContextSize,
						unit: defaults.budgetUnit,
						reranked: outcome.reranked,
						rerankStrategy: outcome.strategy,
					});
				}
			);
			log.info({
				msg: 'rag.retrieve',
				topK,
				passages: bundle.passages.length,
				reranked: bundle.reranked,
				strategy: bundle.rerankStrategy,
				ms: Date.now() - started,
			});
			return bundle;
		},

		async ingest(chunks) {
			if (chunks.length === 0) {
				return 0;
			}
			const docs = await embedChunks(embedder, chunks);
			const written = await store.upsert(docs);
			log.info({ msg: 'rag.upsert', backend: store.backend, written });
			return written;
		},

		async getCollectionStats() {
			return await store.stats();
		},

		async deleteChunks(ids) {
			const deleted = await store.delete(ids);
			log.info({ msg: 'rag.delete', backend: store.backend, deleted });
			return deleted;
		},

		async close() {
			await store.close();
		},
	};
}
