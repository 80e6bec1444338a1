import type { IProvider } from '@provider/types';
import { type Embedder, type IngestChunk, ProviderEmbedder } from '@rag/embeddings';
import { LanceDBStore } from '@rag/drivers/lancedb';
import { QdrantStore } from '@rag/drivers/qdrant';
import {
	ConfigurationError,
	DimensionMismatchError,
	InvalidQueryError,
	RequestTimeoutError,
} from '@rag/errors';
import { createRagCore, type RagCore } from '@rag/pipeline';
import { CrossEncoderReranker } from '@rag/reranker';
import type { VectorStoreAdapter } from '@rag/types';
import { describe, expect, it, vi } from 'vitest';
import {
	FakeLanceDB,
	FakeQdrantClient,
	fakeArrowSchema,
	fastResilience,
	KeywordEmbedder,
	OverlapRerankProvider,
	TEST_DB_DIR,
	testConfig,
} from '../helpers/fakes';

const VOCAB = ['asu', 'tuition', 'mascot', 'sparky', 'devil', 'parking'];
const SPARKY_URL = 'https://www.asu.edu/traditions/sparky';

const corpus: IngestChunk[] = [
	{
		id: 'mascot-1',
		text: 'Sparky the Sun Devil is the ASU mascot',
		sourceUrl: SPARKY_URL,
		metadata: { section: 'traditions' },
	},
	{ id: 'mascot-2', text: 'Sparky mascot history', sourceUrl: SPARKY_URL },
	{ id: 'parking-1', text: 'Parking permits at ASU', sourceUrl: 'https://www.asu.edu/parking' },
	{
		id: 'tuition-1',
		text: 'ASU tuition and fees for residents',
		sourceUrl: 'https://www.asu.edu/tuition',
	},
];

function localStore(dimension = VOCAB.length): LanceDBStore {
	return new LanceDBStore({
		path: TEST_DB_DIR,
		collectionName: 'pipeline_test',
		dimension,
		resilience: fastResilience,
		connectImpl: new FakeLanceDB().connect,
		buildArrowSchemaImpl: fakeArrowSchema,
	});
}

function cloudStore(): QdrantStore {
	const client = new FakeQdrantClient();
	return new QdrantStore({
		url: 'http://fake:6333',
		apiKey: 'test-secret',
		collectionName: 'pipeline_test',
		dimension: VOCAB.length,
		resilience: fastResilience,
		connectImpl: async () => await Promise.resolve(client),
	});
}

async function openCore(
	store: VectorStoreAdapter,
	opts: { embedder?: Embedder; rerankProvider?: OverlapRerankProvider; overrides?: Record<string, unknown> } = {}
): Promise<RagCore> {
	await store.probe();
	return await createRagCore(testConfig(opts.overrides), {
		store,
		embedder: opts.embedder ?? new KeywordEmbedder(VOCAB),
		reranker: opts.rerankProvider
			? new CrossEncoderReranker(opts.rerankProvider, fastResilience)
			: undefined,
	});
}

async function seeded(store: VectorStoreAdapter = localStore()): Promise<RagCore> {
	const core = await openCore(store);
	await core.ingest(corpus);
	return core;
}

describe('retrieveContext', () => {
	it('answers the mascot question with the Sparky passage first', async () => {
		const core = await seeded();
		const bundle = await core.retrieveContext("What is ASU's mascot?", { topK: 2 });
		expect(bundle.passages[0]?.chunkId).toBe('mascot-1');
		expect(bundle.passages[0]?.sourceUrl).toBe(SPARKY_URL);
		expect(bundle.passages[0]?.metadata).toEqual({ section: 'traditions' });
		// mascot-2 shares the source url and is folded into mascot-1
		expect(bundle.passages).toHaveLength(1);
		expect(bundle.citations).toEqual([`[1] ${SPARKY_URL}`]);
		expect(bundle.reranked).toBe(false);
		expect(bundle.rerankStrategy).toBe('pass-through');
	});

	it('reports reranking when the cross-encoder rescored the pool', async () => {
		const provider = new OverlapRerankProvider();
		const core = await openCore(localStore(), { rerankProvider: provider });
		await core.ingest(corpus);
		const bundle = await core.retrieveContext("What is ASU's mascot?", { topK: 3 });
		expect(provider.calls).toBe(1);
		expect(bundle.reranked).toBe(true);
		expect(bundle.rerankStrategy).toBe('cross-encoder');
		expect(bundle.passages.map((p) => p.chunkId)).toEqual(['mascot-1', 'parking-1']);
		expect(bundle.passages[0]).toMatchObject({ score: 3, rerankScore: 3 });
	});

	it('skips the cross-encoder when useReranker is false', async () => {
		const provider = new OverlapRerankProvider();
		const core = await openCore(localStore(), { rerankProvider: provider });
		await core.ingest(corpus);
		const bundle = await core.retrieveContext('mascot', { topK: 2, useReranker: false });
		expect(provider.calls).toBe(0);
		expect(bundle.reranked).toBe(false);
		expect(bundle.rerankStrategy).toBe('pass-through');
	});

	it('self-retrieves an ingested chunk by its own text', async () => {
		const core = await seeded();
		const bundle = await core.retrieveContext('Parking permits at ASU', { topK: 1 });
		expect(bundle.passages.map((p) => p.chunkId)).toEqual(['parking-1']);
		expect(bundle.passages[0]?.score).toBeCloseTo(1, 6);
	});

	it('returns the same passages from either backend', async () => {
		const local = await seeded(localStore());
		const cloud = await seeded(cloudStore());
		const opts = { topK: 3, useReranker: false };
		const a = await local.retrieveContext('tuition', opts);
		const b = await cloud.retrieveContext('tuition', opts);
		expect(a.passages.map((p) => p.chunkId)).toEqual(['tuition-1', 'mascot-1']);
		expect(b.passages.map((p) => p.chunkId)).toEqual(a.passages.map((p) => p.chunkId));
	});

	it('returns an empty bundle for an empty collection', async () => {
		const core = await openCore(localStore());
		const bundle = await core.retrieveContext('anything about asu');
		expect(bundle.passages).toEqual([]);
		expect(bundle.citations).toEqual([]);
	});

	it('honours the context budget but keeps at least one passage', async () => {
		const core = await seeded();
		const bundle = await core.retrieveContext('asu', { topK: 3, maxContextSize: 5 });
		expect(bundle.passages).toHaveLength(1);
	});

	it('applies metadata filters', async () => {
		const core = await seeded();
		const bundle = await core.retrieveContext('asu', {
			topK: 3,
			filter: { sourceUrl: 'https://www.asu.edu/tuition' },
		});
		expect(bundle.passages.map((p) => p.chunkId)).toEqual(['tuition-1']);
	});

	it('rejects a blank query and a bad topK before touching the store', async () => {
		const embedder = new KeywordEmbedder(VOCAB);
		const core = await openCore(localStore(), { embedder });
		await expect(core.retrieveContext('  ')).rejects.toBeInstanceOf(InvalidQueryError);
		await expect(core.retrieveContext('asu', { topK: 0 })).rejects.toBeInstanceOf(
			InvalidQueryError
		);
		expect(embedder.calls).toBe(0);
	});

	it('rejects with RequestTimeoutError when the caller aborts', async () => {
		const core = await seeded();
		const controller = new AbortController();
		controller.abort();
		await expect(
			core.retrieveContext('asu', { signal: controller.signal })
		).rejects.toBeInstanceOf(RequestTimeoutError);
	});

	it('stops embedding retries once the request is aborted', async () => {
		let calls = 0;
		// fails only when its attempt is aborted
		const provider: IProvider = {
			name: 'openai',
			embed: (_texts, _model, signal) => {
				calls++;
				return new Promise<number[][]>((_, reject) => {
					signal?.addEventListener('abort', () => reject(new Error('aborted')));
				});
			},
		};
		const embedder = new ProviderEmbedder(provider, {
			model: 'm',
			dimension: VOCAB.length,
			resilience: { ...fastResilience, maxRetries: 3 },
		});
		const core = await openCore(localStore(), { embedder });
		const controller = new AbortController();
		setTimeout(() => controller.abort(), 20);
		await expect(
			core.retrieveContext('asu', { signal: controller.signal })
		).rejects.toBeInstanceOf(RequestTimeoutError);
		await new Promise((resolve) => setTimeout(resolve, 50));
		expect(calls).toBe(1);
	});

	it('rejects with RequestTimeoutError when the request deadline passes', async () => {
		const hanging: Embedder = {
			model: 'hanging',
			dimension: VOCAB.length,
			embed: () =>
				new Promise<number[][]>(() => {
					// never settles
				}),
		};
		const core = await openCore(localStore(), {
			embedder: hanging,
			overrides: { resilience: { requestTimeoutMs: 20 } },
		});
		await expect(core.retrieveContext('asu')).rejects.toBeInstanceOf(RequestTimeoutError);
	});
});

describe('ingest, stats and delete', () => {
	it('ingests chunks and reports them in collection stats', async () => {
		const core = await openCore(localStore());
		expect(await core.ingest([])).toBe(0);
		expect(await core.ingest(corpus)).toBe(4);
		expect(await core.getCollectionStats()).toEqual({
			totalDocuments: 4,
			collectionName: 'pipeline_test',
			vectorSize: VOCAB.length,
			distanceMetric: 'cosine',
			backend: 'local',
		});
	});

	it('leaves the collection intact when a chunk has the wrong dimension', async () => {
		const core = await seeded();
		await expect(
			core.ingest([{ id: 'bad', text: 'x', sourceUrl: '', embedding: [1, 2] }])
		).rejects.toBeInstanceOf(DimensionMismatchError);
		expect((await core.getCollectionStats()).totalDocuments).toBe(4);
	});

	it('deletes by id and counts only existing chunks', async () => {
		const core = await seeded(cloudStore());
		expect(await core.deleteChunks(['parking-1', 'ghost'])).toBe(1);
		expect((await core.getCollectionStats()).totalDocuments).toBe(3);
	});
});

describe('createRagCore', () => {
	it('refuses an embedder whose dimension differs from the store and closes the store', async () => {
		const store = localStore(3);
		await store.probe();
		const close = vi.spyOn(store, 'close');
		await expect(
			createRagCore(testConfig(), { store, embedder: new KeywordEmbedder(VOCAB) })
		).rejects.toBeInstanceOf(ConfigurationError);
		expect(close).toHaveBeenCalledTimes(1);
	});

	it('names the missing embedding key as a configuration issue', async () => {
		const err = await createRagCore(testConfig({ embedding: { apiKey: ' ' } }), {
			store: localStore(),
		}).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(ConfigurationError);
		expect(err instanceof ConfigurationError ? err.issues : []).toEqual([
			'embedding.apiKey (OPENAI_API_KEY)',
		]);
	});
});
