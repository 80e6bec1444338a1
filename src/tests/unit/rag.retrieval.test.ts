import { LanceDBStore } from '@rag/drivers/lancedb';
import { BackendUnavailableError, InvalidQueryError } from '@rag/errors';
import { assertQuery, createCandidateRetriever } from '@rag/retrieval';
import type { Embedder } from '@rag/embeddings';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
	FakeLanceDB,
	fakeArrowSchema,
	fastResilience,
	KeywordEmbedder,
	mkChunk,
	TEST_DB_DIR,
} from '../helpers/fakes';

const vocab = ['asu', 'tuition', 'mascot', 'sparky'];

describe('createCandidateRetriever', () => {
	let store: LanceDBStore;
	let embedder: KeywordEmbedder;

	beforeEach(async () => {
		store = new LanceDBStore({
			path: TEST_DB_DIR,
			collectionName: 'retrieval_test',
			dimension: vocab.length,
			resilience: fastResilience,
			connectImpl: new FakeLanceDB().connect,
			buildArrowSchemaImpl: fakeArrowSchema,
		});
		await store.probe();
		embedder = new KeywordEmbedder(vocab);
	});

	it('rejects a blank query without embedding it', async () => {
		const retriever = createCandidateRetriever(store, embedder);
		await expect(retriever.retrieveCandidates('   ', { keep: 2 })).rejects.toBeInstanceOf(
			InvalidQueryError
		);
		expect(embedder.calls).toBe(0);
	});

	it('rejects a non-positive keep', async () => {
		const retriever = createCandidateRetriever(store, embedder);
		await expect(retriever.retrieveCandidates('asu', { keep: 0 })).rejects.toBeInstanceOf(
			InvalidQueryError
		);
	});

	it('returns an empty pool for an empty collection', async () => {
		const retriever = createCandidateRetriever(store, embedder);
		expect(await retriever.retrieveCandidates('asu mascot', { keep: 3 })).toEqual([]);
	});

	it('over-fetches keep * factor candidates with a single embedding call', async () => {
		await store.upsert(
			Array.from({ length: 10 }, (_, i) => mkChunk(`c${i}`, [1, 0, i % 2, 0]))
		);
		const spy = vi.spyOn(store, 'query');
		const retriever = createCandidateRetriever(store, embedder);
		const pool = await retriever.retrieveCandidates('  asu  ', {
			keep: 2,
			overFetchFactor: 3,
		});
		expect(pool).toHaveLength(6);
		expect(spy).toHaveBeenCalledWith([1, 0, 0, 0], 6, undefined, undefined);
		expect(embedder.calls).toBe(1);
		expect(embedder.texts).toEqual(['asu']);
	});

	it('defaults the over-fetch factor to 4 and passes filters through', async () => {
		const spy = vi.spyOn(store, 'query');
		const retriever = createCandidateRetriever(store, embedder);
		await retriever.retrieveCandidates('mascot', {
			keep: 2,
			filter: { sourceUrl: 'https://asu.edu/x' },
		});
		expect(spy).toHaveBeenCalledWith(
			[0, 0, 1, 0],
			8,
			{ sourceUrl: 'https://asu.edu/x' },
			undefined
		);
	});

	it('hands the caller signal to the store', async () => {
		const spy = vi.spyOn(store, 'query');
		const controller = new AbortController();
		await createCandidateRetriever(store, embedder).retrieveCandidates('asu', {
			keep: 1,
			signal: controller.signal,
		});
		expect(spy).toHaveBeenCalledWith([1, 0, 0, 0], 4, undefined, controller.signal);
	});

	it('treats an embedder that returns nothing as unavailable', async () => {
		const empty: Embedder = {
			model: 'empty',
			dimension: vocab.length,
			embed: async () => await Promise.resolve([]),
		};
		const retriever = createCandidateRetriever(store, empty);
		await expect(retriever.retrieveCandidates('asu', { keep: 1 })).rejects.toBeInstanceOf(
			BackendUnavailableError
		);
	});
});

describe('assertQuery', () => {
	it('trims the query', () => {
		expect(assertQuery('  hi ')).toBe('hi');
	});
});
