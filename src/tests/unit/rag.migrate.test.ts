import { LanceDBStore } from '@rag/drivers/lancedb';
import { QdrantStore } from '@rag/drivers/qdrant';
import { ConfigurationError } from '@rag/errors';
import { migrateCollection } from '@rag/migrate';
import { describe, expect, it } from 'vitest';
import {
	FakeLanceDB,
	FakeQdrantClient,
	fakeArrowSchema,
	fastResilience,
	mkChunk,
	TEST_DB_DIR,
} from '../helpers/fakes';

function lance(dimension = 3) {
	return new LanceDBStore({
		path: TEST_DB_DIR,
		collectionName: 'migrate_src',
		dimension,
		resilience: fastResilience,
		connectImpl: new FakeLanceDB().connect,
		buildArrowSchemaImpl: fakeArrowSchema,
	});
}

function qdrant(client = new FakeQdrantClient()) {
	return new QdrantStore({
		url: 'http://fake:6333',
		apiKey: 'test-secret',
		collectionName: 'migrate_dst',
		dimension: 3,
		resilience: fastResilience,
		connectImpl: async () => await Promise.resolve(client),
	});
}

describe('migrateCollection', () => {
	it('copies every chunk with its vector and metadata', async () => {
		const from = lance();
		const to = qdrant();
		await from.probe();
		await to.probe();
		await from.upsert([
			mkChunk('a', [1, 0, 0], 'https://asu.edu/a', { kind: 'faq' }),
			mkChunk('b', [0, 1, 0]),
			mkChunk('c', [0, 0, 1]),
		]);
		const progress: number[] = [];
		const result = await migrateCollection(from, to, {
			batchSize: 2,
			onProgress: (n) => progress.push(n),
		});
		expect(result).toEqual({
			copied: 3,
			sourceDocuments: 3,
			targetDocuments: 3,
			verified: true,
		});
		expect(progress).toEqual([2, 3]);
		expect((await to.stats()).totalDocuments).toBe(3);
		const [hit] = await to.query([1, 0, 0], 1);
		expect(hit).toMatchObject({
			chunkId: 'a',
			sourceUrl: 'https://asu.edu/a',
			metadata: { kind: 'faq' },
		});
	});

	it('can be repeated without duplicating chunks', async () => {
		const from = lance();
		const to = qdrant();
		await from.probe();
		await to.probe();
		await from.upsert([mkChunk('a', [1, 0, 0])]);
		await migrateCollection(from, to);
		await migrateCollection(from, to);
		expect((await to.stats()).totalDocuments).toBe(1);
	});

	it('copies nothing from an empty collection', async () => {
		const from = lance();
		const to = qdrant();
		await from.probe();
		await to.probe();
		expect(await migrateCollection(from, to)).toMatchObject({ copied: 0, verified: true });
	});

	it('reports a target that ends up with a different document count', async () => {
		const from = lance();
		const to = qdrant();
		await from.probe();
		await to.probe();
		await from.upsert([mkChunk('a', [1, 0, 0]), mkChunk('b', [0, 1, 0])]);
		await to.upsert([mkChunk('stale', [0, 0, 1])]);
		expect(await migrateCollection(from, to)).toEqual({
			copied: 2,
			sourceDocuments: 2,
			targetDocuments: 3,
			verified: false,
		});
	});

	it('refuses to migrate between dimensions', async () => {
		await expect(migrateCollection(lance(4), qdrant())).rejects.toBeInstanceOf(
			ConfigurationError
		);
	});
});
