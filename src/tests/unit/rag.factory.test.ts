import { BackendUnavailableError, ConfigurationError } from '@rag/errors';
import { createVectorStore, describeVectorStore } from '@rag/factory';
import { describe, expect, it, vi } from 'vitest';
import {
	FakeLanceDB,
	FakeQdrantClient,
	fakeArrowSchema,
	mkChunk,
	noSleep,
	TEST_DB_DIR,
	testConfig,
} from '../helpers/fakes';

const resilience = { maxRetries: 1, backoffBaseMs: 0, sleep: noSleep };

function cloudConfig(cloud: Record<string, unknown>) {
	return testConfig({ vectorStore: { backend: 'cloud', cloud } }).vectorStore;
}

describe('createVectorStore', () => {
	it('fails with ConfigurationError before any I/O when cloud credentials are missing', async () => {
		const connectImpl = vi.fn(async () => await Promise.resolve(new FakeQdrantClient()));
		const err = await createVectorStore(cloudConfig({ url: 'http://fake:6333' }), {
			qdrant: { connectImpl },
		}).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(ConfigurationError);
		expect(err instanceof ConfigurationError ? err.issues : []).toEqual([
			'vectorStore.cloud.apiKey (QDRANT_API_KEY)',
		]);
		expect(connectImpl).not.toHaveBeenCalled();
	});

	it('returns a probed cloud adapter', async () => {
		const client = new FakeQdrantClient();
		const store = await createVectorStore(
			cloudConfig({ url: 'http://fake:6333', apiKey: 'test-secret' }),
			{ qdrant: { connectImpl: async () => await Promise.resolve(client) }, resilience }
		);
		expect(store.name).toBe('qdrant');
		expect(store.backend).toBe('cloud');
		expect(client.collections.has('asu_knowledge')).toBe(true);
	});

	it('returns a probed local adapter that can round-trip a chunk', async () => {
		const db = new FakeLanceDB();
		const store = await createVectorStore(testConfig().vectorStore, {
			lancedb: { connectImpl: db.connect, buildArrowSchemaImpl: fakeArrowSchema },
			resilience,
		});
		expect(store.backend).toBe('local');
		await store.upsert([mkChunk('a', [0, 1, 0])]);
		expect((await store.query([0, 1, 0], 1))[0]?.chunkId).toBe('a');
	});

	it('fails with BackendUnavailableError when the probe cannot reach the backend', async () => {
		const client = new FakeQdrantClient();
		client.failures = 10;
		await expect(
			createVectorStore(cloudConfig({ url: 'http://fake:6333', apiKey: 'test-secret' }), {
				qdrant: { connectImpl: async () => await Promise.resolve(client) },
				resilience,
			})
		).rejects.toBeInstanceOf(BackendUnavailableError);
		// one attempt plus one retry
		expect(client.calls).toEqual(['getCollections', 'getCollections']);
	});

	it('fails with BackendUnavailableError when connecting throws', async () => {
		await expect(
			createVectorStore(testConfig().vectorStore, {
				lancedb: {
					connectImpl: async () => await Promise.reject(new Error('disk unavailable')),
					buildArrowSchemaImpl: fakeArrowSchema,
				},
				resilience,
			})
		).rejects.toBeInstanceOf(BackendUnavailableError);
	});
});

describe('describeVectorStore', () => {
	it('describes the local backend without secrets', () => {
		expect(describeVectorStore(testConfig().vectorStore)).toEqual({
			backend: 'local',
			driver: 'lancedb',
			collectionName: 'asu_knowledge',
			embeddingDim: 3,
			distance: 'cosine',
			location: TEST_DB_DIR,
		});
	});

	it('reports whether a cloud api key is configured, never the key', () => {
		const info = describeVectorStore(
			cloudConfig({ url: 'http://fake:6333', apiKey: 'test-secret' })
		);
		expect(info).toEqual({
			backend: 'cloud',
			driver: 'qdrant',
			collectionName: 'asu_knowledge',
			embeddingDim: 3,
			distance: 'cosine',
			location: 'http://fake:6333',
			apiKeyConfigured: true,
		});
	});
});
