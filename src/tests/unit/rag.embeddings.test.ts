import type { IProvider } from '@provider/types';
import { ProviderError } from '@provider/types';
import { batchEmbed, embedChunks, ProviderEmbedder } from '@rag/embeddings';
import {
	BackendUnavailableError,
	ConfigurationError,
	DimensionMismatchError,
} from '@rag/errors';
import { describe, expect, it } from 'vitest';
import { fastResilience, KeywordEmbedder } from '../helpers/fakes';

class MockProvider implements IProvider {
	readonly name = 'openai' as const;
	calls = 0;
	batches: string[][] = [];
	models: Array<string | undefined> = [];
	/** Errors thrown by the next calls, in order. */
	failures: Error[] = [];
	width = 3;

	async embed(texts: string[], model?: string): Promise<number[][]> {
		this.calls++;
		this.batches.push(texts);
		this.models.push(model);
		const failure = this.failures.shift();
		if (failure) {
			throw failure;
		}
		// Deterministic vectors: [len, len+1, len+2]
		return await Promise.resolve(
			texts.map((t) => Array.from({ length: this.width }, (_, i) => t.length + i))
		);
	}
}

describe('batchEmbed', () => {
	it('splits into batches and preserves input order', async () => {
		const provider = new MockProvider();
		const out = await batchEmbed({
			provider,
			model: 'text-embedding-3-small',
			texts: ['a', 'bb', 'ccc'],
			batchSize: 2,
			resilience: fastResilience,
		});
		expect(provider.batches).toEqual([['a', 'bb'], ['ccc']]);
		expect(provider.models).toEqual(['text-embedding-3-small', 'text-embedding-3-small']);
		expect(out).toEqual([
			[1, 2, 3],
			[2, 3, 4],
			[3, 4, 5],
		]);
	});

	it('retries a transient provider failure', async () => {
		const provider = new MockProvider();
		provider.failures = [new ProviderError('E_PROVIDER', 'OpenAI API error: 503')];
		const out = await batchEmbed({
			provider,
			model: 'm',
			texts: ['x'],
			resilience: fastResilience,
		});
		expect(out).toEqual([[1, 2, 3]]);
		expect(provider.calls).toBe(2);
	});

	it('gives up with BackendUnavailableError after the retry budget', async () => {
		const provider = new MockProvider();
		provider.failures = [new Error('a'), new Error('b'), new Error('c')];
		await expect(
			batchEmbed({ provider, model: 'm', texts: ['x'], resilience: fastResilience })
		).rejects.toBeInstanceOf(BackendUnavailableError);
		expect(provider.calls).toBe(3);
	});

	it('turns rejected credentials into a configuration error without retrying', async () => {
		const provider = new MockProvider();
		provider.failures = [new ProviderError('E_AUTH', 'Invalid API key', { status: 401 })];
		await expect(
			batchEmbed({ provider, model: 'm', texts: ['x'], resilience: fastResilience })
		).rejects.toBeInstanceOf(ConfigurationError);
		expect(provider.calls).toBe(1);
	});
});

describe('ProviderEmbedder', () => {
	it('returns nothing for no input without calling the provider', async () => {
		const provider = new MockProvider();
		const embedder = new ProviderEmbedder(provider, { model: 'm', dimension: 3 });
		expect(await embedder.embed([])).toEqual([]);
		expect(provider.calls).toBe(0);
	});

	it('rejects vectors of the wrong dimension', async () => {
		const provider = new MockProvider();
		provider.width = 4;
		const embedder = new ProviderEmbedder(provider, {
			model: 'm',
			dimension: 3,
			resilience: fastResilience,
		});
		await expect(embedder.embed(['x'])).rejects.toBeInstanceOf(DimensionMismatchError);
	});
});

describe('embedChunks', () => {
	it('embeds only chunks that arrive without a vector', async () => {
		const embedder = new KeywordEmbedder(['asu', 'mascot']);
		const docs = await embedChunks(embedder, [
			{ id: 'a', text: 'ASU mascot', sourceUrl: 'https://asu.edu/a' },
			{ id: 'b', text: 'ignored', sourceUrl: '', embedding: [9, 9] },
			{
				id: 'c',
				text: 'mascot mascot',
				sourceUrl: 'https://asu.edu/c',
				metadata: { year: 2024 },
			},
		]);
		expect(embedder.texts).toEqual(['ASU mascot', 'mascot mascot']);
		expect(docs.map((d) => d.embedding)).toEqual([
			[1, 1],
			[9, 9],
			[0, 2],
		]);
		expect(docs[2]).toMatchObject({ id: 'c', metadata: { year: 2024 } });
		expect(docs[0]?.metadata).toEqual({});
	});
});
