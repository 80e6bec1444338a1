import { childLogger } from '@obs/logger';
import { type IProvider, isProviderError } from '@provider/types';
import {
	BackendUnavailableError,
	ConfigurationError,
	DimensionMismatchError,
	isRagError,
	type RagError,
} from './errors';
import { type ResilienceOptions, withRetry } from './resilience';
import { normalizeMetadata } from './drivers/common';
import type { DocumentChunk } from './types';

const log = childLogger({ mod: 'rag.embeddings' });

/** Maps text to vectors of a fixed dimension. */
export interface Embedder {
	readonly model: string;
	readonly dimension: number;
	embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/** A chunk as handed in by ingestion; the embedding may still be missing. */
export interface IngestChunk {
	id: string;
	text: string;
	sourceUrl: string;
	metadata?: Record<string, unknown>;
	embedding?: number[];
}

export interface BatchEmbedOptions {
	provider: IProvider;
	model: string;
	texts: string[];
	batchSize?: number;
	resilience?: ResilienceOptions;
	signal?: AbortSignal;
}

function toEmbeddingError(err: unknown): RagError {
	if (isRagError(err)) {
		return err;
	}
	if (isProviderError(err)) {
		if (err.code === 'E_AUTH') {
			return new ConfigurationError(
				`Embedding provider rejected credentials: ${err.message}`,
				[],
				err
			);
		}
		return new BackendUnavailableError('embeddings', err.message, err);
	}
	return new BackendUnavailableError(
		'embeddings',
		err instanceof Error ? err.message : String(err),
		err
	);
}

/**
 * Embeds `texts` in provider-sized batches, preserving input order. Each batch
 * gets its own timeout and backoff; a failed batch fails the whole call.
 */
export async function batchEmbed(opts: BatchEmbedOptions): Promise<number[][]> {
	const { provider, model, texts, batchSize = 64, resilience, signal } = opts;
	const out: number[][] = [];

	for (let i = 0; i < texts.length; i += batchSize) {
		const slice = texts.slice(i, i + batchSize);
		const vectors = await withRetry(
			'embeddings',
			async (timeoutSignal) => {
				try {
					return await provider.embed(slice, model, timeoutSignal);
				} catch (err) {
					throw toEmbeddingError(err);
				}
			},
			{ ...resilience, signal }
		);
		if (vectors.length !== slice.length) {
			throw new BackendUnavailableError(
				'embeddings',
				`expected ${slice.length} vectors, got ${vectors.length}`
			);
		}
		out.push(...vectors);
	}
	return out;
}

export interface ProviderEmbedderOptions {
	model: string;
	dimension: number;
	batchSize?: number;
	resilience?: ResilienceOptions;
}

export class ProviderEmbedder implements Embedder {
	readonly model: string;
	readonly dimension: number;
	private readonly provider: IProvider;
	private readonly batchSize: number;
	private readonly resilience?: ResilienceOptions;

	constructor(provider: IProvider, opts: ProviderEmbedderOptions) {
		this.provider = provider;
		this.model = opts.model;
		this.dimension = opts.dimension;
		this.batchSize = Math.max(1, opts.batchSize ?? 64);
		this.resilience = opts.resilience;
	}

	async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}
		const vectors = await batchEmbed({
			provider: this.provider,
			model: this.model,
			texts,
			batchSize: this.batchSize,
			resilience: this.resilience,
			signal,
		});
		// A model/dimension mismatch would poison the collection
		for (const v of vectors) {
			if (v.length !== this.dimension) {
				throw new DimensionMismatchError(this.dimension, v.length);
			}
		}
		return vectors;
	}
}

/**
 * Completes ingestion input into DocumentChunks, embedding only the chunks
 * that arrive without a vector.
 */
export async function embedChunks(
	embedder: Embedder,
	chunks: IngestChunk[]
): Promise<DocumentChunk[]> {
	const missing = chunks.filter((c) => !c.embedding);
	const vectors = await embedder.embed(missing.map((c) => c.text));
	const vectorFor = new Map<IngestChunk, number[]>();
	missing.forEach((c, i) => {
		vectorFor.set(c, vectors[i] ?? []);
	});
	if (missing.length) {
		log.info({
			msg: 'embed.chunks',
			model: embedder.model,
			embedded: missing.length,
			provided: chunks.length - missing.length,
		});
	}
	return chunks.map((c) => ({
		id: c.id,
		text: c.text,
		sourceUrl: c.sourceUrl,
		metadata: normalizeMetadata(c.metadata),
		embedding: c.embedding ?? vectorFor.get(c) ?? [],
	}));
}
