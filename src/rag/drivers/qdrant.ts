import { createHash } from 'node:crypto';
import { childLogger } from '@obs/logger';
import { ConfigurationError, toRagError } from '@rag/errors';
import { type ResilienceOptions, withRetry } from '@rag/resilience';
import type {
	Candidate,
	CollectionStats,
	DistanceMetric,
	DocumentChunk,
	QueryFilter,
	VectorStoreAdapter,
} from '@rag/types';
import {
	assertTopK,
	assertVector,
	batches,
	normalizeMetadata,
	topKWithTies,
	toStringSafe,
	toVectorSafe,
	validateChunks,
} from './common';

const log = childLogger({ mod: 'rag.qdrant' });

type QdrantDistance = 'Cosine' | 'Dot';

interface QdrantPoint {
	id: string | number;
	score?: number;
	payload?: Record<string, unknown> | null;
	vector?: unknown;
}

type QdrantCondition =
	| { key: string; match: { value: string | number | boolean } }
	| { is_null: { key: string } };

interface QdrantFilter {
	must: QdrantCondition[];
}

/** The subset of QdrantClient this adapter calls; tests inject a fake. */
export interface QdrantClientLike {
	getCollections(): Promise<{ collections: Array<{ name: string }> }>;
	getCollection(name: string): Promise<{
		points_count?: number | null;
		config: { params: { vectors?: unknown } };
	}>;
	createCollection(
		name: string,
		payload: { vectors: { size: number; distance: QdrantDistance } }
	): Promise<unknown>;
	upsert(
		name: string,
		payload: {
			wait: boolean;
			points: Array<{
				id: string;
				vector: number[];
				payload: Record<string, unknown>;
			}>;
		}
	): Promise<unknown>;
	search(
		name: string,
		payload: {
			vector: number[];
			limit: number;
			filter?: QdrantFilter;
			with_payload: boolean;
			with_vector: boolean;
		}
	): Promise<QdrantPoint[]>;
	retrieve(
		name: string,
		payload: { ids: string[]; with_payload: boolean; with_vector: boolean }
	): Promise<QdrantPoint[]>;
	delete(
		name: string,
		payload: { wait: boolean; points: string[] }
	): Promise<unknown>;
	scroll(
		name: string,
		payload: {
			limit: number;
			offset?: string | number;
			with_payload: boolean;
			with_vector: boolean;
		}
	): Promise<{ points: QdrantPoint[]; next_page_offset?: unknown }>;
}

type QdrantClientFactory = (opts: {
	url: string;
	apiKey: string;
	timeoutMs?: number;
}) => Promise<QdrantClientLike>;

export interface QdrantStoreOptions {
	url: string;
	apiKey: string;
	collectionName: string;
	dimension: number;
	distance?: DistanceMetric;
	batchSize?: number;
	resilience?: ResilienceOptions;
	connectImpl?: QdrantClientFactory;
}

const TO_QDRANT: Record<DistanceMetric, QdrantDistance> = {
	cosine: 'Cosine',
	dot: 'Dot',
};

/**
 * Qdrant only accepts unsigned integers or UUIDs as point ids, so the chunk
 * id is hashed into a UUID and kept in the payload as `chunk_id`.
 */
export function pointIdFor(chunkId: string): string {
	const hex = createHash('md5').update(chunkId).digest('hex');
	return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

function buildFilter(filter?: QueryFilter): QdrantFilter | undefined {
	if (!filter || Object.keys(filter).length === 0) {
		return;
	}
	const must: QdrantCondition[] = Object.entries(filter).map(
		([key, value]) => {
			const path = key === 'sourceUrl' ? 'source_url' : `metadata.${key}`;
			return value === null
				? { is_null: { key: path } }
				: { key: path, match: { value } };
		}
	);
	return { must };
}

function readVectorParams(
	vectors: unknown
): { size: number; distance: DistanceMetric } | undefined {
	if (!vectors || typeof vectors !== 'object') {
		return;
	}
	const size = Reflect.get(vectors, 'size');
	const distance = Reflect.get(vectors, 'distance');
	if (typeof size !== 'number') {
		return;
	}
	return { size, distance: distance === 'Dot' ? 'dot' : 'cosine' };
}

function toChunk(p: QdrantPoint): DocumentChunk {
	const payload = p.payload ?? {};
	return {
		id: toStringSafe(payload.chunk_id, String(p.id)),
		text: toStringSafe(payload.text),
		sourceUrl: toStringSafe(payload.source_url),
		metadata: normalizeMetadata(payload.metadata),
		embedding: toVectorSafe(p.vector),
	};
}

export class QdrantStore implements VectorStoreAdapter {
	readonly name = 'qdrant';
	readonly backend = 'cloud' as const;
	readonly dimension: number;
	readonly distance: DistanceMetric;
	private readonly opts: QdrantStoreOptions;
	private readonly batchSize: number;
	private client?: QdrantClientLike;

	constructor(opts: QdrantStoreOptions) {
		if (!(opts.url && opts.apiKey)) {
			throw new ConfigurationError(
				'Qdrant URL and API key are required for the cloud backend'
			);
		}
		this.opts = opts;
		this.dimension = opts.dimension;
		this.distance = opts.distance ?? 'cosine';
		this.batchSize = Math.max(1, opts.batchSize ?? 100);
	}

	get collectionName(): string {
		return this.opts.collectionName;
	}

	async probe(): Promise<void> {
		const client = await this.connect();
		const { collections } = await this.call(() => client.getCollections());
		if (!collections.some((c) => c.name === this.collectionName)) {
			await this.call(() =>
				client.createCollection(this.collectionName, {
					vectors: {
						size: this.dimension,
						distance: TO_QDRANT[this.distance],
					},
				})
			);
			log.info({
				msg: 'collection.created',
				collection: this.collectionName,
				dim: this.dimension,
			});
			return;
		}
		const info = await this.call(() =>
			client.getCollection(this.collectionName)
		);
		const params = readVectorParams(info.config.params.vectors);
		if (params && params.size !== this.dimension) {
			throw new ConfigurationError(
				`Collection ${this.collectionName} has vector size ${params.size}, configured embedding dimension is ${this.dimension}`
			);
		}
	}

	async upsert(chunks: DocumentChunk[]): Promise<number> {
		if (chunks.length === 0) {
			return 0;
		}
		validateChunks(chunks, this.dimension);
		const client = await this.connect();

		let written = 0;
		for (const batch of batches(chunks, this.batchSize)) {
			const points = batch.map((c) => ({
				id: pointIdFor(c.id),
				vector: c.embedding,
				payload: {
					chunk_id: c.id,
					text: c.text,
					source_url: c.sourceUrl,
					metadata: normalizeMetadata(c.metadata),
				},
			}));
			await this.call(() =>
				client.upsert(this.collectionName, { wait: true, points })
			);
			written += points.length;
			log.debug({
				msg: 'upsert.batch',
				collection: this.collectionName,
				size: points.length,
			});
		}
		return written;
	}

	async query(
		vector: number[],
		topK: number,
		filter?: QueryFilter,
		signal?: AbortSignal
	): Promise<Candidate[]> {
		assertTopK(topK);
		assertVector(vector, this.dimension);
		const client = await this.connect();
		const must = buildFilter(filter);

		return await topKWithTies(topK, async (limit) => {
			const res = await this.call(
				() =>
					client.search(this.collectionName, {
						vector,
						limit,
						filter: must,
						with_payload: true,
						with_vector: false,
					}),
				signal
			);
			return res.map((p): Candidate => {
				const chunk = toChunk(p);
				return {
					chunkId: chunk.id,
					text: chunk.text,
					score: typeof p.score === 'number' ? p.score : 0,
					sourceUrl: chunk.sourceUrl,
					metadata: chunk.metadata,
				};
			});
		});
	}

	async stats(): Promise<CollectionStats> {
		const client = await this.connect();
		// One call: count and vector params come from the same snapshot
		const info = await this.call(() =>
			client.getCollection(this.collectionName)
		);
		const params = readVectorParams(info.config.params.vectors);
		return {
			totalDocuments: info.points_count ?? 0,
			collectionName: this.collectionName,
			vectorSize: params?.size ?? this.dimension,
			distanceMetric: params?.distance ?? this.distance,
			backend: this.backend,
		};
	}

	async delete(ids: Iterable<string>): Promise<number> {
		const pointIds = [...new Set(ids)].map(pointIdFor);
		if (pointIds.length === 0) {
			return 0;
		}
		const client = await this.connect();
		const existing = await this.call(() =>
			client.retrieve(this.collectionName, {
				ids: pointIds,
				with_payload: false,
				with_vector: false,
			})
		);
		if (existing.length === 0) {
			return 0;
		}
		await this.call(() =>
			client.delete(this.collectionName, {
				wait: true,
				points: existing.map((p) => String(p.id)),
			})
		);
		return existing.length;
	}

	async *scan(batchSize = this.batchSize): AsyncIterable<DocumentChunk[]> {
		const client = await this.connect();
		let offset: string | number | undefined;
		do {
			const page = await this.call(() =>
				client.scroll(this.collectionName, {
					limit: batchSize,
					offset,
					with_payload: true,
					with_vector: true,
				})
			);
			if (page.points.length > 0) {
				yield page.points.map(toChunk);
			}
			const next = page.next_page_offset;
			offset =
				typeof next === 'string' || typeof next === 'number'
					? next
					: undefined;
		} while (offset !== undefined);
	}

	close(): Promise<void> {
		// stateless REST client
		this.client = undefined;
		return Promise.resolve();
	}

	private call<T>(op: () => Promise<T>, signal?: AbortSignal): Promise<T> {
		return withRetry(
			this.name,
			async () => {
				try {
					return await op();
				} catch (err) {
					throw toRagError(err, this.name);
				}
			},
			{ ...this.opts.resilience, signal }
		);
	}

	private async connect(): Promise<QdrantClientLike> {
		if (!this.client) {
			const mk = this.opts.connectImpl ?? (await this.lazyLoadClient());
			try {
				this.client = await mk({
					url: this.opts.url,
					apiKey: this.opts.apiKey,
					timeoutMs: this.opts.resilience?.timeoutMs,
				});
			} catch (err) {
				throw toRagError(err, this.name);
			}
		}
		return this.client;
	}

	private async lazyLoadClient(): Promise<QdrantClientFactory> {
		// dynamic import to avoid pulling the client unless needed
		const mod = (await import('@qdrant/js-client-rest')) as unknown as {
			QdrantClient: new (args: {
				url: string;
				apiKey?: string;
				timeout?: number;
			}) => QdrantClientLike;
		};
		return async ({ url, apiKey, timeoutMs }) =>
			await Promise.resolve(
				new mod.QdrantClient({ url, apiKey, timeout: timeoutMs })
			);
	}
}
