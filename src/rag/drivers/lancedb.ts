import fs from 'node:fs';
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
import { defaultLocalIndexDir } from '@util/paths';
import {
	assertTopK,
	assertVector,
	batches,
	compareCandidates,
	matchesFilter,
	normalizeMetadata,
	topKWithTies,
	toStringSafe,
	toVectorSafe,
	validateChunks,
} from './common';

const log = childLogger({ mod: 'rag.lancedb' });

// The subset of the LanceDB API this adapter calls; tests inject a fake
export type LanceDBConnect = (uri: string) => Promise<LanceDB>;
export interface LanceDB {
	tableNames(): Promise<string[]>;
	openTable(name: string): Promise<LanceTable>;
	createEmptyTable(
		name: string,
		schema: unknown,
		opts?: { mode?: 'create' | 'overwrite'; existOk?: boolean }
	): Promise<LanceTable>;
	close?(): void;
}
export interface MergeInsertBuilder {
	whenMatchedUpdateAll(): MergeInsertBuilder;
	whenNotMatchedInsertAll(): MergeInsertBuilder;
	execute(data: LanceRow[]): Promise<unknown>;
}
export interface LanceQuery {
	where(predicate: string): LanceQuery;
	limit(k: number): LanceQuery;
	toArray(): Promise<unknown[]>;
}
export interface LanceVectorQuery extends LanceQuery {
	distanceType(type: DistanceMetric): LanceVectorQuery;
}
export interface LanceTable {
	mergeInsert(on: string): MergeInsertBuilder;
	vectorSearch(vector: number[]): LanceVectorQuery;
	query(): LanceQuery;
	countRows(filter?: string): Promise<number>;
	delete(predicate: string): Promise<unknown>;
	schema(): Promise<unknown>;
	close?(): void;
}

export type LanceRow = {
	id: string;
	vector: number[];
	text: string;
	source_url: string;
	metadata: string;
};

export interface LanceDBStoreOptions {
	path?: string; // directory to hold the LanceDB database
	collectionName: string; // table name
	dimension: number;
	distance?: DistanceMetric;
	batchSize?: number;
	resilience?: ResilienceOptions;
	// for testing; lets us inject a fake connect()
	connectImpl?: LanceDBConnect;
	// for testing; avoid arrow import
	buildArrowSchemaImpl?: (dim: number) => unknown;
}

function escapeSql(s: string): string {
	return s.replace(/'/g, "''");
}

function parseMetadata(raw: unknown): DocumentChunk['metadata'] {
	if (typeof raw !== 'string' || raw === '') {
		return {};
	}
	try {
		return normalizeMetadata(JSON.parse(raw));
	} catch {
		log.warn({ msg: 'metadata.unparseable', raw: raw.slice(0, 80) });
		return {};
	}
}

function toRow(c: DocumentChunk): LanceRow {
	return {
		id: c.id,
		vector: c.embedding,
		text: c.text,
		source_url: c.sourceUrl,
		metadata: JSON.stringify(normalizeMetadata(c.metadata)),
	};
}

function toChunk(r: Record<string, unknown>): DocumentChunk {
	return {
		id: toStringSafe(r.id),
		text: toStringSafe(r.text),
		sourceUrl: toStringSafe(r.source_url),
		metadata: parseMetadata(r.metadata),
		embedding: toVectorSafe(r.vector),
	};
}

function isRecord(v: unknown): v is Record<string, unknown> {
	return !!v && typeof v === 'object' && !Array.isArray(v);
}

/** Reads the FixedSizeList length of the `vector` column from an Arrow schema. */
function vectorSizeOf(schema: unknown): number | undefined {
	if (!isRecord(schema) || !Array.isArray(schema.fields)) {
		return;
	}
	for (const field of schema.fields) {
		if (isRecord(field) && field.name === 'vector' && isRecord(field.type)) {
			const size = field.type.listSize;
			return typeof size === 'number' ? size : undefined;
		}
	}
	return;
}

/**
 * SQL pushdown covers `sourceUrl`; metadata lives in a JSON text column and
 * is matched in process.
 */
function splitFilter(filter?: QueryFilter): {
	where?: string;
	rest?: QueryFilter;
} {
	if (!filter) {
		return {};
	}
	const rest: QueryFilter = {};
	let where: string | undefined;
	for (const [k, v] of Object.entries(filter)) {
		if (k === 'sourceUrl' && typeof v === 'string') {
			where = `source_url = '${escapeSql(v)}'`;
		} else {
			rest[k] = v;
		}
	}
	return { where, rest: Object.keys(rest).length ? rest : undefined };
}

export class LanceDBStore implements VectorStoreAdapter {
	readonly name = 'lancedb';
	readonly backend = 'local' as const;
	readonly dimension: number;
	readonly distance: DistanceMetric;
	private readonly opts: LanceDBStoreOptions;
	private readonly dir: string;
	private readonly batchSize: number;
	private db?: LanceDB;
	private table?: LanceTable;

	constructor(opts: LanceDBStoreOptions) {
		if (opts.path !== undefined && opts.path.trim() === '') {
			throw new ConfigurationError(
				'Local vector store path must not be empty'
			);
		}
		this.opts = opts;
		this.dir = opts.path ?? defaultLocalIndexDir();
		this.dimension = opts.dimension;
		this.distance = opts.distance ?? 'cosine';
		this.batchSize = Math.max(1, opts.batchSize ?? 100);
	}

	get collectionName(): string {
		return this.opts.collectionName;
	}

	get path(): string {
		return this.dir;
	}

	async probe(): Promise<void> {
		const table = await this.init();
		const size = vectorSizeOf(await this.call(() => table.schema()));
		if (size !== undefined && size !== this.dimension) {
			throw new ConfigurationError(
				`Table ${this.collectionName} has vector size ${size}, configured embedding dimension is ${this.dimension}`
			);
		}
	}

	async upsert(chunks: DocumentChunk[]): Promise<number> {
		if (chunks.length === 0) {
			return 0;
		}
		validateChunks(chunks, this.dimension);
		const table = await this.init();

		let written = 0;
		for (const batch of batches(chunks, this.batchSize)) {
			const rows = batch.map(toRow);
			await this.call(() =>
				table
					.mergeInsert('id')
					.whenMatchedUpdateAll()
					.whenNotMatchedInsertAll()
					.execute(rows)
			);
			written += rows.length;
			log.debug({
				msg: 'upsert.batch',
				table: this.collectionName,
				size: rows.length,
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
		const table = await this.init();
		const { where, rest } = splitFilter(filter);

		const search = async (limit: number): Promise<Candidate[]> => {
			const rows = await this.call(() => {
				let q = table
					.vectorSearch(vector)
					.distanceType(this.distance)
					.limit(limit);
				if (where) {
					q = q.where(where);
				}
				return q.toArray();
			}, signal);
			return rows.filter(isRecord).map((r): Candidate => {
				const chunk = toChunk(r);
				const distance = typeof r._distance === 'number' ? r._distance : 1;
				return {
					chunkId: chunk.id,
					text: chunk.text,
					// cosine and dot distances are both reported as 1 - similarity
					score: 1 - distance,
					sourceUrl: chunk.sourceUrl,
					metadata: chunk.metadata,
				};
			});
		};

		if (!rest) {
			return await topKWithTies(topK, search);
		}
		// In-process filtering needs the whole scored pool, not just topK
		const total = await this.call(() => table.countRows(where), signal);
		const pool = await search(Math.max(topK, total));
		return pool
			.filter((c) => matchesFilter(c, rest))
			.sort(compareCandidates)
			.slice(0, topK);
	}

	async stats(): Promise<CollectionStats> {
		const table = await this.init();
		return {
			totalDocuments: await this.call(() => table.countRows()),
			collectionName: this.collectionName,
			vectorSize: this.dimension,
			distanceMetric: this.distance,
			backend: this.backend,
		};
	}

	async delete(ids: Iterable<string>): Promise<number> {
		const unique = [...new Set(ids)];
		if (unique.length === 0) {
			return 0;
		}
		const table = await this.init();
		const predicate = `id IN (${unique.map((s) => `'${escapeSql(s)}'`).join(',')})`;
		const present = await this.call(() => table.countRows(predicate));
		if (present === 0) {
			return 0;
		}
		await this.call(() => table.delete(predicate));
		return present;
	}

	async *scan(batchSize = this.batchSize): AsyncIterable<DocumentChunk[]> {
		const table = await this.init();
		const total = await this.call(() => table.countRows());
		if (total === 0) {
			return;
		}
		const rows = await this.call(() => table.query().limit(total).toArray());
		const chunks = rows.filter(isRecord).map(toChunk);
		for (const batch of batches(chunks, batchSize)) {
			yield batch;
		}
	}

	close(): Promise<void> {
		this.table?.close?.();
		this.db?.close?.();
		this.table = undefined;
		this.db = undefined;
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

	private async init(): Promise<LanceTable> {
		if (this.table) {
			return this.table;
		}
		try {
			if (!this.db) {
				if (!fs.existsSync(this.dir)) {
					fs.mkdirSync(this.dir, { recursive: true });
				}
				const connect: LanceDBConnect =
					this.opts.connectImpl ?? (await this.lazyLoadConnect());
				this.db = await connect(this.dir);
			}
			this.table = await this.openOrCreateTable(this.db);
			return this.table;
		} catch (err) {
			throw toRagError(err, this.name);
		}
	}

	private async openOrCreateTable(db: LanceDB): Promise<LanceTable> {
		const names = await db.tableNames();
		if (names.includes(this.collectionName)) {
			return await db.openTable(this.collectionName);
		}
		// Vector column must be FixedSizeList(Float32) of the collection dimension
		const buildSchema =
			this.opts.buildArrowSchemaImpl ?? (await this.lazyBuildArrowSchema());
		const table = await db.createEmptyTable(
			this.collectionName,
			buildSchema(this.dimension),
			{ mode: 'create', existOk: true }
		);
		log.info({
			msg: 'table.created',
			table: this.collectionName,
			dim: this.dimension,
			dir: this.dir,
		});
		return table;
	}

	private async lazyLoadConnect(): Promise<LanceDBConnect> {
		// dynamic import to keep runtime light unless the driver is used
		return (await import('@lancedb/lancedb')).connect as unknown as LanceDBConnect;
	}

	private async lazyBuildArrowSchema(): Promise<(dim: number) => unknown> {
		const { Schema, Field, FixedSizeList, Float32, Utf8 } = await import(
			'apache-arrow'
		);
		return (dim: number) =>
			new Schema([
				new Field('id', new Utf8(), false),
				new Field(
					'vector',
					new FixedSizeList(dim, new Field('item', new Float32(), true)),
					false
				),
				new Field('text', new Utf8(), false),
				new Field('source_url', new Utf8(), false),
				new Field('metadata', new Utf8(), false),
			]);
	}
}
