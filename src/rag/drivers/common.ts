import { DimensionMismatchError, InvalidQueryError } from '@rag/errors';
import type {
	Candidate,
	ChunkMetadata,
	DocumentChunk,
	MetadataValue,
	QueryFilter,
} from '@rag/types';

/** Score descending, then chunk id ascending. */
export function compareCandidates(a: Candidate, b: Candidate): number {
	const d = b.score - a.score;
	if (d !== 0) {
		return d;
	}
	if (a.chunkId === b.chunkId) {
		return 0;
	}
	return a.chunkId < b.chunkId ? -1 : 1;
}

/**
 * Backends cut their result list before ties are ordered by id, so a tie at
 * the `topK` boundary could drop the lower id. Widens the backend limit until
 * the last fetched score is strictly below the cutoff score or the backend
 * runs out of matches, then orders and truncates.
 */
export async function topKWithTies(
	topK: number,
	fetch: (limit: number) => Promise<Candidate[]>
): Promise<Candidate[]> {
	let limit = topK + 1;
	for (;;) {
		const pool = (await fetch(limit)).sort(compareCandidates);
		const cutoff = pool[topK - 1];
		const last = pool[pool.length - 1];
		if (
			pool.length < limit ||
			!cutoff ||
			!last ||
			last.score < cutoff.score
		) {
			return pool.slice(0, topK);
		}
		limit *= 2;
	}
}

export function assertVector(
	vector: number[],
	dim: number,
	chunkId?: string
): void {
	if (vector.length !== dim) {
		throw new DimensionMismatchError(dim, vector.length, chunkId);
	}
	for (const v of vector) {
		if (!Number.isFinite(v)) {
			throw new InvalidQueryError(
				chunkId
					? `Chunk ${chunkId} has a non-finite vector component`
					: 'Query vector has a non-finite component'
			);
		}
	}
}

export function assertTopK(topK: number): void {
	if (!Number.isInteger(topK) || topK < 1) {
		throw new InvalidQueryError(`topK must be an integer >= 1, got ${topK}`);
	}
}

/**
 * Every chunk is checked before anything is written, so a bad chunk in the
 * middle of a batch leaves the collection as it was.
 */
export function validateChunks(chunks: DocumentChunk[], dim: number): void {
	for (const c of chunks) {
		if (!c.id) {
			throw new InvalidQueryError('Chunk id must be a non-empty string');
		}
		assertVector(c.embedding, dim, c.id);
	}
}

export function* batches<T>(items: T[], size: number): Generator<T[]> {
	const step = Math.max(1, size);
	for (let i = 0; i < items.length; i += step) {
		yield items.slice(i, i + step);
	}
}

/**
 * Metadata is stored as flat scalars: nullish becomes null, arrays and
 * objects are kept as their JSON text.
 */
export function normalizeMetadata(raw: unknown): ChunkMetadata {
	const out: ChunkMetadata = {};
	if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
		return out;
	}
	for (const [k, v] of Object.entries(raw)) {
		out[k] = toScalar(v);
	}
	return out;
}

function toScalar(v: unknown): MetadataValue {
	if (v === null || v === undefined) {
		return null;
	}
	if (typeof v === 'string' || typeof v === 'boolean') {
		return v;
	}
	if (typeof v === 'number') {
		return Number.isFinite(v) ? v : null;
	}
	return JSON.stringify(v);
}

export function matchesFilter(
	c: { sourceUrl: string; metadata: ChunkMetadata },
	filter?: QueryFilter
): boolean {
	if (!filter) {
		return true;
	}
	for (const [key, expected] of Object.entries(filter)) {
		const actual = key === 'sourceUrl' ? c.sourceUrl : c.metadata[key];
		if ((actual ?? null) !== expected) {
			return false;
		}
	}
	return true;
}

export function toStringSafe(v: unknown, fallback = ''): string {
	return typeof v === 'string' ? v : fallback;
}

function isIterable(v: unknown): v is Iterable<unknown> {
	return (
		typeof v === 'object' &&
		v !== null &&
		typeof Reflect.get(v, Symbol.iterator) === 'function'
	);
}

export function toVectorSafe(v: unknown): number[] {
	if (Array.isArray(v)) {
		return v.map((n) => Number(n) || 0);
	}
	// Arrow rows carry vectors as typed arrays or Arrow Vector objects
	if (isIterable(v)) {
		return Array.from(v, (n) => Number(n) || 0);
	}
	return [];
}
