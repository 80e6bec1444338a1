export type MetadataValue = string | number | boolean | null;
export type ChunkMetadata = Record<string, MetadataValue>;

export type DistanceMetric = 'cosine' | 'dot';
export type BackendKind = 'local' | 'cloud';

export interface DocumentChunk {
	id: string; // stable, content-derived
	text: string;
	sourceUrl: string;
	metadata: ChunkMetadata;
	embedding: number[];
}

export interface Candidate {
	chunkId: string;
	text: string;
	/** Ranking score: similarity from retrieval, replaced by the rerank score when reranking ran. */
	score: number;
	sourceUrl: string;
	metadata: ChunkMetadata;
	/** Similarity score from the vector store, kept once a reranker rescored the candidate. */
	retrievalScore?: number;
	rerankScore?: number;
}

/** Equality match on `sourceUrl` or a metadata key. */
export type QueryFilter = Record<string, MetadataValue>;

export interface CollectionStats {
	totalDocuments: number;
	collectionName: string;
	vectorSize: number;
	distanceMetric: DistanceMetric;
	backend: BackendKind;
}

export interface VectorStoreAdapter {
	readonly name: string;
	readonly backend: BackendKind;
	readonly dimension: number;
	readonly distance: DistanceMetric;
	/** Lightweight connectivity check; creates the collection when missing. */
	probe(): Promise<void>;
	upsert(chunks: DocumentChunk[]): Promise<number>;
	/** Aborting `signal` stops retries and in-flight calls. */
	query(
		vector: number[],
		topK: number,
		filter?: QueryFilter,
		signal?: AbortSignal
	): Promise<Candidate[]>;
	stats(): Promise<CollectionStats>;
	delete(ids: Iterable<string>): Promise<number>;
	/** Pages through every stored chunk, vectors included. */
	scan(batchSize?: number): AsyncIterable<DocumentChunk[]>;
	close(): Promise<void>;
}

export interface Citation {
	index: number; // 1-based position in the bundle
	sourceUrl: string;
	chunkId: string;
}

export interface ContextPassage extends Candidate {
	citation: Citation;
}

export type RerankStrategy = 'cross-encoder' | 'pass-through';

export interface ContextBundle {
	passages: ContextPassage[];
	totalTokensEstimate: number;
	/** True only when the cross-encoder actually rescored the pool. */
	reranked: boolean;
	rerankStrategy: RerankStrategy;
	citations: string[];
}
