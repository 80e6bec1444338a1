export {
	childLogger,
	configureLogging,
	getLogger,
	scrubSecretsFromText,
	setLogLevel,
} from '@obs/logger';
export { HttpRerankProvider, type IRerankProvider } from '@provider/rerank';
export { OpenAIProvider } from '@provider/openai';
export { assembleContext, estimateTokens, formatContext } from '@rag/context';
export {
	batchEmbed,
	type Embedder,
	embedChunks,
	type IngestChunk,
	ProviderEmbedder,
} from '@rag/embeddings';
export {
	BackendUnavailableError,
	ConfigurationError,
	DimensionMismatchError,
	InvalidQueryError,
	isRagError,
	RagError,
	RequestTimeoutError,
	toRagError,
} from '@rag/errors';
export {
	createVectorStore,
	describeVectorStore,
	type VectorStoreDescription,
} from '@rag/factory';
export { LanceDBStore } from '@rag/drivers/lancedb';
export { QdrantStore } from '@rag/drivers/qdrant';
export {
	type MigrateOptions,
	type MigrationResult,
	migrateCollection,
} from '@rag/migrate';
export {
	createRagCore,
	type RagCore,
	type RetrieveContextOptions,
} from '@rag/pipeline';
export {
	CrossEncoderReranker,
	createReranker,
	PassThroughReranker,
	type Reranker,
	type RerankOutcome,
} from '@rag/reranker';
export { createCandidateRetriever } from '@rag/retrieval';
export type * from '@rag/types';
export { resolveConfig } from '@store/config';
export type { RagConfig, RagConfigInput } from '@store/schema';
