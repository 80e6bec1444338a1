import { z } from 'zod';

export const LogLevelZ = z.enum(['debug', 'info', 'warn', 'error']);
export const BackendZ = z.enum(['local', 'cloud']);
export const DistanceZ = z.enum(['cosine', 'dot']);
export const RerankStrategyZ = z.enum(['cross-encoder', 'pass-through']);

export const VectorStoreConfigZ = z.object({
	backend: BackendZ.default('local'),
	collectionName: z.string().min(1).default('asu_knowledge'),
	embeddingDim: z.number().int().positive().default(1536),
	distance: DistanceZ.default('cosine'),
	batchSize: z.number().int().min(1).max(1000).default(100),
	local: z
		.object({
			path: z.string().min(1).optional(),
		})
		.default({}),
	cloud: z
		.object({
			url: z.string().url().optional(),
			apiKey: z.string().optional(),
		})
		.default({}),
});

export const EmbeddingConfigZ = z.object({
	model: z.string().min(1).default('text-embedding-3-small'),
	apiKey: z.string().optional(),
	batchSize: z.number().int().positive().default(64),
});

export const RerankerConfigZ = z.object({
	strategy: RerankStrategyZ.default('pass-through'),
	url: z.string().url().optional(),
	apiKey: z.string().optional(),
	model: z.string().min(1).default('rerank-english-v3.0'),
});

export const RetrievalConfigZ = z.object({
	topK: z.number().int().positive().default(3),
	overFetchFactor: z.number().int().min(1).max(20).default(4),
	maxContextSize: z.number().int().positive().default(6000),
	budgetUnit: z.enum(['chars', 'tokens']).default('chars'),
	useReranker: z.boolean().default(true),
});

export const ResilienceConfigZ = z.object({
	timeoutMs: z.number().int().positive().default(10_000),
	maxRetries: z.number().int().min(0).max(10).default(2),
	backoffBaseMs: z.number().int().min(0).default(200),
	requestTimeoutMs: z.number().int().positive().default(30_000),
});

export const ConfigZ = z.object({
	vectorStore: VectorStoreConfigZ.default({}),
	embedding: EmbeddingConfigZ.default({}),
	reranker: RerankerConfigZ.default({}),
	retrieval: RetrievalConfigZ.default({}),
	resilience: ResilienceConfigZ.default({}),
	logging: z.object({ level: LogLevelZ.default('info') }).default({}),
});

export type RagConfig = z.infer<typeof ConfigZ>;
export type RagConfigInput = z.input<typeof ConfigZ>;
export type VectorStoreConfig = RagConfig['vectorStore'];
export type RerankerConfig = RagConfig['reranker'];
export type ResilienceConfig = RagConfig['resilience'];

export function explainZodError(e: unknown) {
	if (!(e instanceof z.ZodError)) {
		return [];
	}
	return e.issues.map((err) => ({
		path: err.path.join('.'),
		message: err.message,
		code: err.code,
	}));
}
