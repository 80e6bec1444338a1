import { childLogger } from '@obs/logger';
import type { ResilienceConfig, VectorStoreConfig } from '@store/schema';
import { defaultLocalIndexDir } from '@util/paths';
import { type LanceDBStoreOptions, LanceDBStore } from './drivers/lancedb';
import { type QdrantStoreOptions, QdrantStore } from './drivers/qdrant';
import { BackendUnavailableError, ConfigurationError } from './errors';
import type { ResilienceOptions } from './resilience';
import type { BackendKind, DistanceMetric, VectorStoreAdapter } from './types';

const log = childLogger({ mod: 'rag.factory' });

export interface VectorStoreDeps {
	cwd?: string;
	resilience?: Partial<ResilienceConfig> & Pick<ResilienceOptions, 'sleep' | 'jitter'>;
	lancedb?: Pick<LanceDBStoreOptions, 'connectImpl' | 'buildArrowSchemaImpl'>;
	qdrant?: Pick<QdrantStoreOptions, 'connectImpl'>;
}

export interface VectorStoreDescription {
	backend: BackendKind;
	driver: 'lancedb' | 'qdrant';
	collectionName: string;
	embeddingDim: number;
	distance: DistanceMetric;
	location: string;
	apiKeyConfigured?: boolean;
}

function resilienceOf(deps: VectorStoreDeps): ResilienceOptions {
	const r = deps.resilience ?? {};
	return {
		timeoutMs: r.timeoutMs,
		maxRetries: r.maxRetries,
		backoffBaseMs: r.backoffBaseMs,
		jitter: r.jitter,
		sleep: r.sleep,
	};
}

/** Fails before any I/O when the selected backend lacks its connection parameters. */
export function assertConnectionConfig(config: VectorStoreConfig): void {
	if (config.backend === 'cloud') {
		const missing: string[] = [];
		if (!config.cloud.url) {
			missing.push('vectorStore.cloud.url (QDRANT_URL)');
		}
		if (!config.cloud.apiKey) {
			missing.push('vectorStore.cloud.apiKey (QDRANT_API_KEY)');
		}
		if (missing.length) {
			throw new ConfigurationError(
				'Cloud vector store is missing connection parameters',
				missing
			);
		}
		return;
	}
	if (config.local.path !== undefined && config.local.path.trim() === '') {
		throw new ConfigurationError(
			'Local vector store path must not be empty (vectorStore.local.path)'
		);
	}
}

function construct(
	config: VectorStoreConfig,
	deps: VectorStoreDeps
): VectorStoreAdapter {
	const common = {
		collectionName: config.collectionName,
		dimension: config.embeddingDim,
		distance: config.distance,
		batchSize: config.batchSize,
		resilience: resilienceOf(deps),
	};
	if (config.backend === 'cloud') {
		return new QdrantStore({
			...common,
			url: config.cloud.url ?? '',
			apiKey: config.cloud.apiKey ?? '',
			connectImpl: deps.qdrant?.connectImpl,
		});
	}
	return new LanceDBStore({
		...common,
		path: config.local.path ?? defaultLocalIndexDir(deps.cwd),
		connectImpl: deps.lancedb?.connectImpl,
		buildArrowSchemaImpl: deps.lancedb?.buildArrowSchemaImpl,
	});
}

/**
 * Builds the configured adapter and probes it once. The adapter is only
 * returned once the probe succeeded; otherwise it is closed and the failure
 * is rethrown as ConfigurationError or BackendUnavailableError.
 */
export async function createVectorStore(
	config: VectorStoreConfig,
	deps: VectorStoreDeps = {}
): Promise<VectorStoreAdapter> {
	assertConnectionConfig(config);
	const store = construct(config, deps);
	try {
		await store.probe();
	} catch (err) {
		await store.close();
		log.error({
			msg: 'probe.failed',
			backend: config.backend,
			collection: config.collectionName,
			error: err instanceof Error ? err.message : String(err),
		});
		if (err instanceof ConfigurationError) {
			throw err;
		}
		if (err instanceof BackendUnavailableError) {
			throw err;
		}
		throw new BackendUnavailableError(
			store.name,
			`probe failed: ${err instanceof Error ? err.message : String(err)}`,
			err
		);
	}
	log.info({
		msg: 'store.ready',
		backend: config.backend,
		driver: store.name,
		collection: config.collectionName,
	});
	return store;
}

export function describeVectorStore(
	config: VectorStoreConfig,
	cwd?: string
): VectorStoreDescription {
	const base = {
		collectionName: config.collectionName,
		embeddingDim: config.embeddingDim,
		distance: config.distance,
	};
	if (config.backend === 'cloud') {
		return {
			...base,
			backend: 'cloud',
			driver: 'qdrant',
			location: config.cloud.url ?? '(unset)',
			apiKeyConfigured: Boolean(config.cloud.apiKey),
		};
	}
	return {
		...base,
		backend: 'local',
		driver: 'lancedb',
		location: config.local.path ?? defaultLocalIndexDir(cwd),
	};
}
