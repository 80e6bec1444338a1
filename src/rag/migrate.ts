import { childLogger } from '@obs/logger';
import { ConfigurationError } from './errors';
import type { VectorStoreAdapter } from './types';

const log = childLogger({ mod: 'rag.migrate' });

export interface MigrateOptions {
	batchSize?: number;
	onProgress?: (copied: number) => void;
}

export interface MigrationResult {
	copied: number;
	sourceDocuments: number;
	targetDocuments: number;
	/** Both stores report the same document count after the copy. */
	verified: boolean;
}

/**
 * Copies every chunk, vectors included, from one store into another.
 * Upserts are idempotent by id, so an interrupted run can simply be repeated.
 * A target that already held other chunks fails verification.
 */
export async function migrateCollection(
	from: VectorStoreAdapter,
	to: VectorStoreAdapter,
	opts: MigrateOptions = {}
): Promise<MigrationResult> {
	if (from.dimension !== to.dimension) {
		throw new ConfigurationError(
			`Cannot migrate between dimensions ${from.dimension} and ${to.dimension}`
		);
	}
	const batchSize = Math.max(1, opts.batchSize ?? 100);
	let copied = 0;
	for await (const batch of from.scan(batchSize)) {
		copied += await to.upsert(batch);
		opts.onProgress?.(copied);
		log.debug({ msg: 'migrate.batch', size: batch.length, copied });
	}
	const [source, target] = await Promise.all([from.stats(), to.stats()]);
	const result: MigrationResult = {
		copied,
		sourceDocuments: source.totalDocuments,
		targetDocuments: target.totalDocuments,
		verified: source.totalDocuments === target.totalDocuments,
	};
	if (!result.verified) {
		log.warn({ msg: 'migrate.verify', from: from.name, to: to.name, ...result });
	}
	log.info({
		msg: 'migrate.done',
		from: from.name,
		to: to.name,
		copied,
		verified: result.verified,
	});
	return result;
}
