import { resolveConfig } from '@store/config';
import type { RagConfig, VectorStoreConfig } from '@store/schema';
import { createVectorStore } from '@rag/factory';
import { createRagCore, type RagCore } from '@rag/pipeline';
import type { VectorStoreAdapter } from '@rag/types';
import { type Command, InvalidArgumentError } from 'commander';

/** What commands need from the outside world; tests swap in fakes. */
export interface CliContext {
	config(): RagConfig;
	openCore(config: RagConfig): Promise<RagCore>;
	openStore(config: RagConfig, store: VectorStoreConfig): Promise<VectorStoreAdapter>;
}

export function createCliContext(program: Command): CliContext {
	let cached: RagConfig | undefined;
	return {
		config() {
			if (!cached) {
				const { config } = program.opts<{ config?: string }>();
				cached = resolveConfig({ file: config });
			}
			return cached;
		},
		async openCore(config) {
			return await createRagCore(config);
		},
		async openStore(config, store) {
			return await createVectorStore(store, { resilience: config.resilience });
		},
	};
}

/** Runs `fn` and always releases what it opened. */
export async function using<T extends { close(): Promise<void> }, R>(
	resource: T,
	fn: (r: T) => Promise<R>
): Promise<R> {
	try {
		return await fn(resource);
	} finally {
		await resource.close();
	}
}

export function parsePositiveInt(flag: string) {
	return (value: string): number => {
		const n = Number(value);
		if (!Number.isInteger(n) || n < 1) {
			throw new InvalidArgumentError(`${flag} must be a positive integer.`);
		}
		return n;
	};
}
