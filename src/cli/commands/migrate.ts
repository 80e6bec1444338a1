/** biome-ignore-all lint/suspicious/noConsole: command output */

import { RagError } from '@rag/errors';
import { migrateCollection } from '@rag/migrate';
import { BackendZ } from '@store/schema';
import { type Command, InvalidArgumentError } from 'commander';
import { type CliContext, parsePositiveInt, using } from '../context';

function parseBackend(value: string): 'local' | 'cloud' {
	const parsed = BackendZ.safeParse(value);
	if (!parsed.success) {
		throw new InvalidArgumentError('Expected "local" or "cloud".');
	}
	return parsed.data;
}

export function registerMigrateCommand(program: Command, ctx: CliContext) {
	program
		.command('migrate')
		.description('Copy every chunk of the collection from one backend to another')
		.option('--from <backend>', 'source backend', parseBackend, 'local')
		.option('--to <backend>', 'target backend', parseBackend, 'cloud')
		.option('--batch-size <n>', 'chunks per batch', parsePositiveInt('--batch-size'))
		.action(
			async (opts: {
				from: 'local' | 'cloud';
				to: 'local' | 'cloud';
				batchSize?: number;
			}) => {
				if (opts.from === opts.to) {
					throw new InvalidArgumentError('--from and --to must differ.');
				}
				const config = ctx.config();
				const source = await ctx.openStore(config, {
					...config.vectorStore,
					backend: opts.from,
				});
				const result = await using(source, async (from) => {
					const target = await ctx.openStore(config, {
						...config.vectorStore,
						backend: opts.to,
					});
					return await using(target, (to) =>
						migrateCollection(from, to, {
							batchSize: opts.batchSize ?? config.vectorStore.batchSize,
						})
					);
				});
				console.log(
					`Copied ${result.copied} chunk(s) from ${opts.from} to ${opts.to} (${config.vectorStore.collectionName}).`
				);
				if (!result.verified) {
					throw new RagError(
						'E_BACKEND',
						`Verification failed: ${opts.from} holds ${result.sourceDocuments} document(s), ${opts.to} holds ${result.targetDocuments}.`
					);
				}
				console.log(`Verified: both backends hold ${result.targetDocuments} document(s).`);
			}
		);
}
