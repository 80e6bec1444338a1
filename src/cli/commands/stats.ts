/** biome-ignore-all lint/suspicious/noConsole: command output */

import { describeVectorStore } from '@rag/factory';
import type { Command } from 'commander';
import { type CliContext, using } from '../context';

export function registerStatsCommand(program: Command, ctx: CliContext) {
	program
		.command('stats')
		.description('Show statistics of the configured collection')
		.option('--json', 'Output JSON')
		.action(async (opts: { json?: boolean }) => {
			const config = ctx.config();
			const store = await ctx.openStore(config, config.vectorStore);
			const stats = await using(store, (s) => s.stats());
			const info = describeVectorStore(config.vectorStore);

			if (opts.json) {
				console.log(JSON.stringify({ stats, store: info }, null, 2));
				return;
			}
			console.log(`Collection: ${stats.collectionName}`);
			console.log(`Backend: ${stats.backend} (${info.driver} @ ${info.location})`);
			console.log(`Documents: ${stats.totalDocuments}`);
			console.log(`Vector size: ${stats.vectorSize}`);
			console.log(`Distance: ${stats.distanceMetric}`);
		});
}
