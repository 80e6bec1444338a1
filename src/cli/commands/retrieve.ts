/** biome-ignore-all lint/suspicious/noConsole: command output */

import { formatContext } from '@rag/context';
import type { Command } from 'commander';
import { type CliContext, parsePositiveInt, using } from '../context';

export function registerRetrieveCommand(program: Command, ctx: CliContext) {
	program
		.command('retrieve')
		.description('Retrieve a context bundle for a question')
		.argument('<query>', 'natural-language question')
		.option('-k, --top-k <n>', 'passages to keep', parsePositiveInt('--top-k'))
		.option('--max-size <n>', 'context size budget', parsePositiveInt('--max-size'))
		.option('--source <url>', 'only consider chunks from this source url')
		.option('--rerank', 'rerank with the configured cross-encoder')
		.option('--no-rerank', 'skip reranking')
		.option('--json', 'Output JSON')
		.action(
			async (
				query: string,
				opts: {
					topK?: number;
					maxSize?: number;
					source?: string;
					rerank?: boolean;
					json?: boolean;
				}
			) => {
				const config = ctx.config();
				const core = await ctx.openCore(config);
				const bundle = await using(core, (c) =>
					c.retrieveContext(query, {
						topK: opts.topK,
						maxContextSize: opts.maxSize,
						useReranker: opts.rerank,
						filter: opts.source ? { sourceUrl: opts.source } : undefined,
					})
				);

				if (opts.json) {
					console.log(JSON.stringify(bundle, null, 2));
					return;
				}
				if (bundle.passages.length === 0) {
					console.log('No matching passages.');
					return;
				}
				console.log(formatContext(bundle));
				console.log('');
				console.log(
					`${bundle.passages.length} passage(s), ~${bundle.totalTokensEstimate} tokens, reranked: ${bundle.reranked ? 'yes' : 'no'} (${bundle.rerankStrategy})`
				);
			}
		);
}
