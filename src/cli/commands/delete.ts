/** biome-ignore-all lint/suspicious/noConsole: command output */

import type { Command } from 'commander';
import { type CliContext, using } from '../context';

export function registerDeleteCommand(program: Command, ctx: CliContext) {
	program
		.command('delete')
		.description('Delete chunks by id (unknown ids are ignored)')
		.argument('<ids...>', 'chunk ids')
		.action(async (ids: string[]) => {
			const config = ctx.config();
			const store = await ctx.openStore(config, config.vectorStore);
			const deleted = await using(store, (s) => s.delete(ids));
			console.log(`Deleted ${deleted} of ${ids.length} chunk(s).`);
		});
}
