/** biome-ignore-all lint/suspicious/noConsole: command output */

import { configureLogging, isLogLevel, setLogLevel } from '@obs/logger';
import { isRagError } from '@rag/errors';
import { formatBuildInfo, VERSION } from '@util/build-info';
import { Command } from 'commander';
import { registerDeleteCommand } from './commands/delete';
import { registerIngestCommand } from './commands/ingest';
import { registerMigrateCommand } from './commands/migrate';
import { registerRetrieveCommand } from './commands/retrieve';
import { registerStatsCommand } from './commands/stats';
import { type CliContext, createCliContext } from './context';

export function buildProgram(ctx?: CliContext): Command {
	const program = new Command();
	program
		.name('campus-rag')
		.description('Retrieve grounded context passages from the campus knowledge base')
		.version(VERSION ?? '0.0.0')
		.option('-l, --log-level <level>', 'log level (debug|info|warn|error)')
		.option('-c, --config <file>', 'config file (YAML or JSON)');

	const context = ctx ?? createCliContext(program);

	// --log-level wins over the configured level
	program.hook('preAction', (thisCmd, actionCmd) => {
		const { logLevel } = thisCmd.opts<{ logLevel?: string }>();
		if (isLogLevel(logLevel)) {
			setLogLevel(logLevel);
		} else if (actionCmd.name() !== 'version') {
			configureLogging(context.config().logging);
		}
	});

	program
		.command('version')
		.description('Show detailed version and build information')
		.action(() => {
			console.log(formatBuildInfo());
		});

	registerStatsCommand(program, context);
	registerRetrieveCommand(program, context);
	registerIngestCommand(program, context);
	registerMigrateCommand(program, context);
	registerDeleteCommand(program, context);
	return program;
}

/** Exit code 2 for configuration problems, 1 for everything else. */
export function exitCodeFor(err: unknown): number {
	return isRagError(err) && err.code === 'E_CONFIG' ? 2 : 1;
}
