/** biome-ignore-all lint/suspicious/noConsole: command output */

import { scrubSecretsFromText } from '@obs/logger';
import { isRagError } from '@rag/errors';
import { buildProgram, exitCodeFor } from './program';

try {
	await buildProgram().parseAsync(process.argv);
} catch (err) {
	const message = err instanceof Error ? err.message : String(err);
	const code = isRagError(err) ? `${err.code}: ` : '';
	console.error(scrubSecretsFromText(`${code}${message}`));
	process.exitCode = exitCodeFor(err);
}
