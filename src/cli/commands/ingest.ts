/** biome-ignore-all lint/suspicious/noConsole: command output */

import fs from 'node:fs';
import path from 'node:path';
import type { IngestChunk } from '@rag/embeddings';
import { ConfigurationError, InvalidQueryError } from '@rag/errors';
import type { Command } from 'commander';
import { z } from 'zod';
import { type CliContext, using } from '../context';

const IngestChunkZ = z.object({
	id: z.string().min(1),
	text: z.string(),
	sourceUrl: z.string().default(''),
	metadata: z.record(z.unknown()).optional(),
	embedding: z.array(z.number()).optional(),
});

/** One JSON object per line; blank lines are skipped. */
export function parseJsonl(raw: string, file = '<input>'): IngestChunk[] {
	const out: IngestChunk[] = [];
	const lines = raw.split(/\r?\n/);
	for (let i = 0; i < lines.length; i++) {
		const line = lines[i]?.trim();
		if (!line) {
			continue;
		}
		let json: unknown;
		try {
			json = JSON.parse(line);
		} catch {
			throw new InvalidQueryError(`${file}:${i + 1}: not valid JSON`);
		}
		const parsed = IngestChunkZ.safeParse(json);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			throw new InvalidQueryError(
				`${file}:${i + 1}: ${issue ? `${issue.path.join('.') || '(root)'} ${issue.message}` : 'invalid chunk'}`
			);
		}
		out.push(parsed.data);
	}
	return out;
}

export function registerIngestCommand(program: Command, ctx: CliContext) {
	program
		.command('ingest')
		.description(
			'Upsert chunks from a JSONL file ({id, text, sourceUrl, metadata?, embedding?} per line)'
		)
		.argument('<file>', 'path to a .jsonl file')
		.action(async (file: string) => {
			const abs = path.resolve(file);
			if (!fs.existsSync(abs)) {
				throw new ConfigurationError(`File not found: ${abs}`);
			}
			const chunks = parseJsonl(fs.readFileSync(abs, 'utf8'), file);
			if (chunks.length === 0) {
				console.log('Nothing to ingest.');
				return;
			}
			const config = ctx.config();
			const core = await ctx.openCore(config);
			const written = await using(core, (c) => c.ingest(chunks));
			console.log(
				`Ingested ${written} chunk(s) into ${config.vectorStore.collectionName}.`
			);
		});
}
