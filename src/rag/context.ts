import { InvalidQueryError } from './errors';
import type {
	Candidate,
	ContextBundle,
	ContextPassage,
	RerankStrategy,
} from './types';

export type BudgetUnit = 'chars' | 'tokens';

export interface AssembleOptions {
	maxContextSize: number;
	unit?: BudgetUnit;
	reranked?: boolean;
	rerankStrategy?: RerankStrategy;
}

/**
 * Simple, deterministic token estimator: ~4 bytes per token.
 */
export function estimateTokens(text: string): number {
	return Math.ceil(Buffer.byteLength(text, 'utf8') / 4);
}

function sizeOf(text: string, unit: BudgetUnit): number {
	return unit === 'tokens' ? estimateTokens(text) : text.length;
}

// Chunks without a source url are never merged with each other
function sourceKey(c: Candidate): string {
	return c.sourceUrl ? `url:${c.sourceUrl}` : `chunk:${c.chunkId}`;
}

function better(a: Candidate, b: Candidate): boolean {
	if (a.score !== b.score) {
		return a.score > b.score;
	}
	return a.chunkId < b.chunkId;
}

/** Keeps the best chunk per source, in first-seen order of the source. */
export function dedupeBySource(candidates: Candidate[]): Candidate[] {
	const best = new Map<string, Candidate>();
	for (const c of candidates) {
		const k = sourceKey(c);
		const existing = best.get(k);
		if (!existing || better(c, existing)) {
			best.set(k, c);
		}
	}
	return Array.from(best.values());
}

export function assembleContext(
	candidates: Candidate[],
	opts: AssembleOptions
): ContextBundle {
	const { maxContextSize, unit = 'chars' } = opts;
	if (!Number.isInteger(maxContextSize) || maxContextSize < 1) {
		throw new InvalidQueryError(
			`maxContextSize must be an integer >= 1, got ${maxContextSize}`
		);
	}

	// Array.prototype.sort is stable, so equal scores keep the incoming order
	const ordered = dedupeBySource(candidates).sort((a, b) => b.score - a.score);

	const kept: Candidate[] = [];
	let used = 0;
	for (const c of ordered) {
		const size = sizeOf(c.text, unit);
		if (used + size > maxContextSize) {
			if (kept.length === 0) {
				kept.push(c);
			}
			break;
		}
		kept.push(c);
		used += size;
	}

	const passages: ContextPassage[] = kept.map((c, i) => ({
		...c,
		citation: { index: i + 1, sourceUrl: c.sourceUrl, chunkId: c.chunkId },
	}));

	return {
		passages,
		totalTokensEstimate: passages.reduce(
			(sum, p) => sum + estimateTokens(p.text),
			0
		),
		reranked: opts.reranked ?? false,
		rerankStrategy: opts.rerankStrategy ?? 'pass-through',
		citations: passages.map(
			(p) => `[${p.citation.index}] ${p.sourceUrl || p.chunkId}`
		),
	};
}

/** Numbered passages with their sources, ready to drop into a prompt. */
export function formatContext(bundle: ContextBundle): string {
	return bundle.passages
		.map((p) => {
			const source = p.sourceUrl ? `\nSource: ${p.sourceUrl}` : '';
			return `[${p.citation.index}] ${p.text.trim()}${source}`;
		})
		.join('\n\n');
}
