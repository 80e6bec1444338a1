import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigurationError } from '@rag/errors';
import YAML from 'yaml';
import { ConfigZ, explainZodError, type RagConfig } from './schema';

export type ConfigUnknown = Record<string, unknown>;

const CONFIG_FILENAMES = ['config.yaml', 'config.yml', 'config.json'];

export interface LoadResult {
	userPath?: string;
	projectPath?: string;
	merged: ConfigUnknown;
	user?: ConfigUnknown;
	project?: ConfigUnknown;
}

export function getUserConfigDir(): string {
	return path.join(os.homedir(), '.campus-rag');
}

export function getProjectConfigDir(cwd = process.cwd()): string {
	return path.join(cwd, '.campus-rag');
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
	return !!x && typeof x === 'object' && !Array.isArray(x);
}

function readMaybe(filePath: string): ConfigUnknown | undefined {
	if (!fs.existsSync(filePath)) {
		return;
	}
	const raw = fs.readFileSync(filePath, 'utf8');
	let parsed: unknown;
	try {
		parsed = filePath.endsWith('.json') ? JSON.parse(raw) : YAML.parse(raw);
	} catch (err) {
		throw new ConfigurationError(
			`Unreadable config file ${filePath}`,
			[err instanceof Error ? err.message : String(err)],
			err
		);
	}
	if (parsed === null || parsed === undefined) {
		return {};
	}
	if (!isPlainObject(parsed)) {
		throw new ConfigurationError(
			`Config file ${filePath} must contain a mapping at the top level`
		);
	}
	return parsed;
}

function findFirstExisting(baseDir: string): {
	path?: string;
	data?: ConfigUnknown;
} {
	for (const name of CONFIG_FILENAMES) {
		const p = path.join(baseDir, name);
		const data = readMaybe(p);
		if (data) {
			return { path: p, data };
		}
	}
	return {};
}

// rhs overrides lhs; arrays replaced by rhs; plain objects merged recursively.
export function deepMerge(
	lhs: Record<string, unknown>,
	rhs: Record<string, unknown>
): Record<string, unknown> {
	const out: Record<string, unknown> = { ...lhs };
	for (const [k, v] of Object.entries(rhs)) {
		const lv = out[k];
		if (isPlainObject(lv) && isPlainObject(v)) {
			out[k] = deepMerge(lv, v);
		} else if (v !== undefined) {
			out[k] = v;
		}
	}
	return out;
}

export function loadConfig(
	cwd = process.cwd(),
	opts: { file?: string; userDir?: string } = {}
): LoadResult {
	const userDir = opts.userDir ?? getUserConfigDir();
	const projectDir = getProjectConfigDir(cwd);

	const { path: userPath, data: user } = findFirstExisting(userDir);
	let projectPath: string | undefined;
	let project: ConfigUnknown | undefined;
	if (opts.file) {
		projectPath = path.resolve(cwd, opts.file);
		project = readMaybe(projectPath);
		if (!project) {
			throw new ConfigurationError(`Config file not found: ${projectPath}`);
		}
	} else {
		({ path: projectPath, data: project } = findFirstExisting(projectDir));
	}

	let merged: ConfigUnknown = {};
	if (user) {
		merged = deepMerge(merged, user);
	}
	if (project) {
		merged = deepMerge(merged, project);
	}

	return { userPath, projectPath, merged, user, project };
}

function intFromEnv(name: string, raw: string | undefined): number | undefined {
	if (raw === undefined || raw.trim() === '') {
		return;
	}
	const n = Number(raw);
	if (!Number.isInteger(n)) {
		throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
	}
	return n;
}

function backendFromEnv(raw: string | undefined): 'local' | 'cloud' | undefined {
	if (!raw) {
		return;
	}
	const v = raw.trim().toLowerCase();
	if (v === 'local' || v === 'chromadb' || v === 'lancedb') {
		return 'local';
	}
	if (v === 'cloud' || v === 'qdrant') {
		return 'cloud';
	}
	throw new ConfigurationError(
		`Unsupported VECTOR_STORE_TYPE "${raw}". Supported: local, cloud (qdrant)`
	);
}

/** Environment variables win over file configuration. */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): ConfigUnknown {
	return {
		vectorStore: {
			backend: backendFromEnv(env.VECTOR_STORE_TYPE),
			collectionName: env.COLLECTION_NAME || undefined,
			embeddingDim: intFromEnv('EMBEDDING_DIM', env.EMBEDDING_DIM),
			local: { path: env.VECTOR_DB_PATH || undefined },
			cloud: {
				url: env.QDRANT_URL || undefined,
				apiKey: env.QDRANT_API_KEY || undefined,
			},
		},
		embedding: {
			model: env.EMBEDDING_MODEL || undefined,
			apiKey: env.OPENAI_API_KEY || undefined,
		},
		reranker: {
			url: env.RERANK_URL || undefined,
			apiKey: env.RERANK_API_KEY || undefined,
			model: env.RERANK_MODEL || undefined,
		},
		logging: { level: env.LOG_LEVEL || undefined },
	};
}

/** Validates a raw config object, applying schema defaults. */
export function parseConfig(raw: unknown): RagConfig {
	const parsed = ConfigZ.safeParse(raw);
	if (!parsed.success) {
		throw new ConfigurationError(
			'Invalid configuration',
			explainZodError(parsed.error).map(
				(i) => `${i.path || '(root)'}: ${i.message}`
			)
		);
	}
	return parsed.data;
}

export function resolveConfig(
	opts: {
		cwd?: string;
		file?: string;
		userDir?: string;
		env?: NodeJS.ProcessEnv;
	} = {}
): RagConfig {
	const { merged } = loadConfig(opts.cwd, {
		file: opts.file,
		userDir: opts.userDir,
	});
	return parseConfig(deepMerge(merged, envOverrides(opts.env)));
}
