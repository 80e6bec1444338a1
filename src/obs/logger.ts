import type { RagConfig } from '@store/schema';
import winston from 'winston';

export type LoggingConfig = RagConfig['logging'];
export type LogLevel = LoggingConfig['level'];

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// Credentials this project reads from the environment
const SECRET_ENV_VARS = ['OPENAI_API_KEY', 'QDRANT_API_KEY', 'RERANK_API_KEY'];

const SECRET_KEY = /api[_-]?key|secret|token|authorization|password/i;

export function isLogLevel(v: unknown): v is LogLevel {
	return typeof v === 'string' && LOG_LEVELS.some((l) => l === v);
}

/** Masks every field whose name looks like a credential, at any depth. */
export function redactSecrets(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map(redactSecrets);
	}
	if (value && typeof value === 'object') {
		return Object.fromEntries(
			Object.entries(value).map(([k, v]) => [
				k,
				SECRET_KEY.test(k) ? '***' : redactSecrets(v),
			])
		);
	}
	return value;
}

/**
 * Masks credentials in user-visible text: the values of this project's key
 * variables, bearer tokens, OpenAI-style keys and `api_key=` parameters.
 */
export function scrubSecretsFromText(
	text: string | undefined | null,
	env: NodeJS.ProcessEnv = process.env
): string {
	if (!text) {
		return '';
	}
	let out = text;
	for (const name of SECRET_ENV_VARS) {
		const value = env[name];
		if (value && value.length >= 6) {
			out = out.split(value).join('***');
		}
	}
	return out
		.replace(/\bBearer\s+[A-Za-z0-9._-]{10,}/gi, 'Bearer ***')
		.replace(/\bsk-[A-Za-z0-9_-]{12,}/g, 'sk-***')
		.replace(/\b(api[_-]?key)=[^&\s]+/gi, '$1=***');
}

const redact = winston.format((info) => {
	for (const key of Object.keys(info)) {
		if (key !== 'level' && key !== 'timestamp') {
			info[key] = SECRET_KEY.test(key) ? '***' : redactSecrets(info[key]);
		}
	}
	return info;
});

let level: LogLevel = isLogLevel(process.env.LOG_LEVEL)
	? process.env.LOG_LEVEL
	: 'info';
let base: winston.Logger | undefined;

function createBaseLogger(): winston.Logger {
	return winston.createLogger({
		level,
		levels: winston.config.npm.levels,
		format: winston.format.combine(
			redact(),
			winston.format.timestamp(),
			winston.format.json()
		),
		transports: [
			// stdout carries command output
			new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] }),
		],
	});
}

export function getLogger(): winston.Logger {
	if (!base) {
		base = createBaseLogger();
	}
	return base;
}

/** Child loggers read the level through their parent, so this applies to all. */
export function setLogLevel(next: LogLevel): void {
	level = next;
	getLogger().level = next;
}

/** Applies the `logging` section of a resolved configuration. */
export function configureLogging(config: LoggingConfig): void {
	setLogLevel(config.level);
}

export function childLogger(
	bindings: Record<string, unknown> = {}
): winston.Logger {
	return getLogger().child(bindings);
}
