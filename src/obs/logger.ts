import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const SECRET_KEYS = new Set([
	'OPENAI_API_KEY',
	'OPENROUTER_API_KEY',
	'authorization',
	'Authorization',
	'apiKey',
]);

function isSecretKey(k: string): boolean {
	if (SECRET_KEYS.has(k)) {
		return true;
	}
	const lower = k.toLowerCase();
	return (
		lower.includes('token') ||
		lower.includes('secret') ||
		lower.includes('apikey') ||
		lower.includes('api_key')
	);
}

function redactDeep(value: unknown): unknown {
	if (value && typeof value === 'object') {
		if (Array.isArray(value)) {
			return value.map(redactDeep);
		}
		const out: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(value)) {
			out[k] = isSecretKey(k) ? '***' : redactDeep(v);
		}
		return out;
	}
	return value;
}

/**
 * Mask secret-looking values in text that is about to leave the process
 * (HTTP error details, CLI error output).
 */
export function scrubSecretsFromText(s: string | undefined | null): string {
	if (!s) {
		return '';
	}

	let out = s;
	for (const [key, val] of Object.entries(process.env)) {
		if (!val || val.length < 6) {
			continue;
		}
		const k = key.toLowerCase();
		if (
			k.includes('token') ||
			k.includes('secret') ||
			k.includes('apikey') ||
			k.includes('api_key')
		) {
			out = out.split(val).join('***');
		}
	}

	out = out.replace(/\bBearer\s+[A-Za-z0-9._-]{10,}\b/gi, 'Bearer ***');
	out = out.replace(/\b(sk|rk|pk)-[A-Za-z0-9_-]{12,}\b/g, '$1-***');
	out = out.replace(/\bapi[_-]?key=([A-Za-z0-9._-]{6,})/gi, 'api_key=***');

	return out;
}

const redactFormat = winston.format((info) => {
	const clone = { ...info };
	if (clone.message && typeof clone.message === 'object') {
		clone.message = redactDeep(clone.message);
	}
	for (const k of Object.keys(clone)) {
		if (k !== 'level' && k !== 'message' && k !== 'timestamp') {
			clone[k] = redactDeep(clone[k]);
		}
	}
	return clone;
});

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
	const v = raw?.trim().toLowerCase();
	return LOG_LEVELS.find((l) => l === v);
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';
let baseLogger: winston.Logger | null = null;

function buildLogger(level: LogLevel): winston.Logger {
	return winston.createLogger({
		level,
		levels: winston.config.npm.levels,
		format: winston.format.combine(
			redactFormat(),
			winston.format.timestamp(),
			winston.format.json()
		),
		transports: [
			new winston.transports.Console({
				// keep stdout clean for --json output
				stderrLevels: ['error', 'warn', 'info', 'debug'],
			}),
		],
	});
}

export function setLogLevel(level: LogLevel) {
	currentLevel = level;
	baseLogger = buildLogger(level);
}

export function getLogger(): winston.Logger {
	if (!baseLogger) {
		baseLogger = buildLogger(currentLevel);
	}
	return baseLogger;
}

export function childLogger(
	bindings: Record<string, unknown> = {}
): winston.Logger {
	return getLogger().child(bindings);
}
