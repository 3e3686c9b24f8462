import {
	type LogLevel,
	parseLogLevel,
	scrubSecretsFromText,
	setLogLevel,
} from '@obs/logger';
import { isProviderError } from '@provider/types';
import { isRetrievalError } from '@rag/errors';
import { loadConfig, resolveConfig } from '@store/config';
import type { ConfigV1 } from '@store/schema';

export interface RuntimeConfig {
	config: ConfigV1;
	userPath?: string;
	projectPath?: string;
}

let logLevelPinned = parseLogLevel(process.env.LOG_LEVEL) !== undefined;

/** --log-level and LOG_LEVEL win over `logging.level` from config files. */
export function pinLogLevel(level: LogLevel) {
	setLogLevel(level);
	logLevelPinned = true;
}

/** Merged user + project config, validated, with defaults filled. */
export function loadRuntimeConfig(cwd = process.cwd()): RuntimeConfig {
	const { merged, userPath, projectPath } = loadConfig(cwd);
	const config = resolveConfig(merged);
	if (!logLevelPinned && config.logging.level) {
		setLogLevel(config.logging.level);
	}
	return { config, userPath, projectPath };
}

export function formatCliError(err: unknown): string {
	if (isRetrievalError(err) || isProviderError(err)) {
		return scrubSecretsFromText(`[${err.code}] ${err.message}`);
	}
	return scrubSecretsFromText(err instanceof Error ? err.message : String(err));
}

export function emitCliError(err: unknown, asJson = false): number {
	const message = formatCliError(err);
	if (asJson) {
		process.stdout.write(
			`${JSON.stringify({ ok: false, error: { message } })}\n`
		);
	} else {
		process.stderr.write(`${message}\n`);
	}
	return 1;
}

export function toOpt(v: unknown): string | undefined {
	return typeof v === 'string' && v.trim().length > 0 ? v : undefined;
}

export function toInt(v: unknown): number | undefined {
	const n =
		typeof v === 'string'
			? Number.parseInt(v, 10)
			: typeof v === 'number'
				? v
				: Number.NaN;
	return Number.isInteger(n) ? n : undefined;
}

export function toList(v: unknown): string[] {
	if (Array.isArray(v)) {
		return v.filter((x): x is string => typeof x === 'string');
	}
	return typeof v === 'string' ? [v] : [];
}
