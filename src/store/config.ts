import fs from 'node:fs';
import path from 'node:path';
import { ConfigurationError } from '@rag/errors';
import { getProjectDocqaDir, getUserDocqaDir } from '@util/paths';
import YAML from 'yaml';
import { type ConfigV1, ConfigV1Z, explainZodError } from './schema';

export type ConfigUnknown = Record<string, unknown>;

const CONFIG_FILENAMES = ['config.yaml', 'config.yml', 'config.json'];

export interface LoadResult {
	userPath?: string;
	projectPath?: string;
	merged: ConfigUnknown;
	user?: ConfigUnknown;
	project?: ConfigUnknown;
}

function ensureDir(dir: string) {
	if (!fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true });
		if (process.platform !== 'win32') {
			fs.chmodSync(dir, 0o700);
		}
	}
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
	return !!x && typeof x === 'object' && !Array.isArray(x);
}

function readMaybe(filePath: string): ConfigUnknown | undefined {
	if (!fs.existsSync(filePath)) {
		return;
	}
	const raw = fs.readFileSync(filePath, 'utf8');
	let data: unknown;
	try {
		data =
			filePath.endsWith('.json') ? JSON.parse(raw) : YAML.parse(raw);
	} catch (err) {
		throw new ConfigurationError(`Unreadable config file ${filePath}`, [
			err instanceof Error ? err.message : String(err),
		]);
	}
	if (data === null || data === undefined) {
		return {};
	}
	if (!isPlainObject(data)) {
		throw new ConfigurationError(
			`Config file ${filePath} must contain a mapping at the top level`
		);
	}
	return data;
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
	lhs: ConfigUnknown,
	rhs: ConfigUnknown
): ConfigUnknown {
	const out: ConfigUnknown = { ...lhs };
	for (const [k, v] of Object.entries(rhs)) {
		const lv = out[k];
		out[k] = isPlainObject(lv) && isPlainObject(v) ? deepMerge(lv, v) : v;
	}
	return out;
}

export function loadConfig(
	cwd = process.cwd(),
	userDir = getUserDocqaDir()
): LoadResult {
	const projectDir = getProjectDocqaDir(cwd);

	const { path: userPath, data: user } = findFirstExisting(userDir);
	const { path: projectPath, data: project } = findFirstExisting(projectDir);

	let merged: ConfigUnknown = {};
	if (user) {
		merged = deepMerge(merged, user);
	}
	if (project) {
		merged = deepMerge(merged, project);
	}

	return { userPath, projectPath, merged, user, project };
}

/**
 * Validate a merged config and fill defaults.
 * Degenerate chunking (overlap >= target) is rejected here, at configuration time.
 */
export function resolveConfig(cfgUnknown: unknown = {}): ConfigV1 {
	const parsed = ConfigV1Z.safeParse(cfgUnknown ?? {});
	if (!parsed.success) {
		throw new ConfigurationError(
			'Invalid configuration',
			explainZodError(parsed.error).map((i) =>
				i.path ? `${i.path}: ${i.message}` : i.message
			)
		);
	}
	return parsed.data;
}

export function resolveDataDir(cfg: ConfigV1, cwd = process.cwd()): string {
	return cfg.dataDir
		? path.resolve(cwd, cfg.dataDir)
		: getProjectDocqaDir(cwd);
}

export function saveConfig(
	scope: 'user' | 'project',
	data: ConfigUnknown,
	opts?: { format?: 'yaml' | 'json'; cwd?: string }
): { path: string } {
	const format = opts?.format ?? 'yaml';
	const dir =
		scope === 'user'
			? getUserDocqaDir()
			: getProjectDocqaDir(opts?.cwd ?? process.cwd());
	ensureDir(dir);
	const file = path.join(
		dir,
		format === 'yaml' ? 'config.yaml' : 'config.json'
	);
	const serialized =
		format === 'yaml'
			? YAML.stringify(data)
			: JSON.stringify(data, null, 2);
	fs.writeFileSync(file, serialized, { encoding: 'utf8', mode: 0o600 });
	return { path: file };
}
