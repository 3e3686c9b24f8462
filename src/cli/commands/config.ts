/** biome-ignore-all lint/suspicious/noConsole: tbd */

import { saveConfig } from '@store/config';
import { ConfigV1Z } from '@store/schema';
import type { Command } from 'commander';
import { emitCliError, loadRuntimeConfig } from '../shared';

type Scope = 'user' | 'project';
type Format = 'yaml' | 'json';

export function handleConfigShow(opts: { json?: boolean; cwd?: string }): number {
	try {
		const { config, userPath, projectPath } = loadRuntimeConfig(
			opts.cwd ?? process.cwd()
		);
		if (opts.json) {
			console.log(JSON.stringify({ config, userPath, projectPath }, null, 2));
		} else {
			console.log('User config:', userPath ?? '(none)');
			console.log('Project config:', projectPath ?? '(none)');
			console.log('Effective (JSON):');
			console.log(JSON.stringify(config, null, 2));
		}
		return 0;
	} catch (err) {
		return emitCliError(err, opts.json);
	}
}

/** Write a config file holding every default, ready for editing. */
export function handleConfigInit(opts: {
	scope?: string;
	format?: string;
	cwd?: string;
}): number {
	const scope: Scope = opts.scope === 'user' ? 'user' : 'project';
	const format: Format = opts.format === 'json' ? 'json' : 'yaml';
	try {
		const defaults = ConfigV1Z.parse({});
		const { path } = saveConfig(scope, defaults, { format, cwd: opts.cwd });
		console.log(`Wrote ${scope} config: ${path}`);
		return 0;
	} catch (err) {
		return emitCliError(err);
	}
}

export function registerConfigCommand(program: Command): void {
	const cmd = program
		.command('config')
		.description('Work with configuration under .docqa');

	cmd.command('show')
		.description('Print the effective configuration')
		.option('--json', 'Print as JSON with source paths')
		.action((flags: Record<string, unknown>) => {
			process.exitCode = handleConfigShow({ json: flags.json === true });
		});

	cmd.command('init')
		.description('Write a config file with the defaults')
		.option('-s, --scope <scope>', 'user|project', 'project')
		.option('-f, --format <format>', 'yaml|json', 'yaml')
		.action((flags: Record<string, unknown>) => {
			process.exitCode = handleConfigInit({
				scope: typeof flags.scope === 'string' ? flags.scope : undefined,
				format: typeof flags.format === 'string' ? flags.format : undefined,
			});
		});
}
