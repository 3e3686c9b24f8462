/** biome-ignore-all lint/suspicious/noConsole: tbd */

import { parseLogLevel } from '@obs/logger';
import { formatBuildInfo, VERSION } from '@util/build-info';
import { Command } from 'commander';
import { registerAskCommand } from './commands/ask';
import { registerChunkCommand } from './commands/chunk';
import { registerConfigCommand } from './commands/config';
import { registerLogCommands } from './commands/logs';
import { registerServeCommand } from './commands/serve';
import { pinLogLevel } from './shared';

const program = new Command();
program
	.name('docqa')
	.description('Question answering over your PDF documents')
	.version(VERSION, '-v, --version');

program.option('-l, --log-level <level>', 'log level (debug|info|warn|error)');

program.hook('preAction', (thisCmd) => {
	const opts = thisCmd.opts<{ logLevel?: string }>();
	if (!opts.logLevel) {
		return;
	}
	const level = parseLogLevel(opts.logLevel);
	if (level) {
		pinLogLevel(level);
	} else {
		console.error(`Unknown log level "${opts.logLevel}", ignoring`);
	}
});

program
	.command('version')
	.description('Show detailed version and build information')
	.action(() => {
		console.log(formatBuildInfo());
	});

registerServeCommand(program);
registerAskCommand(program);
registerChunkCommand(program);
registerLogCommands(program);
registerConfigCommand(program);

await program.parseAsync(process.argv);
