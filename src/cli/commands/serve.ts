import { createQAService } from '@core/service';
import { getLogger } from '@obs/logger';
import { startServer } from '@server/app';
import type { Command } from 'commander';
import { emitCliError, loadRuntimeConfig, toInt, toOpt } from '../shared';

export interface ServeCliOptions {
	host?: string;
	port?: number;
	cwd?: string;
}

/** Long-running HTTP API; the index lives as long as the process. */
export async function handleServeCommand(opts: ServeCliOptions): Promise<number> {
	const cwd = opts.cwd ?? process.cwd();
	try {
		const { config } = loadRuntimeConfig(cwd);
		const service = await createQAService(config, { cwd });
		const running = await startServer(service, {
			host: opts.host ?? config.server.host,
			port: opts.port ?? config.server.port,
			maxUploadBytes: config.server.maxUploadBytes,
		});
		process.stderr.write(`docqa listening on ${running.url}\n`);

		const shutdown = (signal: string) => {
			getLogger().info({ msg: 'http.shutdown', signal });
			running.close().then(
				() => process.exit(0),
				(err: unknown) => {
					emitCliError(err);
					process.exit(1);
				}
			);
		};
		process.once('SIGINT', () => shutdown('SIGINT'));
		process.once('SIGTERM', () => shutdown('SIGTERM'));
		return 0;
	} catch (err) {
		return emitCliError(err);
	}
}

export function registerServeCommand(program: Command): void {
	program
		.command('serve')
		.description('Start the HTTP API')
		.option('--host <host>', 'Bind address')
		.option('--port <port>', 'Port to listen on')
		.action(async (flags: Record<string, unknown>) => {
			process.exitCode = await handleServeCommand({
				host: toOpt(flags.host),
				port: toInt(flags.port),
			});
		});
}
