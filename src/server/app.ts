import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { QAService } from '@core/service';
import { childLogger } from '@obs/logger';
import express, { type Express } from 'express';
import { createQARoutes } from './routes';

export interface AppOptions {
	maxUploadBytes: number;
}

export function createApp(service: QAService, opts: AppOptions): Express {
	const app = express();
	app.disable('x-powered-by');

	app.use(express.json({ limit: '1mb' }));
	app.use(
		express.raw({
			type: ['application/pdf', 'application/octet-stream'],
			limit: opts.maxUploadBytes,
		})
	);

	app.get('/', (_req, res) => {
		res.json({ message: 'docqa backend is running' });
	});
	app.get('/health', (_req, res) => {
		res.json({ status: 'healthy', index: service.stats() });
	});

	app.use('/api/v1', createQARoutes(service));

	// body-parser failures (oversized upload, malformed JSON)
	app.use(
		(
			err: unknown,
			_req: express.Request,
			res: express.Response,
			next: express.NextFunction
		) => {
			if (res.headersSent) {
				next(err);
				return;
			}
			const status =
				typeof err === 'object' &&
				err !== null &&
				'status' in err &&
				typeof err.status === 'number'
					? err.status
					: 500;
			res.status(status).json({
				detail: err instanceof Error ? err.message : 'Request failed',
			});
		}
	);

	return app;
}

export interface RunningServer {
	server: Server;
	url: string;
	close(): Promise<void>;
}

function serverUrl(addr: AddressInfo | string | null): string {
	if (addr === null || typeof addr === 'string') {
		return addr ?? '';
	}
	const host = addr.address.includes(':') ? `[${addr.address}]` : addr.address;
	return `http://${host}:${addr.port}`;
}

export async function startServer(
	service: QAService,
	opts: AppOptions & { host: string; port: number }
): Promise<RunningServer> {
	const app = createApp(service, opts);
	const server = await new Promise<Server>((resolve, reject) => {
		const s = app.listen(opts.port, opts.host);
		s.once('listening', () => resolve(s));
		s.once('error', reject);
	});
	const url = serverUrl(server.address());
	childLogger({ area: 'http' }).info({ msg: 'http.listening', url });

	return {
		server,
		url,
		close: () =>
			new Promise<void>((resolve, reject) => {
				server.close((err) => (err ? reject(err) : resolve()));
			}),
	};
}
