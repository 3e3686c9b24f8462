import { childLogger } from '@obs/logger';
import type { IProvider } from '@provider/types';
import { StateError } from './errors';

/**
 * Text → vector capability. Must be deterministic for a given `model`: every
 * vector in one index has to come from the same model id.
 */
export interface Embedder {
	readonly model: string;
	embed(texts: string[]): Promise<number[][]>;
}

function defaultSleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface BatchEmbedOptions {
	provider: Pick<IProvider, 'embed'>;
	model: string;
	texts: string[];
	batchSize?: number;
	maxRetries?: number;
	backoffBaseMs?: number;
	jitter?: boolean;
	sleep?: (ms: number) => Promise<void>;
}

export async function batchEmbed(opts: BatchEmbedOptions): Promise<number[][]> {
	const {
		provider,
		model,
		texts,
		batchSize = 64,
		maxRetries = 2,
		backoffBaseMs = 200,
		jitter = true,
		sleep = defaultSleep,
	} = opts;
	const log = childLogger({ area: 'embeddings', model });

	const out: number[][] = [];
	for (let i = 0; i < texts.length; i += batchSize) {
		const slice = texts.slice(i, i + batchSize);

		let attempt = 0;
		while (true) {
			try {
				const vectors = await provider.embed(slice, model);
				if (vectors.length !== slice.length) {
					throw new StateError(
						`Embedding provider returned ${vectors.length} vectors for ${slice.length} texts`
					);
				}
				out.push(...vectors);
				break;
			} catch (err) {
				attempt++;
				if (err instanceof StateError || attempt > maxRetries) {
					throw err;
				}
				const delay =
					backoffBaseMs * 2 ** (attempt - 1) +
					(jitter ? Math.floor(Math.random() * backoffBaseMs) : 0);
				log.warn({
					msg: 'embeddings.retry',
					attempt,
					delayMs: delay,
					error: err instanceof Error ? err.message : String(err),
				});
				await sleep(delay);
			}
		}
	}

	return out;
}

export interface ProviderEmbedderOptions {
	model: string;
	batchSize?: number;
	maxRetries?: number;
	backoffBaseMs?: number;
	sleep?: (ms: number) => Promise<void>;
}

/** Embedder backed by an OpenAI-compatible provider, with batching and retry. */
export class ProviderEmbedder implements Embedder {
	readonly model: string;
	private readonly provider: Pick<IProvider, 'embed'>;
	private readonly opts: ProviderEmbedderOptions;

	constructor(provider: Pick<IProvider, 'embed'>, opts: ProviderEmbedderOptions) {
		this.provider = provider;
		this.model = opts.model;
		this.opts = opts;
	}

	async embed(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}
		return await batchEmbed({
			provider: this.provider,
			model: this.model,
			texts,
			batchSize: this.opts.batchSize,
			maxRetries: this.opts.maxRetries,
			backoffBaseMs: this.opts.backoffBaseMs,
			sleep: this.opts.sleep,
		});
	}
}
