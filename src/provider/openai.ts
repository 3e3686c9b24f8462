import { getLogger } from '@obs/logger';
import OpenAI from 'openai';
import {
	type ChatMessage,
	type ChatRequest,
	type ChatResult,
	type IProvider,
	ProviderError,
} from './types';

// Narrow helpers to avoid any
function hasProp<T extends string>(
	obj: unknown,
	prop: T
): obj is Record<T, unknown> {
	return typeof obj === 'object' && obj !== null && prop in obj;
}

function toStatus(err: unknown): number | undefined {
	if (hasProp(err, 'status') && typeof err.status === 'number') {
		return err.status;
	}
	if (hasProp(err, 'response')) {
		const resp = err.response;
		if (hasProp(resp, 'status') && typeof resp.status === 'number') {
			return resp.status;
		}
	}
	return;
}

function toMessage(err: unknown): string | undefined {
	if (hasProp(err, 'message') && typeof err.message === 'string') {
		return err.message;
	}
	return;
}

function isAbortLike(err: unknown, message: string): boolean {
	if (hasProp(err, 'name') && typeof err.name === 'string') {
		const name = err.name.toLowerCase();
		if (
			name.includes('abort') ||
			name.includes('cancel') ||
			name.includes('timeout')
		) {
			return true;
		}
	}
	return /aborted|aborterror|canceled?|timed? ?out/i.test(message);
}

export function mapOpenAIError(err: unknown): ProviderError {
	const status = toStatus(err);
	const message = toMessage(err) ?? 'Provider error';

	if (status === 401 || /unauthorized|invalid api key/i.test(message)) {
		return new ProviderError('E_AUTH', message, { status, cause: err });
	}
	if (status === 429) {
		return new ProviderError('E_RATE_LIMIT', message, {
			status,
			cause: err,
		});
	}
	if (status === undefined && isAbortLike(err, message)) {
		return new ProviderError('E_TIMEOUT', message, { status, cause: err });
	}
	return new ProviderError('E_PROVIDER', message, { status, cause: err });
}

function toMessageParam(
	m: ChatMessage
): OpenAI.Chat.Completions.ChatCompletionMessageParam {
	switch (m.role) {
		case 'system':
			return { role: 'system', content: m.content };
		case 'assistant':
			return { role: 'assistant', content: m.content };
		default:
			return { role: 'user', content: m.content };
	}
}

export interface OpenAIProviderOptions {
	apiKey?: string;
	apiKeyEnv?: string; // env var consulted when apiKey is not given
	baseUrl?: string; // OpenAI-compatible endpoint (e.g. OpenRouter)
	defaultEmbeddingModel?: string;
	maxRetries?: number; // SDK-level retries; 0 leaves retrying to callers
}

function ensureApiKey(opts: OpenAIProviderOptions): string {
	const envName = opts.apiKeyEnv ?? 'OPENAI_API_KEY';
	const key =
		typeof opts.apiKey === 'string' ? opts.apiKey : process.env[envName];
	if (!key?.trim()) {
		throw new ProviderError(
			'E_AUTH',
			`Missing API key. Set ${envName} in your environment.`
		);
	}
	return key;
}

/**
 * OpenAI-compatible provider. One SDK client per instance, reused across calls.
 */
export class OpenAIProvider implements IProvider {
	readonly name: string;
	private client: OpenAI;
	private defaultEmbeddingModel: string;

	constructor(opts: OpenAIProviderOptions = {}) {
		const apiKey = ensureApiKey(opts);
		this.client = new OpenAI({
			apiKey,
			baseURL: opts.baseUrl,
			maxRetries: opts.maxRetries ?? 0,
		});
		this.name = opts.baseUrl ? new URL(opts.baseUrl).host : 'openai';
		this.defaultEmbeddingModel =
			opts.defaultEmbeddingModel ?? 'text-embedding-3-small';
	}

	async chat(req: ChatRequest, signal?: AbortSignal): Promise<ChatResult> {
		try {
			const res = await this.client.chat.completions.create(
				{
					model: req.model,
					messages: req.messages.map(toMessageParam),
					temperature: req.temperature,
					top_p: req.topP,
					max_tokens: req.maxTokens,
				},
				{ signal }
			);
			const choice = res.choices[0];
			return {
				model: res.model ?? req.model,
				content: choice?.message?.content ?? '',
				finishReason: choice?.finish_reason ?? undefined,
				usage: res.usage
					? {
							promptTokens: res.usage.prompt_tokens,
							completionTokens: res.usage.completion_tokens,
							totalTokens: res.usage.total_tokens,
						}
					: undefined,
			};
		} catch (err) {
			const mapped = mapOpenAIError(err);
			getLogger().error({
				msg: 'provider.chat-error',
				provider: this.name,
				code: mapped.code,
				status: mapped.status,
				error: mapped.message,
			});
			throw mapped;
		}
	}

	async embed(texts: string[], model?: string): Promise<number[][]> {
		try {
			const res = await this.client.embeddings.create({
				model: model ?? this.defaultEmbeddingModel,
				input: texts,
				encoding_format: 'float',
			});
			// The API may reorder; restore input order by index
			return res.data
				.slice()
				.sort((a, b) => a.index - b.index)
				.map((d) => d.embedding);
		} catch (err) {
			throw mapOpenAIError(err);
		}
	}
}
