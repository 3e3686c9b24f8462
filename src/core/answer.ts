import { childLogger } from '@obs/logger';
import { type IProvider, isProviderError } from '@provider/types';
import type { GenerationSettings } from '@store/schema';

export const DEFAULT_CONTEXT_CHUNKS = 3;

export function buildAnswerPrompt(
	question: string,
	chunks: readonly string[],
	maxChunks = DEFAULT_CONTEXT_CHUNKS
): string {
	const context = chunks.slice(0, maxChunks).join('\n\n');
	return (
		`Context from documents:\n${context}\n\n` +
		`Question: ${question}\n\n` +
		'Please answer the question based on the provided context. ' +
		"If the context doesn't contain enough information to answer fully, " +
		'say so rather than making up information.'
	);
}

export interface GeneratedAnswer {
	answer: string;
	ok: boolean;
	model: string;
	elapsedMs: number;
}

export interface Answerer {
	readonly model: string;
	generate(question: string, chunks: readonly string[]): Promise<GeneratedAnswer>;
}

/**
 * Generation boundary: turns (question, ranked chunks) into an answer string.
 * Provider failures become an explanatory answer instead of an exception, so a
 * query is still logged with its similarity.
 */
export class AnswerGenerator implements Answerer {
	private readonly log = childLogger({ area: 'answer' });

	constructor(
		private readonly provider: Pick<IProvider, 'chat'> | null,
		private readonly settings: GenerationSettings
	) {}

	get model(): string {
		return this.settings.model;
	}

	async generate(
		question: string,
		chunks: readonly string[]
	): Promise<GeneratedAnswer> {
		const startedAt = Date.now();
		const done = (answer: string, ok: boolean): GeneratedAnswer => ({
			answer,
			ok,
			model: this.settings.model,
			elapsedMs: Date.now() - startedAt,
		});

		if (!this.provider) {
			return done(
				`Error: API key not configured. Set ${this.settings.apiKeyEnv} in your environment.`,
				false
			);
		}

		const prompt = buildAnswerPrompt(
			question,
			chunks,
			this.settings.contextChunks
		);
		try {
			const res = await this.provider.chat(
				{
					model: this.settings.model,
					messages: [{ role: 'user', content: prompt }],
					temperature: this.settings.temperature,
					topP: this.settings.topP,
					maxTokens: this.settings.maxTokens,
				},
				AbortSignal.timeout(this.settings.timeoutMs)
			);
			return done(res.content.trim(), true);
		} catch (err) {
			const answer = describeGenerationError(err);
			this.log.warn({
				msg: 'answer.generation-failed',
				model: this.settings.model,
				error: answer,
			});
			return done(answer, false);
		}
	}
}

export function describeGenerationError(err: unknown): string {
	if (isProviderError(err)) {
		switch (err.code) {
			case 'E_AUTH':
				return 'Error: Invalid API key. Please check your API key.';
			case 'E_RATE_LIMIT':
				return 'Error: Rate limit exceeded. Please try again in a moment.';
			case 'E_TIMEOUT':
				return 'Error: Request timed out. The API might be experiencing high load.';
			default:
				if (typeof err.status === 'number') {
					return `Error: API request failed with status ${err.status}`;
				}
		}
	}
	const message = err instanceof Error ? err.message : String(err);
	return `Error generating response: ${message}`;
}
