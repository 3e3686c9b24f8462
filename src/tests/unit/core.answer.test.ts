import {
	AnswerGenerator,
	buildAnswerPrompt,
	describeGenerationError,
} from '@core/answer';
import { type ChatRequest, ProviderError } from '@provider/types';
import { resolveConfig } from '@store/config';
import { describe, expect, it } from 'vitest';

const settings = resolveConfig({}).generation;

function stubProvider(reply: () => Promise<string>) {
	const requests: Array<{ req: ChatRequest; signal?: AbortSignal }> = [];
	return {
		requests,
		async chat(req: ChatRequest, signal?: AbortSignal) {
			requests.push({ req, signal });
			return { model: req.model, content: await reply() };
		},
	};
}

describe('buildAnswerPrompt', () => {
	it('uses at most three chunks as context', () => {
		const prompt = buildAnswerPrompt('What is X?', ['c1', 'c2', 'c3', 'c4']);
		expect(prompt).toBe(
			'Context from documents:\nc1\n\nc2\n\nc3\n\n' +
				'Question: What is X?\n\n' +
				'Please answer the question based on the provided context. ' +
				"If the context doesn't contain enough information to answer fully, " +
				'say so rather than making up information.'
		);
	});
});

describe('AnswerGenerator', () => {
	it('sends one user message with the configured sampling', async () => {
		const provider = stubProvider(() => Promise.resolve('  The answer.  \n'));
		const gen = new AnswerGenerator(provider, settings);
		const res = await gen.generate('Q?', ['a', 'b', 'c', 'd']);

		expect(res.answer).toBe('The answer.');
		expect(res.ok).toBe(true);
		expect(res.model).toBe('openai/gpt-3.5-turbo');
		expect(provider.requests).toHaveLength(1);
		const { req, signal } = provider.requests[0];
		expect(req).toEqual({
			model: 'openai/gpt-3.5-turbo',
			messages: [{ role: 'user', content: buildAnswerPrompt('Q?', ['a', 'b', 'c']) }],
			temperature: 0.7,
			topP: 0.9,
			maxTokens: 200,
		});
		expect(signal).toBeInstanceOf(AbortSignal);
	});

	it('explains a missing API key without calling out', async () => {
		const gen = new AnswerGenerator(null, settings);
		const res = await gen.generate('Q?', ['a']);
		expect(res).toMatchObject({
			answer:
				'Error: API key not configured. Set OPENROUTER_API_KEY in your environment.',
			ok: false,
		});
	});

	it('turns provider failures into an answer string', async () => {
		const provider = stubProvider(() =>
			Promise.reject(new ProviderError('E_RATE_LIMIT', 'slow down', { status: 429 }))
		);
		const res = await new AnswerGenerator(provider, settings).generate('Q?', []);
		expect(res).toMatchObject({
			answer: 'Error: Rate limit exceeded. Please try again in a moment.',
			ok: false,
		});
	});
});

describe('describeGenerationError', () => {
	it('maps provider codes to messages', () => {
		expect(describeGenerationError(new ProviderError('E_AUTH', 'x', { status: 401 }))).toBe(
			'Error: Invalid API key. Please check your API key.'
		);
		expect(describeGenerationError(new ProviderError('E_TIMEOUT', 'x'))).toBe(
			'Error: Request timed out. The API might be experiencing high load.'
		);
		expect(
			describeGenerationError(new ProviderError('E_PROVIDER', 'x', { status: 503 }))
		).toBe('Error: API request failed with status 503');
		expect(describeGenerationError(new ProviderError('E_PROVIDER', 'no route'))).toBe(
			'Error generating response: no route'
		);
		expect(describeGenerationError(new Error('socket hang up'))).toBe(
			'Error generating response: socket hang up'
		);
	});
});
