import { z } from 'zod';

export const LogLevelZ = z.enum(['debug', 'info', 'warn', 'error']);
export const ChunkStrategyZ = z.enum(['fixed', 'sentence']);

export const ChunkingConfigZ = z
	.object({
		strategy: ChunkStrategyZ.default('fixed'),
		targetSize: z.number().int().positive().default(500),
		overlapSize: z.number().int().nonnegative().default(50),
		wordsPerSentence: z.number().int().positive().default(20),
	})
	.refine((c) => c.overlapSize < c.targetSize, {
		message: 'overlapSize must be smaller than targetSize',
		path: ['overlapSize'],
	});

export const RetrievalConfigZ = z.object({
	topK: z.number().int().positive().default(3),
	seedExamples: z.boolean().default(true),
});

export const EmbeddingConfigZ = z.object({
	model: z.string().min(1).default('text-embedding-3-small'),
	baseUrl: z.string().url().optional(),
	apiKeyEnv: z.string().min(1).default('OPENAI_API_KEY'),
	batchSize: z.number().int().positive().default(64),
	maxRetries: z.number().int().nonnegative().default(2),
});

export const GenerationConfigZ = z.object({
	model: z.string().min(1).default('openai/gpt-3.5-turbo'),
	baseUrl: z.string().url().default('https://openrouter.ai/api/v1'),
	apiKeyEnv: z.string().min(1).default('OPENROUTER_API_KEY'),
	temperature: z.number().min(0).max(2).default(0.7),
	topP: z.number().gt(0).max(1).default(0.9),
	maxTokens: z.number().int().positive().default(200),
	timeoutMs: z.number().int().positive().default(30_000),
	contextChunks: z.number().int().positive().default(3),
});

export const IngestionConfigZ = z.object({
	minExtractedChars: z.number().int().nonnegative().default(100),
});

export const ServerConfigZ = z.object({
	host: z.string().min(1).default('127.0.0.1'),
	port: z.number().int().min(0).max(65_535).default(8000),
	maxUploadBytes: z
		.number()
		.int()
		.positive()
		.default(25 * 1024 * 1024),
});

export const ConfigV1Z = z.object({
	version: z.literal('1').default('1'),
	dataDir: z.string().optional(),
	chunking: ChunkingConfigZ.default({}),
	retrieval: RetrievalConfigZ.default({}),
	embedding: EmbeddingConfigZ.default({}),
	generation: GenerationConfigZ.default({}),
	ingestion: IngestionConfigZ.default({}),
	server: ServerConfigZ.default({}),
	logging: z.object({ level: LogLevelZ.optional() }).default({}),
});

export type ConfigV1 = z.infer<typeof ConfigV1Z>;
export type GenerationSettings = z.infer<typeof GenerationConfigZ>;

export function explainZodError(e: unknown) {
	if (!(e instanceof z.ZodError)) {
		return [];
	}
	return e.issues.map((err) => ({
		path: err.path.join('.'),
		message: err.message,
		code: err.code,
	}));
}
