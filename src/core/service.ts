import type { PdfExtractionOptions } from '@ingest/pdf';
import { DocumentIngestor, type IngestionSummary, toDocumentLog } from '@ingest/pipeline';
import { childLogger } from '@obs/logger';
import { OpenAIProvider } from '@provider/openai';
import { isProviderError } from '@provider/types';
import { type Embedder, ProviderEmbedder } from '@rag/embeddings';
import { bandCounts, meanOf, type QualityReport, summarizeSimilarity } from '@rag/quality';
import { DocumentRetriever, interpretSimilarity } from '@rag/retriever';
import { EXAMPLE_KNOWLEDGE_BASE } from '@rag/seed';
import type { IndexStats, SimilarityBand } from '@rag/types';
import { resolveDataDir } from '@store/config';
import { type DocumentView, LogStore, type QueryLogRecord } from '@store/logs';
import type { ConfigV1 } from '@store/schema';
import { AnswerGenerator, type Answerer } from './answer';

export interface AskResult {
	answer: string;
	ok: boolean; // false when generation failed and `answer` explains why
	similarity: number | null; // mean of the retrieved scores
	sources: string[];
	scores: number[];
	bands: SimilarityBand[];
	logId: string;
}

export interface QAServiceDeps {
	embedder: Embedder;
	generator: Answerer;
	logs: LogStore;
	pdf?: Pick<PdfExtractionOptions, 'primary' | 'fallback'>; // extractor overrides
}

/**
 * The hosted pipeline. Built once per process by `createQAService`:
 * embedder → retriever → (seeded) index, plus the generator and log store.
 */
export class QAService {
	readonly retriever: DocumentRetriever;
	readonly ingestor: DocumentIngestor;
	private readonly log = childLogger({ area: 'service' });

	constructor(
		readonly config: ConfigV1,
		private readonly deps: QAServiceDeps
	) {
		this.retriever = new DocumentRetriever(deps.embedder);
		this.ingestor = new DocumentIngestor(this.retriever, {
			chunking: config.chunking,
			pdf: { ...deps.pdf, minChars: config.ingestion.minExtractedChars },
		});
	}

	async init(): Promise<void> {
		if (this.config.retrieval.seedExamples) {
			await this.retriever.buildInitial([...EXAMPLE_KNOWLEDGE_BASE]);
		}
		this.log.info({ msg: 'service.ready', ...this.retriever.stats() });
	}

	async ingestPdf(bytes: Uint8Array, filename: string): Promise<IngestionSummary> {
		const summary = await this.ingestor.ingestPdf(bytes, filename);
		this.deps.logs.appendDocument(toDocumentLog(summary));
		return summary;
	}

	async ingestText(text: string, filename: string): Promise<IngestionSummary> {
		const summary = await this.ingestor.ingestText(text, filename);
		this.deps.logs.appendDocument(toDocumentLog(summary));
		return summary;
	}

	async ask(question: string, topK = this.config.retrieval.topK): Promise<AskResult> {
		const { chunks, scores } = await this.retriever.findRelevantChunks(
			question,
			topK
		);
		const generated = await this.deps.generator.generate(question, chunks);
		const similarity = meanOf(scores);

		const logged = this.deps.logs.appendQuery({
			question,
			answer: generated.answer,
			meanSimilarity: similarity,
		});
		this.log.info({
			msg: 'service.answered',
			retrieved: chunks.length,
			similarity,
			ok: generated.ok,
			elapsedMs: generated.elapsedMs,
		});

		return {
			answer: generated.answer,
			ok: generated.ok,
			similarity,
			sources: chunks,
			scores,
			bands: scores.map(interpretSimilarity),
			logId: logged.id,
		};
	}

	history(limit = 10): QueryLogRecord[] {
		return this.deps.logs.recentQueries(limit);
	}

	metrics(): QualityReport {
		return summarizeSimilarity(this.deps.logs.similarityHistory());
	}

	bands(): Record<SimilarityBand, number> {
		return bandCounts(this.deps.logs.similarityHistory());
	}

	documents(): DocumentView[] {
		return this.deps.logs.listDocuments();
	}

	stats(): IndexStats {
		return this.retriever.stats();
	}
}

export interface CreateQAServiceOptions {
	cwd?: string;
	embedder?: Embedder;
	generator?: Answerer;
	logs?: LogStore;
	pdf?: QAServiceDeps['pdf'];
}

function createGenerator(config: ConfigV1): AnswerGenerator {
	const g = config.generation;
	try {
		const provider = new OpenAIProvider({
			apiKeyEnv: g.apiKeyEnv,
			baseUrl: g.baseUrl,
		});
		return new AnswerGenerator(provider, g);
	} catch (err) {
		if (isProviderError(err) && err.code === 'E_AUTH') {
			childLogger({ area: 'service' }).warn({
				msg: 'service.generation-disabled',
				reason: err.message,
			});
			return new AnswerGenerator(null, g);
		}
		throw err;
	}
}

function createEmbedder(config: ConfigV1): Embedder {
	const e = config.embedding;
	const provider = new OpenAIProvider({
		apiKeyEnv: e.apiKeyEnv,
		baseUrl: e.baseUrl,
		defaultEmbeddingModel: e.model,
	});
	return new ProviderEmbedder(provider, {
		model: e.model,
		batchSize: e.batchSize,
		maxRetries: e.maxRetries,
	});
}

/** Build and initialise the service; the caller owns its lifetime. */
export async function createQAService(
	config: ConfigV1,
	opts: CreateQAServiceOptions = {}
): Promise<QAService> {
	const service = new QAService(config, {
		embedder: opts.embedder ?? createEmbedder(config),
		generator: opts.generator ?? createGenerator(config),
		logs: opts.logs ?? new LogStore(resolveDataDir(config, opts.cwd)),
		pdf: opts.pdf,
	});
	await service.init();
	return service;
}
