import { childLogger } from '@obs/logger';
import { Mutex } from '@util/mutex';
import { clampScore, EmbeddingIndex } from './embedding-index';
import type { Embedder } from './embeddings';
import { ConfigurationError, InputError, StateError } from './errors';
import type {
	ChunkMetadata,
	ChunkRecord,
	IndexStats,
	QueryResult,
	SimilarityBand,
} from './types';

export const DEFAULT_TOP_K = 5;

/**
 * Operator-facing reading of a cosine score. Informational only: results are
 * never dropped because of their band.
 */
export function interpretSimilarity(score: number): SimilarityBand {
	if (score > 0.7) {
		return 'on-topic';
	}
	if (score >= 0.4) {
		return 'possibly-relevant';
	}
	return 'off-topic';
}

function emptyResult(): QueryResult {
	return { chunks: [], scores: [], records: [] };
}

/**
 * Owns the embedding index and its parallel record store.
 *
 * Embedding runs outside the lock; the index write (and the index read on the
 * query path) run inside it, so a search never sees a vector without its record.
 */
export class DocumentRetriever {
	private readonly index = new EmbeddingIndex();
	private readonly lock = new Mutex();
	private readonly log = childLogger({ area: 'retriever' });

	constructor(private readonly embedder: Embedder) {}

	get model(): string {
		return this.embedder.model;
	}

	/** Replace the index with a seed set, tagged `source: 'system'`. */
	async buildInitial(documents: string[]): Promise<void> {
		const vectors = await this.embedder.embed(documents);
		const records: ChunkRecord[] = documents.map((text) => ({
			text,
			metadata: { text, source: 'system' },
		}));
		await this.lock.runExclusive(() => {
			this.index.reset(vectors, records);
		});
		this.log.info({
			msg: 'retriever.seeded',
			documents: documents.length,
			dimension: this.index.dimension,
		});
	}

	/**
	 * Embed and append chunks. Without metadata each chunk gets
	 * `{ text, source: 'uploaded' }`.
	 */
	async addChunks(chunks: string[], metadata?: ChunkMetadata[]): Promise<void> {
		if (metadata && metadata.length !== chunks.length) {
			throw new InputError(
				`Metadata length ${metadata.length} does not match chunk count ${chunks.length}`
			);
		}
		if (chunks.length === 0) {
			return;
		}

		const vectors = await this.embedder.embed(chunks);
		const records: ChunkRecord[] = chunks.map((text, i) => ({
			text,
			metadata: metadata?.[i] ?? { text, source: 'uploaded' },
		}));

		await this.lock.runExclusive(() => {
			this.index.append(vectors, records);
		});
		this.log.debug({
			msg: 'retriever.chunks-added',
			added: chunks.length,
			total: this.index.size,
		});
	}

	/**
	 * Top-k chunks for a question, best first. An empty index is a normal
	 * "nothing relevant" state and returns empty lists.
	 */
	async findRelevantChunks(
		question: string,
		k = DEFAULT_TOP_K
	): Promise<QueryResult> {
		if (!Number.isInteger(k) || k < 1) {
			throw new ConfigurationError(`k must be a positive integer (got ${k})`);
		}
		if (this.index.size === 0) {
			return emptyResult();
		}

		const [queryVector] = await this.embedder.embed([question]);
		if (!queryVector) {
			throw new StateError('Embedder returned no vector for the question');
		}

		return await this.lock.runExclusive(() => {
			const hits = this.index.search(queryVector, k);
			const result = emptyResult();
			let dropped = 0;
			for (const hit of hits) {
				const record = this.index.recordAt(hit.index);
				if (!record) {
					dropped++;
					continue;
				}
				result.chunks.push(record.text);
				result.scores.push(clampScore(hit.score));
				result.records.push(record);
			}
			if (dropped > 0) {
				this.log.warn({
					msg: 'retriever.store-mismatch',
					dropped,
					vectors: this.index.size,
					records: this.index.recordCount,
				});
			}
			return result;
		});
	}

	stats(): IndexStats {
		return {
			chunks: this.index.size,
			dimension: this.index.dimension,
			model: this.embedder.model,
		};
	}
}
