import { IndexCorruptionError, InputError } from './errors';
import type { ChunkRecord, SearchHit } from './types';

/**
 * Scale to unit length. Zero vectors are returned as zeros; they score 0
 * against everything.
 */
export function l2Normalize(vector: ArrayLike<number>): Float32Array {
	const out = Float32Array.from(vector);
	let sumSq = 0;
	for (let i = 0; i < out.length; i++) {
		sumSq += out[i] * out[i];
	}
	const norm = Math.sqrt(sumSq);
	if (norm > 0) {
		for (let i = 0; i < out.length; i++) {
			out[i] /= norm;
		}
	}
	return out;
}

export function clampScore(score: number): number {
	if (!Number.isFinite(score)) {
		return 0;
	}
	return Math.min(1, Math.max(-1, score));
}

function dot(a: Float32Array, b: Float32Array): number {
	let s = 0;
	for (let i = 0; i < a.length; i++) {
		s += a[i] * b[i];
	}
	return s;
}

/**
 * Exact inner-product index over L2-normalised vectors (cosine similarity),
 * with the chunk records stored alongside. Position N in `vectors` belongs to
 * position N in `records`; both only ever grow together.
 */
export class EmbeddingIndex {
	private vectors: Float32Array[] = [];
	private records: ChunkRecord[] = [];
	private dim: number | null = null;

	get size(): number {
		return this.vectors.length;
	}

	get recordCount(): number {
		return this.records.length;
	}

	get dimension(): number | null {
		return this.dim;
	}

	recordAt(index: number): ChunkRecord | undefined {
		return this.records[index];
	}

	/** Replace everything with a fresh index sized to this batch. */
	reset(vectors: number[][], records: ChunkRecord[]): void {
		const prepared = this.prepare(vectors, records, null);
		this.vectors = prepared.vectors;
		this.records = prepared.records;
		this.dim = prepared.dim;
	}

	/**
	 * Append a batch; the first batch fixes the dimension. Validation happens
	 * before anything is written, so a rejected batch leaves the index as it was.
	 */
	append(vectors: number[][], records: ChunkRecord[]): void {
		const prepared = this.prepare(vectors, records, this.dim);
		if (prepared.vectors.length === 0) {
			return;
		}
		for (let i = 0; i < prepared.vectors.length; i++) {
			this.vectors.push(prepared.vectors[i]);
			this.records.push(prepared.records[i]);
		}
		this.dim = prepared.dim;
	}

	search(queryVector: ArrayLike<number>, k: number): SearchHit[] {
		if (this.dim === null || this.vectors.length === 0 || k <= 0) {
			return [];
		}
		if (queryVector.length !== this.dim) {
			throw new IndexCorruptionError(this.dim, queryVector.length);
		}
		const q = l2Normalize(queryVector);

		const hits: SearchHit[] = this.vectors.map((v, index) => ({
			index,
			score: dot(q, v),
		}));
		// Array.prototype.sort is stable: equal scores keep insertion order
		hits.sort((a, b) => b.score - a.score);
		return hits.slice(0, Math.min(k, hits.length));
	}

	private prepare(
		vectors: number[][],
		records: ChunkRecord[],
		expectedDim: number | null
	): { vectors: Float32Array[]; records: ChunkRecord[]; dim: number | null } {
		if (vectors.length !== records.length) {
			throw new InputError(
				`Got ${vectors.length} vectors for ${records.length} records`
			);
		}
		if (vectors.length === 0) {
			return { vectors: [], records: [], dim: expectedDim };
		}

		const dim = expectedDim ?? vectors[0].length;
		if (dim === 0) {
			throw new InputError('Embedding vectors must not be empty');
		}
		for (const v of vectors) {
			if (v.length !== dim) {
				throw new IndexCorruptionError(dim, v.length);
			}
		}

		return {
			vectors: vectors.map((v) => l2Normalize(v)),
			records: records.map((r) =>
				Object.freeze({
					text: r.text,
					metadata: Object.freeze({ ...r.metadata }),
				})
			),
			dim,
		};
	}
}
