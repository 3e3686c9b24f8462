export type ChunkSource = 'system' | 'uploaded';

/**
 * Per-chunk metadata kept in the record store, parallel to the index.
 * Seed and fallback records only carry `text` and `source`.
 */
export interface ChunkMetadata {
	text: string;
	source: ChunkSource;
	chunkId?: string; // `${docId}_${chunkIndex}`
	docId?: string;
	filename?: string;
	chunkIndex?: number;
}

export interface ChunkRecord {
	readonly text: string;
	readonly metadata: Readonly<ChunkMetadata>;
}

export interface SearchHit {
	index: number; // insertion position in the index
	score: number;
}

export interface QueryResult {
	chunks: string[]; // ranked, best first
	scores: number[]; // parallel to chunks, clamped to [-1, 1]
	records: ChunkRecord[];
}

export type SimilarityBand = 'on-topic' | 'possibly-relevant' | 'off-topic';

export interface IndexStats {
	chunks: number;
	dimension: number | null;
	model: string;
}
