import { ConfigurationError } from '@rag/errors';
import type { ChunkMetadata } from '@rag/types';

export type ChunkStrategy = 'fixed' | 'sentence';

export interface ChunkingConfig {
	strategy: ChunkStrategy; // default 'fixed'
	targetSize: number; // words, default 500
	overlapSize: number; // words, default 50
	wordsPerSentence: number; // sentence-overlap heuristic, default 20
}

export interface DocumentChunks {
	chunks: string[];
	metadata: ChunkMetadata[];
}

const DEFAULT_TARGET_SIZE = 500;
const DEFAULT_OVERLAP_SIZE = 50;
const DEFAULT_WORDS_PER_SENTENCE = 20;

const SENTENCE_TERMINATORS = /[.!?]+/;

function words(text: string): string[] {
	return text.split(/\s+/).filter((w) => w.length > 0);
}

function countWords(text: string): number {
	return words(text).length;
}

/**
 * Reject window parameters that would stall or degenerate the stepping.
 */
export function assertWindowParams(targetSize: number, overlapSize: number) {
	const issues: string[] = [];
	if (!Number.isInteger(targetSize) || targetSize < 1) {
		issues.push(`targetSize must be a positive integer (got ${targetSize})`);
	}
	if (!Number.isInteger(overlapSize) || overlapSize < 0) {
		issues.push(
			`overlapSize must be a non-negative integer (got ${overlapSize})`
		);
	}
	if (issues.length === 0 && overlapSize >= targetSize) {
		issues.push(
			`overlapSize (${overlapSize}) must be smaller than targetSize (${targetSize})`
		);
	}
	if (issues.length > 0) {
		throw new ConfigurationError('Invalid chunking parameters', issues);
	}
}

export function resolveChunkingConfig(
	cfg?: Partial<ChunkingConfig>
): ChunkingConfig {
	const resolved: ChunkingConfig = {
		strategy: cfg?.strategy ?? 'fixed',
		targetSize: cfg?.targetSize ?? DEFAULT_TARGET_SIZE,
		overlapSize: cfg?.overlapSize ?? DEFAULT_OVERLAP_SIZE,
		wordsPerSentence: cfg?.wordsPerSentence ?? DEFAULT_WORDS_PER_SENTENCE,
	};
	if (resolved.strategy !== 'fixed' && resolved.strategy !== 'sentence') {
		throw new ConfigurationError(
			`Unknown chunking strategy: ${String(resolved.strategy)}`
		);
	}
	if (
		!Number.isInteger(resolved.wordsPerSentence) ||
		resolved.wordsPerSentence < 1
	) {
		throw new ConfigurationError(
			`wordsPerSentence must be a positive integer (got ${resolved.wordsPerSentence})`
		);
	}
	assertWindowParams(resolved.targetSize, resolved.overlapSize);
	return resolved;
}

/**
 * Overlapping word windows. Window i covers words [i*step, i*step + targetSize)
 * with step = targetSize - overlapSize; the last window may be short.
 */
export function splitFixed(
	text: string,
	targetSize: number,
	overlapSize: number
): string[] {
	assertWindowParams(targetSize, overlapSize);
	const all = words(text);
	if (all.length === 0) {
		return [];
	}

	const step = targetSize - overlapSize;
	const chunks: string[] = [];
	for (let start = 0; start < all.length; start += step) {
		const window = all.slice(start, start + targetSize);
		if (window.length > 0) {
			chunks.push(window.join(' '));
		}
	}
	return chunks;
}

/**
 * Sentence split on runs of `.`, `!`, `?`. Terminators are dropped and
 * abbreviations ("Dr. Smith") split early; both are accepted limitations.
 */
export function splitSentences(text: string): string[] {
	return text
		.split(SENTENCE_TERMINATORS)
		.map((s) => s.trim())
		.filter((s) => s.length > 0);
}

export function overlapSentenceCount(
	overlapSize: number,
	wordsPerSentence = DEFAULT_WORDS_PER_SENTENCE
): number {
	return Math.max(1, Math.floor(overlapSize / wordsPerSentence));
}

/**
 * Greedy sentence packing up to targetSize words. On overflow the current
 * chunk is emitted and its trailing sentences carry into the next one.
 */
export function splitBySentence(
	text: string,
	targetSize: number,
	overlapSize: number,
	opts: { wordsPerSentence?: number } = {}
): string[] {
	assertWindowParams(targetSize, overlapSize);
	const sentences = splitSentences(text);
	if (sentences.length === 0) {
		return [];
	}

	const carry = overlapSentenceCount(overlapSize, opts.wordsPerSentence);
	const chunks: string[] = [];
	let current: string[] = [];
	let currentWords = 0;

	for (const sentence of sentences) {
		const n = countWords(sentence);
		if (currentWords + n > targetSize && current.length > 0) {
			chunks.push(current.join(' '));
			current = [...current.slice(-carry), sentence];
			currentWords = current.reduce((acc, s) => acc + countWords(s), 0);
		} else {
			current.push(sentence);
			currentWords += n;
		}
	}

	if (current.length > 0) {
		chunks.push(current.join(' '));
	}
	return chunks;
}

export function splitText(text: string, cfg: ChunkingConfig): string[] {
	return cfg.strategy === 'sentence'
		? splitBySentence(text, cfg.targetSize, cfg.overlapSize, {
				wordsPerSentence: cfg.wordsPerSentence,
			})
		: splitFixed(text, cfg.targetSize, cfg.overlapSize);
}

export function chunkDocument(
	text: string,
	docId: string,
	filename: string,
	cfg?: Partial<ChunkingConfig>
): DocumentChunks {
	const resolved = resolveChunkingConfig(cfg);
	const chunks = splitText(text, resolved);
	const metadata: ChunkMetadata[] = chunks.map((chunk, i) => ({
		chunkId: `${docId}_${i}`,
		docId,
		filename,
		chunkIndex: i,
		source: 'uploaded',
		text: chunk,
	}));
	return { chunks, metadata };
}
