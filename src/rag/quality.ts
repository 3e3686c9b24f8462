import { interpretSimilarity } from './retriever';
import type { SimilarityBand } from './types';

export type HealthStatus = 'good' | 'needs-more-documents';

export interface InsufficientData {
	status: 'insufficient-data';
	totalQueries: number;
	message: string;
}

export interface SimilaritySummary {
	status: 'ok';
	totalQueries: number; // all logged queries, scored or not
	scoredQueries: number;
	mean: number;
	min: number;
	max: number;
	std: number; // population standard deviation
	health: HealthStatus;
	hint: string;
}

export type QualityReport = InsufficientData | SimilaritySummary;

const NO_QUERIES =
	'No queries logged yet - upload some documents and ask questions!';
const NO_SCORES = 'No similarity scores available yet';

/** Mean of a query's top-k scores; null when nothing was retrieved. */
export function meanOf(scores: readonly number[]): number | null {
	if (scores.length === 0) {
		return null;
	}
	return scores.reduce((acc, s) => acc + s, 0) / scores.length;
}

export function summarizeSimilarity(
	history: ReadonlyArray<number | null>
): QualityReport {
	if (history.length === 0) {
		return {
			status: 'insufficient-data',
			totalQueries: 0,
			message: NO_QUERIES,
		};
	}

	const scored = history.filter(
		(s): s is number => typeof s === 'number' && Number.isFinite(s)
	);
	if (scored.length === 0) {
		return {
			status: 'insufficient-data',
			totalQueries: history.length,
			message: NO_SCORES,
		};
	}

	const n = scored.length;
	let sum = 0;
	let min = Infinity;
	let max = -Infinity;
	for (const s of scored) {
		sum += s;
		min = Math.min(min, s);
		max = Math.max(max, s);
	}
	const mean = sum / n;
	const variance = scored.reduce((acc, s) => acc + (s - mean) ** 2, 0) / n;
	const health: HealthStatus = mean > 0.5 ? 'good' : 'needs-more-documents';

	return {
		status: 'ok',
		totalQueries: history.length,
		scoredQueries: n,
		mean,
		min,
		max,
		std: Math.sqrt(variance),
		health,
		hint:
			health === 'good'
				? 'Good performance'
				: 'Consider adding more relevant documents',
	};
}

export function bandCounts(
	history: ReadonlyArray<number | null>
): Record<SimilarityBand, number> {
	const counts: Record<SimilarityBand, number> = {
		'on-topic': 0,
		'possibly-relevant': 0,
		'off-topic': 0,
	};
	for (const s of history) {
		if (typeof s === 'number' && Number.isFinite(s)) {
			counts[interpretSimilarity(s)]++;
		}
	}
	return counts;
}
