import { bandCounts, meanOf, summarizeSimilarity } from '@rag/quality';
import { describe, expect, it } from 'vitest';

describe('summarizeSimilarity', () => {
	it('summarises scored history', () => {
		const report = summarizeSimilarity([0.8, 0.6, 0.9, 0.3]);
		expect(report.status).toBe('ok');
		if (report.status !== 'ok') {
			return;
		}
		expect(report.totalQueries).toBe(4);
		expect(report.scoredQueries).toBe(4);
		expect(report.mean).toBeCloseTo(0.65, 10);
		expect(report.min).toBe(0.3);
		expect(report.max).toBe(0.9);
		expect(report.std).toBeCloseTo(Math.sqrt(0.0525), 10);
		expect(report.health).toBe('good');
		expect(report.hint).toBe('Good performance');
	});

	it('flags a mean of exactly 0.5 as needing more documents', () => {
		const report = summarizeSimilarity([0.5, 0.5]);
		expect(report.status === 'ok' && report.health).toBe('needs-more-documents');
		expect(report.status === 'ok' && report.std).toBe(0);
		expect(report.status === 'ok' && report.hint).toBe(
			'Consider adding more relevant documents'
		);
	});

	it('ignores unscored queries but counts them', () => {
		const report = summarizeSimilarity([null, 0.2, null]);
		expect(report).toMatchObject({
			status: 'ok',
			totalQueries: 3,
			scoredQueries: 1,
			mean: 0.2,
			min: 0.2,
			max: 0.2,
			std: 0,
		});
	});

	it('summarises a history too long to spread into arguments', () => {
		const history = Array.from({ length: 300_000 }, (_, i) => (i % 10) / 10);
		const report = summarizeSimilarity(history);
		expect(report).toMatchObject({
			status: 'ok',
			totalQueries: 300_000,
			min: 0,
			max: 0.9,
		});
		expect(report.status === 'ok' && report.mean).toBeCloseTo(0.45, 6);
	});

	it('reports insufficient data for an empty history', () => {
		expect(summarizeSimilarity([])).toEqual({
			status: 'insufficient-data',
			totalQueries: 0,
			message: 'No queries logged yet - upload some documents and ask questions!',
		});
	});

	it('reports insufficient data when no query has a score', () => {
		expect(summarizeSimilarity([null, null])).toEqual({
			status: 'insufficient-data',
			totalQueries: 2,
			message: 'No similarity scores available yet',
		});
	});
});

describe('meanOf / bandCounts', () => {
	it('averages scores and returns null for none', () => {
		expect(meanOf([0.2, 0.4])).toBeCloseTo(0.3, 10);
		expect(meanOf([])).toBeNull();
	});

	it('counts scored queries per band', () => {
		expect(bandCounts([0.9, 0.75, 0.5, 0.1, null])).toEqual({
			'on-topic': 2,
			'possibly-relevant': 1,
			'off-topic': 1,
		});
	});
});
