import type { Embedder } from '@rag/embeddings';
import { ConfigurationError, IndexCorruptionError, InputError } from '@rag/errors';
import { DocumentRetriever, interpretSimilarity } from '@rag/retriever';
import { describe, expect, it } from 'vitest';
import { KeywordEmbedder } from '../helpers/fakes';

const VOCAB = ['cat', 'dog', 'fish'];

describe('DocumentRetriever', () => {
	it('returns empty results on an empty index without embedding', async () => {
		const embedder = new KeywordEmbedder(VOCAB);
		const r = new DocumentRetriever(embedder);
		await expect(r.findRelevantChunks('cat?')).resolves.toEqual({
			chunks: [],
			scores: [],
			records: [],
		});
		expect(embedder.calls).toHaveLength(0);
	});

	it('rejects k that is not a positive integer', async () => {
		const r = new DocumentRetriever(new KeywordEmbedder(VOCAB));
		await expect(r.findRelevantChunks('cat', 0)).rejects.toBeInstanceOf(
			ConfigurationError
		);
		await expect(r.findRelevantChunks('cat', 1.5)).rejects.toBeInstanceOf(
			ConfigurationError
		);
	});

	it('ranks seeded documents by cosine similarity', async () => {
		const r = new DocumentRetriever(new KeywordEmbedder(VOCAB));
		await r.buildInitial(['cat cat', 'dog', 'fish dog']);

		const res = await r.findRelevantChunks('where is the cat', 2);
		expect(res.chunks).toEqual(['cat cat', 'dog']);
		expect(res.scores[0]).toBeCloseTo(1, 5);
		expect(res.scores[1]).toBeCloseTo(0, 6);
		expect(res.records[0].metadata).toEqual({
			text: 'cat cat',
			source: 'system',
		});
	});

	it('returns at most the default of 5 chunks', async () => {
		const r = new DocumentRetriever(new KeywordEmbedder(VOCAB));
		await r.buildInitial(['cat', 'dog', 'fish', 'cat dog', 'dog fish', 'fish cat', 'cat dog fish']);
		const res = await r.findRelevantChunks('cat');
		expect(res.chunks).toHaveLength(5);
		expect(res.scores).toHaveLength(5);
	});

	it('replaces the index on buildInitial', async () => {
		const r = new DocumentRetriever(new KeywordEmbedder(VOCAB));
		await r.buildInitial(['cat', 'dog']);
		await r.buildInitial(['fish']);
		expect(r.stats()).toEqual({ chunks: 1, dimension: 3, model: 'keyword-test' });
	});

	it('adds chunks with default uploaded metadata', async () => {
		const r = new DocumentRetriever(new KeywordEmbedder(VOCAB));
		await r.addChunks(['fish fish']);
		const res = await r.findRelevantChunks('fish', 1);
		expect(res.records[0].metadata).toEqual({
			text: 'fish fish',
			source: 'uploaded',
		});
	});

	it('keeps caller metadata aligned with chunks', async () => {
		const r = new DocumentRetriever(new KeywordEmbedder(VOCAB));
		await r.addChunks(
			['dog', 'cat'],
			[
				{ chunkId: 'd_0', docId: 'd', filename: 'a.pdf', chunkIndex: 0, source: 'uploaded', text: 'dog' },
				{ chunkId: 'd_1', docId: 'd', filename: 'a.pdf', chunkIndex: 1, source: 'uploaded', text: 'cat' },
			]
		);
		const res = await r.findRelevantChunks('cat', 1);
		expect(res.chunks).toEqual(['cat']);
		expect(res.records[0].metadata.chunkId).toBe('d_1');
	});

	it('rejects mismatched metadata before embedding', async () => {
		const embedder = new KeywordEmbedder(VOCAB);
		const r = new DocumentRetriever(embedder);
		await expect(
			r.addChunks(['a', 'b'], [{ text: 'a', source: 'uploaded' }])
		).rejects.toBeInstanceOf(InputError);
		expect(embedder.calls).toHaveLength(0);
		expect(r.stats().chunks).toBe(0);
	});

	it('rejects metadata for an empty batch', async () => {
		const r = new DocumentRetriever(new KeywordEmbedder(VOCAB));
		await expect(
			r.addChunks([], [{ text: 'x', source: 'uploaded' }])
		).rejects.toBeInstanceOf(InputError);
	});

	it('ignores an empty batch', async () => {
		const embedder = new KeywordEmbedder(VOCAB);
		const r = new DocumentRetriever(embedder);
		await r.addChunks([]);
		expect(embedder.calls).toHaveLength(0);
		expect(r.stats().chunks).toBe(0);
	});

	it('leaves the index unchanged when a batch has a different dimension', async () => {
		let dim = 2;
		const embedder: Embedder = {
			model: 'shifting',
			embed: (texts) =>
				Promise.resolve(texts.map(() => Array.from({ length: dim }, () => 1))),
		};
		const r = new DocumentRetriever(embedder);
		await r.addChunks(['a']);
		dim = 3;
		await expect(r.addChunks(['b'])).rejects.toBeInstanceOf(IndexCorruptionError);
		expect(r.stats()).toEqual({ chunks: 1, dimension: 2, model: 'shifting' });
	});

	it('serialises concurrent adds and queries', async () => {
		const r = new DocumentRetriever(new KeywordEmbedder(VOCAB));
		await r.buildInitial(['cat']);

		const ops: Array<Promise<unknown>> = [];
		for (let i = 0; i < 10; i++) {
			ops.push(r.addChunks([`dog ${i}`, `fish ${i}`]));
			ops.push(
				r.findRelevantChunks('dog fish', 3).then((res) => {
					expect(res.chunks).toHaveLength(res.scores.length);
					expect(res.records).toHaveLength(res.scores.length);
				})
			);
		}
		await Promise.all(ops);
		expect(r.stats().chunks).toBe(21);
	});
});

describe('interpretSimilarity', () => {
	it('maps scores to bands', () => {
		expect(interpretSimilarity(0.71)).toBe('on-topic');
		expect(interpretSimilarity(0.7)).toBe('possibly-relevant');
		expect(interpretSimilarity(0.4)).toBe('possibly-relevant');
		expect(interpretSimilarity(0.39)).toBe('off-topic');
		expect(interpretSimilarity(-0.2)).toBe('off-topic');
	});
});
