import { resolveChunkingConfig } from '@ingest/chunking';
import { DocumentIngestor, toDocumentLog } from '@ingest/pipeline';
import { InputError } from '@rag/errors';
import { DocumentRetriever } from '@rag/retriever';
import { describe, expect, it } from 'vitest';
import { KeywordEmbedder } from '../helpers/fakes';

const TEXT = 'cat dog fish cat dog fish';

function setup(primaryText = 'unused') {
	const embedder = new KeywordEmbedder(['cat', 'dog', 'fish']);
	const retriever = new DocumentRetriever(embedder);
	let n = 0;
	const ingestor = new DocumentIngestor(retriever, {
		chunking: resolveChunkingConfig({ targetSize: 4, overlapSize: 0 }),
		pdf: {
			minChars: 1,
			primary: () => Promise.resolve(primaryText),
			fallback: () => Promise.resolve(''),
		},
		newDocId: () => `doc-${++n}`,
	});
	return { embedder, retriever, ingestor };
}

describe('DocumentIngestor', () => {
	it('chunks, embeds and summarises plain text', async () => {
		const { retriever, ingestor, embedder } = setup();
		const summary = await ingestor.ingestText(TEXT, 'animals.txt');

		expect(summary).toEqual({
			docId: 'doc-1',
			filename: 'animals.txt',
			chunkCount: 2,
			totalTextLength: 25,
			avgChunkLength: 12,
			extraction: 'text',
		});
		expect(embedder.calls).toEqual([['cat dog fish cat', 'dog fish']]);

		const res = await retriever.findRelevantChunks('fish', 2);
		expect(res.records.map((r) => r.metadata.chunkId).sort()).toEqual([
			'doc-1_0',
			'doc-1_1',
		]);
		expect(res.records[0].metadata.filename).toBe('animals.txt');
	});

	it('ingests PDF bytes through the extractor', async () => {
		const { ingestor } = setup(TEXT);
		const summary = await ingestor.ingestPdf(new Uint8Array([1, 2, 3]), 'zoo.pdf');
		expect(summary.extraction).toBe('primary');
		expect(summary.chunkCount).toBe(2);
	});

	it('rejects non-PDF uploads and empty files', async () => {
		const { ingestor } = setup(TEXT);
		await expect(
			ingestor.ingestPdf(new Uint8Array([1]), 'notes.docx')
		).rejects.toThrow('Only PDF files are supported. Please upload a .pdf file.');
		await expect(
			ingestor.ingestPdf(new Uint8Array(), 'empty.pdf')
		).rejects.toBeInstanceOf(InputError);
	});

	it('measures text length in code points', async () => {
		const { ingestor } = setup();
		const summary = await ingestor.ingestText('cat \u{1F41F} dog', 'emoji.txt');
		expect(summary.chunkCount).toBe(1);
		expect(summary.totalTextLength).toBe(9);
		expect(summary.avgChunkLength).toBe(9);
	});

	it('rejects blank text', async () => {
		const { ingestor, embedder } = setup();
		await expect(ingestor.ingestText(' \n ', 'blank.txt')).rejects.toBeInstanceOf(
			InputError
		);
		expect(embedder.calls).toHaveLength(0);
	});
});

describe('toDocumentLog', () => {
	it('keeps the summary fields and stamps the time', () => {
		expect(
			toDocumentLog(
				{
					docId: 'd',
					filename: 'f.pdf',
					chunkCount: 3,
					totalTextLength: 90,
					avgChunkLength: 30,
					extraction: 'fallback',
				},
				'2026-01-02T03:04:05.000Z'
			)
		).toEqual({
			docId: 'd',
			filename: 'f.pdf',
			chunkCount: 3,
			totalTextLength: 90,
			avgChunkLength: 30,
			timestamp: '2026-01-02T03:04:05.000Z',
		});
	});
});
