import crypto from 'node:crypto';
import { childLogger } from '@obs/logger';
import { InputError } from '@rag/errors';
import type { DocumentRetriever } from '@rag/retriever';
import type { DocumentLogRecord } from '@store/logs';
import { type ChunkingConfig, chunkDocument } from './chunking';
import { extractPdfText, isPdfFilename, type PdfExtractionOptions } from './pdf';

export interface IngestionSummary {
	docId: string;
	filename: string;
	chunkCount: number;
	totalTextLength: number;
	avgChunkLength: number;
	extraction: 'primary' | 'fallback' | 'text';
}

export interface DocumentIngestorOptions {
	chunking: ChunkingConfig;
	pdf?: PdfExtractionOptions;
	newDocId?: () => string;
}

export function toDocumentLog(
	summary: IngestionSummary,
	timestamp = new Date().toISOString()
): DocumentLogRecord {
	return {
		docId: summary.docId,
		filename: summary.filename,
		chunkCount: summary.chunkCount,
		totalTextLength: summary.totalTextLength,
		avgChunkLength: summary.avgChunkLength,
		timestamp,
	};
}

/** PDF bytes → text → chunks → retriever. */
export class DocumentIngestor {
	private readonly log = childLogger({ area: 'ingest' });
	private readonly newDocId: () => string;

	constructor(
		private readonly retriever: DocumentRetriever,
		private readonly opts: DocumentIngestorOptions
	) {
		this.newDocId = opts.newDocId ?? (() => crypto.randomUUID());
	}

	async ingestPdf(bytes: Uint8Array, filename: string): Promise<IngestionSummary> {
		if (!isPdfFilename(filename)) {
			throw new InputError(
				'Only PDF files are supported. Please upload a .pdf file.'
			);
		}
		if (bytes.byteLength === 0) {
			throw new InputError(`Uploaded file ${filename} is empty`);
		}
		const { text, strategy } = await extractPdfText(bytes, this.opts.pdf);
		return await this.ingestText(text, filename, strategy);
	}

	async ingestText(
		text: string,
		filename: string,
		extraction: IngestionSummary['extraction'] = 'text'
	): Promise<IngestionSummary> {
		if (!text.trim()) {
			throw new InputError(`No text to ingest from ${filename}`);
		}

		const docId = this.newDocId();
		const { chunks, metadata } = chunkDocument(
			text,
			docId,
			filename,
			this.opts.chunking
		);
		if (chunks.length === 0) {
			throw new InputError('Document text could not be split into chunks');
		}

		await this.retriever.addChunks(chunks, metadata);

		const textLength = [...text].length; // code points
		const summary: IngestionSummary = {
			docId,
			filename,
			chunkCount: chunks.length,
			totalTextLength: textLength,
			avgChunkLength: Math.floor(textLength / chunks.length),
			extraction,
		};
		this.log.info({ msg: 'ingest.document-added', ...summary });
		return summary;
	}
}
