import { childLogger } from '@obs/logger';
import { InputError } from '@rag/errors';

export type PdfTextExtractor = (bytes: Uint8Array) => Promise<string>;

export interface PdfExtractionOptions {
	/** Primary output shorter than this (after trim) triggers the fallback. */
	minChars?: number;
	primary?: PdfTextExtractor;
	fallback?: PdfTextExtractor;
}

export interface PdfExtraction {
	text: string;
	strategy: 'primary' | 'fallback';
}

export const DEFAULT_MIN_EXTRACTED_CHARS = 100;

/** Fast path: unpdf with pages merged into one string. */
export const extractWithUnpdf: PdfTextExtractor = async (bytes) => {
	const { extractText, getDocumentProxy } = await import('unpdf');
	const pdf = await getDocumentProxy(new Uint8Array(bytes));
	const { text } = await extractText(pdf, { mergePages: true });
	return text;
};

/**
 * Slower path: text content page by page, pages separated by a blank line.
 * Goes through the pdfjs build that unpdf bundles, since a second pdfjs copy
 * refuses the worker unpdf has already registered.
 */
export const extractPageByPage: PdfTextExtractor = async (bytes) => {
	const { getDocumentProxy } = await import('unpdf');
	const doc = await getDocumentProxy(new Uint8Array(bytes), {
		isEvalSupported: false,
	});
	try {
		const pages: string[] = [];
		for (let pageNum = 1; pageNum <= doc.numPages; pageNum++) {
			const page = await doc.getPage(pageNum);
			const content = await page.getTextContent();
			const pageText = content.items
				.map((item) => ('str' in item ? item.str : ''))
				.join(' ')
				.trim();
			if (pageText) {
				pages.push(pageText);
			}
		}
		return pages.join('\n\n');
	} finally {
		await doc.destroy();
	}
};

/**
 * Pure fallback decision: keep the primary text unless it is missing or
 * shorter than `minChars` once trimmed.
 */
export function chooseExtraction(
	primaryText: string | null,
	minChars: number
): 'primary' | 'fallback' {
	if (primaryText === null) {
		return 'fallback';
	}
	return primaryText.trim().length < minChars ? 'fallback' : 'primary';
}

export function isPdfFilename(filename: string): boolean {
	return filename.toLowerCase().endsWith('.pdf');
}

export async function extractPdfText(
	bytes: Uint8Array,
	opts: PdfExtractionOptions = {}
): Promise<PdfExtraction> {
	const log = childLogger({ area: 'pdf' });
	const minChars = opts.minChars ?? DEFAULT_MIN_EXTRACTED_CHARS;
	const primary = opts.primary ?? extractWithUnpdf;
	const fallback = opts.fallback ?? extractPageByPage;

	let primaryText: string | null = null;
	try {
		primaryText = await primary(bytes);
	} catch (err) {
		log.warn({
			msg: 'pdf.primary-failed',
			error: err instanceof Error ? err.message : String(err),
		});
	}

	let result: PdfExtraction;
	if (
		primaryText !== null &&
		chooseExtraction(primaryText, minChars) === 'primary'
	) {
		result = { text: primaryText, strategy: 'primary' };
	} else {
		log.debug({
			msg: 'pdf.fallback',
			primaryChars: primaryText?.trim().length ?? null,
			minChars,
		});
		result = { text: await fallback(bytes), strategy: 'fallback' };
	}

	if (!result.text.trim()) {
		throw new InputError(
			'No text could be extracted from this PDF. It might be a scanned document that needs OCR.'
		);
	}
	return result;
}
