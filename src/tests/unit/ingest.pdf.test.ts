import {
	chooseExtraction,
	extractPageByPage,
	extractPdfText,
	extractWithUnpdf,
	isPdfFilename,
} from '@ingest/pdf';
import { InputError } from '@rag/errors';
import { describe, expect, it } from 'vitest';

const BYTES = new Uint8Array([0x25, 0x50, 0x44, 0x46]); // "%PDF"
const LONG = 'Quarterly results improved across every region. '.repeat(5);

/** One-page PDF; `line` is drawn in Helvetica, or nothing when omitted. */
function makePdf(line?: string): Uint8Array {
	const content = line ? `BT /F1 10 Tf 36 720 Td (${line}) Tj ET` : '';
	const objects = [
		'<< /Type /Catalog /Pages 2 0 R >>',
		'<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
		'<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 4 0 R >> >> /Contents 5 0 R >>',
		'<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
		`<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
	];
	let out = '%PDF-1.4\n';
	const offsets: number[] = [];
	objects.forEach((body, i) => {
		offsets.push(out.length);
		out += `${i + 1} 0 obj\n${body}\nendobj\n`;
	});
	const xrefAt = out.length;
	out += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
	for (const offset of offsets) {
		out += `${String(offset).padStart(10, '0')} 00000 n \n`;
	}
	out += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefAt}\n%%EOF\n`;
	return new TextEncoder().encode(out);
}

function extractor(text: string) {
	const calls: Uint8Array[] = [];
	const fn = (bytes: Uint8Array) => {
		calls.push(bytes);
		return Promise.resolve(text);
	};
	return { fn, calls };
}

describe('chooseExtraction', () => {
	it('keeps primary text of at least minChars', () => {
		expect(chooseExtraction('x'.repeat(100), 100)).toBe('primary');
		expect(chooseExtraction('  abc  ', 3)).toBe('primary');
	});

	it('falls back on short, blank or missing primary text', () => {
		expect(chooseExtraction('x'.repeat(99), 100)).toBe('fallback');
		expect(chooseExtraction('   \n  ', 1)).toBe('fallback');
		expect(chooseExtraction(null, 0)).toBe('fallback');
	});
});

describe('extractPdfText', () => {
	it('uses the primary extractor when it yields enough text', async () => {
		const primary = extractor(LONG);
		const fallback = extractor('unused');
		const res = await extractPdfText(BYTES, {
			primary: primary.fn,
			fallback: fallback.fn,
		});
		expect(res).toEqual({ text: LONG, strategy: 'primary' });
		expect(fallback.calls).toHaveLength(0);
	});

	it('falls back when the primary text is too short', async () => {
		const fallback = extractor('Recovered page text');
		const res = await extractPdfText(BYTES, {
			primary: extractor('tiny').fn,
			fallback: fallback.fn,
		});
		expect(res).toEqual({ text: 'Recovered page text', strategy: 'fallback' });
		expect(fallback.calls).toEqual([BYTES]);
	});

	it('falls back when the primary extractor throws', async () => {
		const res = await extractPdfText(BYTES, {
			primary: () => Promise.reject(new Error('bad xref table')),
			fallback: extractor(LONG).fn,
		});
		expect(res.strategy).toBe('fallback');
	});

	it('honours a custom minChars', async () => {
		const res = await extractPdfText(BYTES, {
			minChars: 4,
			primary: extractor('tiny').fn,
			fallback: extractor('unused').fn,
		});
		expect(res).toEqual({ text: 'tiny', strategy: 'primary' });
	});

	it('rejects documents with no extractable text', async () => {
		await expect(
			extractPdfText(BYTES, {
				primary: extractor('').fn,
				fallback: extractor('  ').fn,
			})
		).rejects.toThrow(
			new InputError(
				'No text could be extracted from this PDF. It might be a scanned document that needs OCR.'
			)
		);
	});
});

describe('extractPdfText on real documents', () => {
	const SENTENCE =
		'The annual report covers revenue growth in every region and the outlook for the next two fiscal years ahead';

	it('reads a text PDF with the primary extractor', async () => {
		const res = await extractPdfText(makePdf(SENTENCE));
		expect(res.strategy).toBe('primary');
		expect(res.text.trim()).toBe(SENTENCE);
	});

	it('falls back page by page after the primary ran on short text', async () => {
		const bytes = makePdf('Short text');
		expect((await extractWithUnpdf(bytes)).trim()).toBe('Short text');

		const res = await extractPdfText(bytes);
		expect(res).toEqual({ text: 'Short text', strategy: 'fallback' });
	});

	it('reads each page directly', async () => {
		expect(await extractPageByPage(makePdf('Page one body'))).toBe('Page one body');
	});

	it('reports a PDF without text as needing OCR', async () => {
		await expect(extractPdfText(makePdf())).rejects.toBeInstanceOf(InputError);
	});
});

describe('isPdfFilename', () => {
	it('matches the extension case-insensitively', () => {
		expect(isPdfFilename('report.PDF')).toBe(true);
		expect(isPdfFilename('notes.txt')).toBe(false);
		expect(isPdfFilename('pdf')).toBe(false);
	});
});
