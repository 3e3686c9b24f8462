/**
 * Question-answering API routes, mounted under /api/v1.
 */

import type { QAService } from '@core/service';
import { isPdfFilename } from '@ingest/pdf';
import { childLogger, scrubSecretsFromText } from '@obs/logger';
import { ConfigurationError, InputError, isRetrievalError } from '@rag/errors';
import { type Request, type Response, Router } from 'express';
import { z } from 'zod';

const QueryRequestZ = z.object({
	question: z.string().trim().min(1, 'question must not be empty'),
	top_k: z.number().int().positive().max(50).optional(),
});

export function statusForError(err: unknown): number {
	if (err instanceof InputError || err instanceof ConfigurationError) {
		return 400;
	}
	return 500;
}

function sendError(res: Response, err: unknown, prefix?: string) {
	const status = statusForError(err);
	const message = err instanceof Error ? err.message : String(err);
	const detail = scrubSecretsFromText(prefix ? `${prefix}: ${message}` : message);
	childLogger({ area: 'http' }).log(status >= 500 ? 'error' : 'warn', {
		msg: 'http.request-failed',
		status,
		code: isRetrievalError(err) ? err.code : undefined,
		error: message,
	});
	res.status(status).json({ detail });
}

function uploadFilename(req: Request): string | undefined {
	const fromQuery = req.query.filename;
	if (typeof fromQuery === 'string' && fromQuery.trim()) {
		return fromQuery.trim();
	}
	return req.get('x-filename')?.trim() || undefined;
}

export function createQARoutes(service: QAService): Router {
	const router = Router();

	/**
	 * POST /ingest
	 * Raw PDF body; filename via ?filename= or X-Filename.
	 */
	router.post('/ingest', async (req: Request, res: Response) => {
		const filename = uploadFilename(req);
		if (!filename || !isPdfFilename(filename)) {
			res.status(400).json({
				detail: 'Only PDF files are supported. Please upload a .pdf file.',
			});
			return;
		}
		const body: unknown = req.body;
		if (!Buffer.isBuffer(body) || body.length === 0) {
			res.status(400).json({
				detail: 'Request body must be the PDF bytes (Content-Type: application/pdf).',
			});
			return;
		}

		try {
			const summary = await service.ingestPdf(new Uint8Array(body), filename);
			res.json({
				message: 'PDF processed and added to knowledge base successfully',
				filename: summary.filename,
				doc_id: summary.docId,
				num_chunks: summary.chunkCount,
				total_text_length: summary.totalTextLength,
				avg_chunk_length: summary.avgChunkLength,
			});
		} catch (error) {
			sendError(res, error, 'Document processing failed');
		}
	});

	/**
	 * POST /query
	 * { question } → { answer, similarity_score, sources }
	 */
	router.post('/query', async (req: Request, res: Response) => {
		const parsed = QueryRequestZ.safeParse(req.body);
		if (!parsed.success) {
			res.status(400).json({
				detail: parsed.error.issues.map((i) => i.message).join('; '),
			});
			return;
		}

		try {
			const result = await service.ask(parsed.data.question, parsed.data.top_k);
			res.json({
				answer: result.answer,
				similarity_score: result.similarity ?? 0,
				sources: result.sources,
			});
		} catch (error) {
			sendError(res, error);
		}
	});

	/** GET /history — last 10 queries, newest first. */
	router.get('/history', (_req: Request, res: Response) => {
		try {
			res.json(
				service.history(10).map((q) => ({
					id: q.id,
					query: q.question,
					response: q.answer,
					timestamp: q.timestamp,
					similarity: q.meanSimilarity,
				}))
			);
		} catch (error) {
			sendError(res, error);
		}
	});

	/** GET /metrics — similarity statistics over all logged queries. */
	router.get('/metrics', (_req: Request, res: Response) => {
		try {
			const report = service.metrics();
			if (report.status === 'insufficient-data') {
				res.json({ message: report.message });
				return;
			}
			res.json({
				total_queries: report.totalQueries,
				avg_similarity: report.mean,
				min_similarity: report.min,
				max_similarity: report.max,
				similarity_std: report.std,
				performance_hint: report.hint,
			});
		} catch (error) {
			sendError(res, error);
		}
	});

	/** GET /documents — ingested documents, newest first. */
	router.get('/documents', (_req: Request, res: Response) => {
		try {
			res.json(
				service.documents().map((d) => ({
					doc_id: d.docId,
					filename: d.filename,
					num_chunks: d.chunkCount,
					timestamp: d.timestamp,
					total_text_length: d.totalTextLength,
					avg_chunk_size: d.avgChunkSize,
				}))
			);
		} catch (error) {
			sendError(res, error);
		}
	});

	return router;
}
