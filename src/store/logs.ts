import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '@obs/logger';
import { logsDir } from '@util/paths';
import { z } from 'zod';

export const QueryLogRecordZ = z.object({
	id: z.string(),
	question: z.string(),
	answer: z.string(),
	meanSimilarity: z.number().nullable(),
	timestamp: z.string(),
});

export const DocumentLogRecordZ = z.object({
	docId: z.string(),
	filename: z.string(),
	chunkCount: z.number().int().nonnegative(),
	totalTextLength: z.number().int().nonnegative().nullable(),
	avgChunkLength: z.number().int().nonnegative().nullable(),
	timestamp: z.string(),
});

export type QueryLogRecord = z.infer<typeof QueryLogRecordZ>;
export type DocumentLogRecord = z.infer<typeof DocumentLogRecordZ>;

export interface DocumentView extends DocumentLogRecord {
	avgChunkSize: number;
}

const QUERY_FILE = 'queries.jsonl';
const DOCUMENT_FILE = 'documents.jsonl';

function ensureDir(p: string) {
	if (!fs.existsSync(p)) {
		fs.mkdirSync(p, { recursive: true });
		if (process.platform !== 'win32') {
			fs.chmodSync(p, 0o700);
		}
	}
}

function byTimestampDesc<T extends { timestamp: string }>(a: T, b: T): number {
	return b.timestamp.localeCompare(a.timestamp);
}

/**
 * Append-only JSONL logs of answered queries and ingested documents.
 * Lines that fail to parse or validate are skipped on read.
 */
export class LogStore {
	readonly dir: string;

	constructor(dataDir: string) {
		this.dir = logsDir(dataDir);
	}

	appendQuery(
		rec: Omit<QueryLogRecord, 'id' | 'timestamp'> &
			Partial<Pick<QueryLogRecord, 'id' | 'timestamp'>>
	): QueryLogRecord {
		const full: QueryLogRecord = {
			id: rec.id ?? crypto.randomUUID(),
			question: rec.question,
			answer: rec.answer,
			meanSimilarity: rec.meanSimilarity,
			timestamp: rec.timestamp ?? new Date().toISOString(),
		};
		this.append(QUERY_FILE, full);
		return full;
	}

	appendDocument(rec: DocumentLogRecord): DocumentLogRecord {
		this.append(DOCUMENT_FILE, rec);
		return rec;
	}

	readQueries(): QueryLogRecord[] {
		return this.readAll(QUERY_FILE, QueryLogRecordZ);
	}

	readDocuments(): DocumentLogRecord[] {
		return this.readAll(DOCUMENT_FILE, DocumentLogRecordZ);
	}

	/** Newest first; entries with equal timestamps keep reverse log order. */
	recentQueries(limit = 10): QueryLogRecord[] {
		return this.readQueries().reverse().sort(byTimestampDesc).slice(0, limit);
	}

	/** One entry per logged query, in log order; null when nothing was retrieved. */
	similarityHistory(): Array<number | null> {
		return this.readQueries().map((q) => q.meanSimilarity);
	}

	/** Newest first, with the average characters per chunk. */
	listDocuments(): DocumentView[] {
		return this.readDocuments()
			.reverse()
			.sort(byTimestampDesc)
			.map((d) => ({
				...d,
				avgChunkSize:
					d.chunkCount > 0 && d.totalTextLength !== null
						? Math.floor(d.totalTextLength / d.chunkCount)
						: 0,
			}));
	}

	private append(file: string, rec: unknown) {
		ensureDir(this.dir);
		fs.appendFileSync(path.join(this.dir, file), `${JSON.stringify(rec)}\n`, {
			encoding: 'utf8',
		});
	}

	private readAll<T>(file: string, schema: z.ZodType<T>): T[] {
		const p = path.join(this.dir, file);
		if (!fs.existsSync(p)) {
			return [];
		}
		const out: T[] = [];
		const raw = fs.readFileSync(p, 'utf8');
		let skipped = 0;
		for (const line of raw.split('\n')) {
			const s = line.trim();
			if (!s) {
				continue;
			}
			let data: unknown;
			try {
				data = JSON.parse(s);
			} catch {
				skipped++;
				continue;
			}
			const parsed = schema.safeParse(data);
			if (parsed.success) {
				out.push(parsed.data);
			} else {
				skipped++;
			}
		}
		if (skipped > 0) {
			getLogger().warn({ msg: 'logs.skipped-lines', file: p, skipped });
		}
		return out;
	}
}
