/** biome-ignore-all lint/suspicious/noConsole: tbd */

import { bandCounts, summarizeSimilarity } from '@rag/quality';
import { resolveDataDir } from '@store/config';
import { LogStore } from '@store/logs';
import type { Command } from 'commander';
import { emitCliError, loadRuntimeConfig, toInt } from '../shared';

interface LogCliOptions {
	json?: boolean;
	cwd?: string;
}

function openLogs(cwd: string): LogStore {
	const { config } = loadRuntimeConfig(cwd);
	return new LogStore(resolveDataDir(config, cwd));
}

function fmtScore(s: number | null): string {
	return s === null ? '-' : s.toFixed(3);
}

export function handleHistoryCommand(
	opts: LogCliOptions & { limit?: number }
): number {
	try {
		const rows = openLogs(opts.cwd ?? process.cwd()).recentQueries(
			opts.limit ?? 10
		);
		if (opts.json) {
			process.stdout.write(`${JSON.stringify(rows)}\n`);
			return 0;
		}
		if (rows.length === 0) {
			console.log('No queries logged yet.');
			return 0;
		}
		for (const r of rows) {
			console.log(`${r.timestamp}\t${fmtScore(r.meanSimilarity)}\t${r.question}`);
		}
		return 0;
	} catch (err) {
		return emitCliError(err, opts.json);
	}
}

export function handleMetricsCommand(opts: LogCliOptions): number {
	try {
		const history = openLogs(opts.cwd ?? process.cwd()).similarityHistory();
		const report = summarizeSimilarity(history);
		if (opts.json) {
			process.stdout.write(
				`${JSON.stringify({ ...report, bands: bandCounts(history) })}\n`
			);
			return 0;
		}
		if (report.status === 'insufficient-data') {
			console.log(report.message);
			return 0;
		}
		const bands = bandCounts(history);
		console.log(`Queries:     ${report.totalQueries} (${report.scoredQueries} scored)`);
		console.log(`Mean:        ${report.mean.toFixed(3)}`);
		console.log(`Min / Max:   ${report.min.toFixed(3)} / ${report.max.toFixed(3)}`);
		console.log(`Std dev:     ${report.std.toFixed(3)}`);
		console.log(
			`Bands:       on-topic ${bands['on-topic']}, possibly-relevant ${bands['possibly-relevant']}, off-topic ${bands['off-topic']}`
		);
		console.log(`Performance: ${report.hint}`);
		return 0;
	} catch (err) {
		return emitCliError(err, opts.json);
	}
}

export function handleDocumentsCommand(opts: LogCliOptions): number {
	try {
		const docs = openLogs(opts.cwd ?? process.cwd()).listDocuments();
		if (opts.json) {
			process.stdout.write(`${JSON.stringify(docs)}\n`);
			return 0;
		}
		if (docs.length === 0) {
			console.log('No documents ingested yet.');
			return 0;
		}
		console.log(['Timestamp', 'Chunks', 'Avg chars', 'File'].join('\t'));
		for (const d of docs) {
			console.log(
				[d.timestamp, d.chunkCount, d.avgChunkSize, d.filename].join('\t')
			);
		}
		return 0;
	} catch (err) {
		return emitCliError(err, opts.json);
	}
}

export function registerLogCommands(program: Command): void {
	program
		.command('history')
		.description('Show recent questions, newest first')
		.option('-n, --limit <n>', 'How many entries to show', '10')
		.option('--json', 'Output JSON')
		.action((flags: Record<string, unknown>) => {
			process.exitCode = handleHistoryCommand({
				limit: toInt(flags.limit),
				json: flags.json === true,
			});
		});

	program
		.command('metrics')
		.description('Similarity statistics over all logged questions')
		.option('--json', 'Output JSON')
		.action((flags: Record<string, unknown>) => {
			process.exitCode = handleMetricsCommand({ json: flags.json === true });
		});

	program
		.command('documents')
		.description('List ingested documents')
		.option('--json', 'Output JSON')
		.action((flags: Record<string, unknown>) => {
			process.exitCode = handleDocumentsCommand({
				json: flags.json === true,
			});
		});
}
