/** biome-ignore-all lint/suspicious/noConsole: tbd */

import fs from 'node:fs';
import path from 'node:path';
import {
	type AskResult,
	type CreateQAServiceOptions,
	createQAService,
} from '@core/service';
import type { IngestionSummary } from '@ingest/pipeline';
import { isPdfFilename } from '@ingest/pdf';
import type { Command } from 'commander';
import { emitCliError, loadRuntimeConfig, toInt, toList } from '../shared';

export interface AskCliOptions {
	question: string;
	files?: string[]; // ingested before the question is answered
	topK?: number;
	json?: boolean;
	cwd?: string;
}

/**
 * One-shot pipeline: build the index (seed + --file documents), answer, log.
 * The index lives only for this process.
 */
export async function handleAskCommand(
	opts: AskCliOptions,
	serviceOpts: CreateQAServiceOptions = {}
): Promise<number> {
	const cwd = opts.cwd ?? process.cwd();
	try {
		const { config } = loadRuntimeConfig(cwd);
		const service = await createQAService(config, { cwd, ...serviceOpts });

		const ingested: IngestionSummary[] = [];
		for (const file of opts.files ?? []) {
			const abs = path.resolve(cwd, file);
			const name = path.basename(abs);
			ingested.push(
				isPdfFilename(name)
					? await service.ingestPdf(new Uint8Array(fs.readFileSync(abs)), name)
					: await service.ingestText(fs.readFileSync(abs, 'utf8'), name)
			);
		}

		const result = await service.ask(opts.question, opts.topK);
		if (opts.json) {
			process.stdout.write(`${JSON.stringify(toJson(result, ingested))}\n`);
		} else {
			printAnswer(result);
		}
		return result.ok ? 0 : 1;
	} catch (err) {
		return emitCliError(err, opts.json);
	}
}

function toJson(result: AskResult, ingested: IngestionSummary[]) {
	return {
		ok: result.ok,
		answer: result.answer,
		similarity_score: result.similarity ?? 0,
		sources: result.sources.map((text, i) => ({
			text,
			score: result.scores[i],
			band: result.bands[i],
		})),
		ingested: ingested.map((d) => ({
			filename: d.filename,
			doc_id: d.docId,
			num_chunks: d.chunkCount,
		})),
		log_id: result.logId,
	};
}

function printAnswer(result: AskResult) {
	console.log(result.answer);
	if (result.sources.length === 0) {
		return;
	}
	console.log('');
	console.log(
		`Sources (mean similarity ${(result.similarity ?? 0).toFixed(3)}):`
	);
	result.sources.forEach((text, i) => {
		const preview = text.length > 100 ? `${text.slice(0, 100)}...` : text;
		console.log(
			`  ${i + 1}. [${result.scores[i]?.toFixed(3)} ${result.bands[i]}] ${preview}`
		);
	});
}

export function registerAskCommand(program: Command): void {
	program
		.command('ask <question>')
		.description('Answer a question from the knowledge base')
		.option(
			'-f, --file <path...>',
			'PDF (or plain text) documents to ingest first'
		)
		.option('-k, --top-k <n>', 'Number of chunks to retrieve')
		.option('--json', 'Output a JSON envelope')
		.action(async (question: string, flags: Record<string, unknown>) => {
			process.exitCode = await handleAskCommand({
				question,
				files: toList(flags.file),
				topK: toInt(flags.topK),
				json: flags.json === true,
			});
		});
}
