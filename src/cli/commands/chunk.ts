/** biome-ignore-all lint/suspicious/noConsole: tbd */

import fs from 'node:fs';
import path from 'node:path';
import {
	type ChunkingConfig,
	type ChunkStrategy,
	resolveChunkingConfig,
	splitText,
} from '@ingest/chunking';
import { extractPdfText, isPdfFilename } from '@ingest/pdf';
import { ConfigurationError } from '@rag/errors';
import type { Command } from 'commander';
import { emitCliError, loadRuntimeConfig, toInt, toOpt } from '../shared';

export interface ChunkCliOptions {
	file: string;
	strategy?: string;
	size?: number;
	overlap?: number;
	json?: boolean;
	cwd?: string;
}

function toStrategy(v: string | undefined): ChunkStrategy | undefined {
	if (v === undefined) {
		return;
	}
	const s = v.toLowerCase().trim();
	if (s === 'fixed' || s === 'sentence') {
		return s;
	}
	throw new ConfigurationError(
		`Unknown chunking strategy: ${v} (expected fixed|sentence)`
	);
}

async function readDocumentText(
	abs: string,
	minChars: number
): Promise<string> {
	if (isPdfFilename(abs)) {
		const { text } = await extractPdfText(
			new Uint8Array(fs.readFileSync(abs)),
			{ minChars }
		);
		return text;
	}
	return fs.readFileSync(abs, 'utf8');
}

/** Preview how a document would be split, without embedding anything. */
export async function handleChunkCommand(opts: ChunkCliOptions): Promise<number> {
	const cwd = opts.cwd ?? process.cwd();
	try {
		const { config } = loadRuntimeConfig(cwd);
		const cfg: ChunkingConfig = resolveChunkingConfig({
			...config.chunking,
			strategy: toStrategy(opts.strategy) ?? config.chunking.strategy,
			targetSize: opts.size ?? config.chunking.targetSize,
			overlapSize: opts.overlap ?? config.chunking.overlapSize,
		});

		const abs = path.resolve(cwd, opts.file);
		const text = await readDocumentText(abs, config.ingestion.minExtractedChars);
		const chunks = splitText(text, cfg);

		if (opts.json) {
			process.stdout.write(
				`${JSON.stringify({
					file: path.basename(abs),
					strategy: cfg.strategy,
					targetSize: cfg.targetSize,
					overlapSize: cfg.overlapSize,
					chunks: chunks.map((c, i) => ({
						index: i,
						words: c.split(/\s+/).filter(Boolean).length,
						text: c,
					})),
				})}\n`
			);
			return 0;
		}

		console.log(
			`${path.basename(abs)}: ${chunks.length} chunk(s), strategy=${cfg.strategy} size=${cfg.targetSize} overlap=${cfg.overlapSize}`
		);
		chunks.forEach((c, i) => {
			const n = c.split(/\s+/).filter(Boolean).length;
			const preview = c.length > 80 ? `${c.slice(0, 80)}...` : c;
			console.log(`[${i}] (${n} words) ${preview}`);
		});
		return 0;
	} catch (err) {
		return emitCliError(err, opts.json);
	}
}

export function registerChunkCommand(program: Command): void {
	program
		.command('chunk <file>')
		.description('Split a PDF or text file into chunks and print them')
		.option('-s, --strategy <name>', 'fixed|sentence')
		.option('--size <words>', 'Target chunk size in words')
		.option('--overlap <words>', 'Overlap between chunks in words')
		.option('--json', 'Output JSON')
		.action(async (file: string, flags: Record<string, unknown>) => {
			process.exitCode = await handleChunkCommand({
				file,
				strategy: toOpt(flags.strategy),
				size: toInt(flags.size),
				overlap: toInt(flags.overlap),
				json: flags.json === true,
			});
		});
}
