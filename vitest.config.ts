import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
	test: {
		environment: 'node',
		globals: true,
		include: ['src/tests/**/*.test.ts'],
		coverage: {
			provider: 'v8',
		},
	},
	resolve: {
		alias: {
			'@cli': path.resolve(root, 'src/cli'),
			'@core': path.resolve(root, 'src/core'),
			'@ingest': path.resolve(root, 'src/ingest'),
			'@obs': path.resolve(root, 'src/obs'),
			'@provider': path.resolve(root, 'src/provider'),
			'@rag': path.resolve(root, 'src/rag'),
			'@server': path.resolve(root, 'src/server'),
			'@store': path.resolve(root, 'src/store'),
			'@util': path.resolve(root, 'src/util'),
		},
	},
});
