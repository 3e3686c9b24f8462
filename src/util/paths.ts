import os from 'node:os';
import path from 'node:path';

export const DOCQA_DIR_NAME = '.docqa';

export function getProjectDocqaDir(cwd = process.cwd()) {
	return path.join(cwd, DOCQA_DIR_NAME);
}

export function getUserDocqaDir() {
	return path.join(os.homedir(), DOCQA_DIR_NAME);
}

export function logsDir(dataDir: string): string {
	return path.join(dataDir, 'logs');
}
