import path from 'node:path';

export function getProjectDataDir(cwd = process.cwd()): string {
	return path.join(cwd, '.campus-rag');
}

/** Default on-disk location of the local vector store. */
export function defaultLocalIndexDir(cwd = process.cwd()): string {
	return path.join(getProjectDataDir(cwd), 'indexes', 'lancedb');
}
