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
			'@obs': path.resolve(root, 'src/obs'),
			'@util': path.resolve(root, 'src/util'),
			'@store': path.resolve(root, 'src/store'),
			'@provider': path.resolve(root, 'src/provider'),
			'@rag': path.resolve(root, 'src/rag'),
		},
	},
});
