import pkg from '../../package.json';

export const VERSION: string | null =
	typeof pkg.version === 'string' ? pkg.version : null;

export function getBuildInfo() {
	const platform = `${process.platform} ${process.arch}`;

	const commit =
		process.env.GIT_COMMIT || process.env.GITHUB_SHA || 'dev';

	return {
		name: pkg.name,
		version: VERSION,
		nodeVersion: process.versions.node,
		platform,
		commit,
	};
}

export function formatBuildInfo() {
	const i = getBuildInfo();
	return [
		`${i.name} v${i.version ?? '0.0.0'}`,
		`Runtime: Node.js v${i.nodeVersion}`,
		`Platform: ${i.platform}`,
		`Build: ${i.commit}`,
	].join('\n');
}
