import pkg from '../../package.json' with { type: 'json' };

export const VERSION: string = pkg.version;

export function getBuildInfo() {
	const platform = `${process.platform} ${process.arch}`;

	const commit =
		process.env.GIT_COMMIT || process.env.GITHUB_SHA || 'dev';

	const buildDate = process.env.BUILD_DATE || new Date().toISOString();

	return {
		name: pkg.name,
		version: VERSION,
		nodeVersion: process.versions.node,
		platform,
		commit,
		buildDate,
	};
}

export function formatBuildInfo() {
	const i = getBuildInfo();
	return [
		`${i.name} v${i.version}`,
		`Runtime: Node.js v${i.nodeVersion}`,
		`Platform: ${i.platform}`,
		`Build: ${i.commit} @ ${i.buildDate}`,
	].join('\n');
}
