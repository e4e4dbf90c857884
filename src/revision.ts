import createDebug from 'debug';
import { RevisionProbeError, toError } from './errors';
import type { LauncherConfig } from './types';

const debug = createDebug('pylaunch:revision');

/**
 * Asks version control for the revision of the launcher's source tree.
 * Never rejects: any failure is reported as a `RevisionProbeError` and
 * the revision is treated as unknown (`null`).
 */
export async function getCurrentRevision({
	git,
	baseDir,
	runCommand
}: LauncherConfig): Promise<string | null> {
	let error: RevisionProbeError;
	try {
		const { exitCode, output } = await runCommand(
			[git, 'rev-parse', 'HEAD'],
			{ cwd: baseDir }
		);
		const revision = output.trim();
		if (exitCode === 0 && revision) {
			debug('Current revision is %o', revision);
			return revision;
		}
		error = new RevisionProbeError(
			`\`${git} rev-parse HEAD\` exited with code ${exitCode}`
		);
	} catch (err) {
		error = new RevisionProbeError(toError(err).message);
	}
	debug('Revision probe failed: %s', error.message);
	console.log('No git repository found or failed to get commit hash.');
	return null;
}

/**
 * The revision query runs at most once per bootstrap, and only when
 * something asks for it.
 */
export function lazyRevision(
	config: LauncherConfig
): () => Promise<string | null> {
	let p: Promise<string | null> | undefined;
	return function currentRevision() {
		if (!p) {
			p = getCurrentRevision(config);
		}
		return p;
	};
}
