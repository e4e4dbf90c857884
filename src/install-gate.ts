import createDebug from 'debug';
import { isInstalled, readRecordedRevision } from './markers';
import type { InstallDecision, InstallState, Markers } from './types';

const debug = createDebug('pylaunch:install-gate');

export function decideInstall({
	installed,
	recordedRevision,
	currentRevision
}: InstallState): InstallDecision {
	if (!installed) {
		return { install: true, reason: 'first-run' };
	}
	// Without a revision there is no way to tell whether the install is
	// stale, so the existing one is kept.
	if (currentRevision === null) {
		return { install: false, reason: 'revision-unknown' };
	}
	if (recordedRevision === null) {
		return { install: true, reason: 'no-recorded-revision' };
	}
	if (recordedRevision.trim() !== currentRevision.trim()) {
		return { install: true, reason: 'revision-changed' };
	}
	return { install: false, reason: 'up-to-date' };
}

/**
 * Reads the markers and asks for the current revision only as far as the
 * decision needs them.
 */
export async function checkInstall(
	markers: Markers,
	currentRevision: () => Promise<string | null>
): Promise<InstallDecision> {
	const state: InstallState = {
		installed: await isInstalled(markers),
		recordedRevision: null,
		currentRevision: null
	};
	if (state.installed) {
		state.currentRevision = await currentRevision();
		if (state.currentRevision !== null) {
			state.recordedRevision = await readRecordedRevision(markers);
		}
	}
	const decision = decideInstall(state);
	debug('Install decision %o for %o', decision, state);
	return decision;
}

export async function shouldInstall(
	markers: Markers,
	currentRevision: () => Promise<string | null>
): Promise<boolean> {
	const { install } = await checkInstall(markers, currentRevision);
	return install;
}
