import createDebug from 'debug';
import { pathExists, mkdirp, outputFile, readFile } from 'fs-extra';
import { isErrnoException, toError } from './errors';
import type { Markers } from './types';

const debug = createDebug('pylaunch:markers');

/**
 * Creates the marker directory if it is missing.
 * Returns `true` when it had to be created.
 */
export async function ensureMarkerDir(markers: Markers): Promise<boolean> {
	if (await pathExists(markers.dir)) {
		return false;
	}
	debug('Creating marker directory %o', markers.dir);
	await mkdirp(markers.dir);
	return true;
}

export async function isInstalled(markers: Markers): Promise<boolean> {
	const installed = await pathExists(markers.installedFile);
	debug('Installed marker %o exists: %o', markers.installedFile, installed);
	return installed;
}

/**
 * Reads the revision recorded at the last successful install.
 * Returns `null` if the file does not exist, and an empty revision if it
 * cannot be read, which makes the next install decision a reinstall.
 */
export async function readRecordedRevision(
	markers: Markers
): Promise<string | null> {
	try {
		const contents = await readFile(markers.revisionFile, 'utf8');
		return contents.trim();
	} catch (err) {
		if (isErrnoException(err) && err.code === 'ENOENT') {
			return null;
		}
		debug('Failed to read %o: %o', markers.revisionFile, err);
		return '';
	}
}

async function writeMarker(file: string, contents: string): Promise<boolean> {
	try {
		await outputFile(file, contents);
		return true;
	} catch (err) {
		debug('Failed to write %o: %o', file, err);
		console.error(
			`Warning: could not write ${file}: ${toError(err).message}`
		);
		return false;
	}
}

/**
 * Written only after the installer succeeded. Both writes are best effort
 * and not atomic: a write that fails is reported and skipped, and the next
 * run re-evaluates from whichever marker persisted.
 */
export async function markInstalled(
	markers: Markers,
	revision: string
): Promise<void> {
	if (await writeMarker(markers.installedFile, 'installed')) {
		debug('Marked as installed at %o', markers.installedFile);
	}
	if (await writeMarker(markers.revisionFile, revision.trim())) {
		debug('Recorded revision %o', revision.trim());
	}
}
