import { mkdirp, pathExists, readFile, remove, writeFile } from 'fs-extra';
import { getMarkers } from '../src/config';
import {
	ensureMarkerDir,
	isInstalled,
	markInstalled,
	readRecordedRevision
} from '../src/markers';
import { createTempDir, silenceConsole } from './helpers/fake-runner';

let dir: string;

beforeEach(async () => {
	dir = await createTempDir('markers');
});

afterEach(async () => {
	vi.restoreAllMocks();
	await remove(dir);
});

it('ensure_marker_dir_creates_once', async () => {
	const markers = getMarkers(dir, 'temp');
	expect(await ensureMarkerDir(markers)).toBe(true);
	expect(await pathExists(markers.dir)).toBe(true);
	expect(await ensureMarkerDir(markers)).toBe(false);
});

it('fresh_directory_has_no_markers', async () => {
	const markers = getMarkers(dir, 'temp');
	expect(await isInstalled(markers)).toBe(false);
	expect(await readRecordedRevision(markers)).toBeNull();
});

it('mark_installed_writes_both_markers', async () => {
	const markers = getMarkers(dir, 'temp');
	await markInstalled(markers, '  abc123\n');
	expect(await isInstalled(markers)).toBe(true);
	expect(await readFile(markers.installedFile, 'utf8')).toBe('installed');
	expect(await readFile(markers.revisionFile, 'utf8')).toBe('abc123');
});

it('mark_installed_overwrites_the_revision', async () => {
	const markers = getMarkers(dir, 'temp');
	await markInstalled(markers, 'abc123');
	await markInstalled(markers, 'def456');
	expect(await readRecordedRevision(markers)).toBe('def456');
});

it('recorded_revision_is_trimmed', async () => {
	const markers = getMarkers(dir, 'temp');
	await ensureMarkerDir(markers);
	await writeFile(markers.revisionFile, '\tabc123 \r\n');
	expect(await readRecordedRevision(markers)).toBe('abc123');
});

it('installed_marker_content_is_irrelevant', async () => {
	const markers = getMarkers(dir, 'temp');
	await ensureMarkerDir(markers);
	await writeFile(markers.installedFile, '');
	expect(await isInstalled(markers)).toBe(true);
});

it('unreadable_revision_marker_reads_as_empty', async () => {
	const markers = getMarkers(dir, 'temp');
	await mkdirp(markers.revisionFile);
	expect(await readRecordedRevision(markers)).toBe('');
});

it('mark_installed_continues_past_a_failed_write', async () => {
	const output = silenceConsole();
	const markers = getMarkers(dir, 'temp');
	await mkdirp(markers.revisionFile);

	await expect(markInstalled(markers, 'abc123')).resolves.toBeUndefined();
	expect(await readFile(markers.installedFile, 'utf8')).toBe('installed');
	expect(output.error).toHaveBeenCalledTimes(1);
	expect(output.error).toHaveBeenCalledWith(
		expect.stringContaining(
			`Warning: could not write ${markers.revisionFile}: `
		)
	);
});

it('mark_installed_creates_the_marker_directory', async () => {
	const markers = getMarkers(dir, 'temp');
	await markInstalled(markers, 'abc123');
	expect(await pathExists(markers.revisionFile)).toBe(true);
});
