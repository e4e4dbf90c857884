export type Stdio = 'pipe' | 'inherit';

export interface RunCommandOptions {
	cwd?: string;
	stdio?: Stdio; // pipe (capture output) | inherit (share the terminal). Defaults to pipe
}

export interface CommandResult {
	exitCode: number;
	output: string; // stdout followed by stderr. Empty when stdio is inherited
}

/**
 * Runs `argv[0]` with the remaining entries as its arguments and resolves
 * once the process has exited. Rejects when the process cannot be spawned.
 */
export type CommandRunner = (
	argv: readonly string[],
	options?: RunCommandOptions
) => Promise<CommandResult>;

export interface LauncherOptions {
	baseDir?: string; // Directory the relative paths below are resolved against. Defaults to the executable's directory
	python?: string; // Interpreter command
	pip?: string; // Package installer command
	git?: string; // Version control command used for the revision query
	manifest?: string; // Dependency manifest, relative to `baseDir`
	entryScript?: string; // Script launched with the interpreter, relative to `baseDir`
	markerDir?: string; // Directory holding the marker files, relative to `baseDir`
	runCommand?: CommandRunner;
}

export interface Markers {
	dir: string;
	installedFile: string;
	revisionFile: string;
}

export interface LauncherConfig {
	baseDir: string;
	python: string;
	pip: string;
	git: string;
	manifest: string;
	entryScript: string;
	markers: Markers;
	runCommand: CommandRunner;
}

export type InstallReason =
	| 'first-run'
	| 'revision-unknown'
	| 'no-recorded-revision'
	| 'revision-changed'
	| 'up-to-date';

export interface InstallState {
	installed: boolean;
	recordedRevision: string | null;
	currentRevision: string | null;
}

export interface InstallDecision {
	install: boolean;
	reason: InstallReason;
}

export type BootstrapState =
	| 'Start'
	| 'ProbingInterpreter'
	| 'GatingInstall'
	| 'Installing'
	| 'Launching'
	| 'Failed'
	| 'Done';
