import { join, resolve } from 'node:path';
import createDebug from 'debug';
import { ConfigError } from './errors';
import { runCommand } from './run-command';
import { currentExecutableDirectory } from './executable-dir';
import type { LauncherConfig, LauncherOptions, Markers } from './types';

const debug = createDebug('pylaunch:config');

export const defaults = {
	python: 'python',
	pip: 'pip',
	git: 'git',
	manifest: join('src', 'requirements.txt'),
	entryScript: join('src', 'main.py'),
	markerDir: 'temp'
} as const;

// Options that may also be given through the environment
const envOverrides = {
	baseDir: 'PYLAUNCH_HOME',
	python: 'PYLAUNCH_PYTHON',
	pip: 'PYLAUNCH_PIP'
} as const;

type EnvOption = keyof typeof envOverrides;

function fromEnv(
	env: NodeJS.ProcessEnv,
	option: EnvOption
): string | undefined {
	const name = envOverrides[option];
	const value = env[name];
	if (typeof value === 'undefined') {
		return undefined;
	}
	if (value.trim() === '') {
		throw new ConfigError(
			`Environment variable ${name} must not be empty`,
			name
		);
	}
	debug('Using %s=%o', name, value);
	return value;
}

export function getMarkers(baseDir: string, markerDir: string): Markers {
	const dir = resolve(baseDir, markerDir);
	return {
		dir,
		installedFile: join(dir, '.installed'),
		revisionFile: join(dir, '.git_last_commit')
	};
}

/**
 * Fills in every launcher option. Explicit options win over the
 * environment, which wins over the defaults.
 */
export function resolveConfig(
	options: LauncherOptions = {},
	env: NodeJS.ProcessEnv = process.env
): LauncherConfig {
	const baseDir = resolve(
		options.baseDir ||
			fromEnv(env, 'baseDir') ||
			currentExecutableDirectory()
	);
	const config: LauncherConfig = {
		baseDir,
		python: options.python || fromEnv(env, 'python') || defaults.python,
		pip: options.pip || fromEnv(env, 'pip') || defaults.pip,
		git: options.git || defaults.git,
		manifest: resolve(baseDir, options.manifest || defaults.manifest),
		entryScript: resolve(
			baseDir,
			options.entryScript || defaults.entryScript
		),
		markers: getMarkers(baseDir, options.markerDir || defaults.markerDir),
		runCommand: options.runCommand || runCommand
	};
	debug('Resolved config %o', { ...config, runCommand: undefined });
	return config;
}
