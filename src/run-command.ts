import { exec } from 'tinyexec';
import createDebug from 'debug';
import type { CommandRunner } from './types';

const debug = createDebug('pylaunch:run-command');

/**
 * Spawns the argument vector directly (no shell), so arguments reach the
 * child exactly as given.
 */
export const runCommand: CommandRunner = async (argv, options = {}) => {
	const [command, ...args] = argv;
	if (!command) {
		throw new TypeError('Cannot run an empty command');
	}
	const stdio = options.stdio || 'pipe';

	debug('Exec %o (stdio=%s, cwd=%o)', argv, stdio, options.cwd);
	const res = await exec(command, args, {
		throwOnError: false,
		nodeOptions: { cwd: options.cwd, stdio }
	});

	// `exitCode` is undefined when the child was killed by a signal
	const exitCode = typeof res.exitCode === 'number' ? res.exitCode : 1;
	debug('Process %o exited with code %o', command, exitCode);
	return { exitCode, output: res.stdout + res.stderr };
};
