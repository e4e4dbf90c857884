import createDebug from 'debug';
import { LaunchError, toError } from './errors';
import type { LauncherConfig } from './types';

const debug = createDebug('pylaunch:launch');

export function launchCommand(
	{ python, entryScript }: LauncherConfig,
	args: readonly string[]
): string[] {
	return [python, entryScript, ...args];
}

/**
 * Runs the entry script in the caller's working directory with the
 * terminal attached. A non-zero exit of the script is the script's
 * failure and is surfaced as a `LaunchError` carrying its exit code.
 */
export async function launchScript(
	config: LauncherConfig,
	args: readonly string[]
): Promise<number> {
	const argv = launchCommand(config, args);
	debug('Launching %o', argv);

	let exitCode: number;
	try {
		({ exitCode } = await config.runCommand(argv, { stdio: 'inherit' }));
	} catch (err) {
		throw new LaunchError(
			`Failed to launch ${config.entryScript}: ${toError(err).message}`
		);
	}
	if (exitCode !== 0) {
		throw new LaunchError(
			`${config.entryScript} exited with code ${exitCode}`,
			exitCode
		);
	}
	return exitCode;
}
