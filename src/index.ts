import createDebug from 'debug';
import type { BootstrapState, LauncherOptions } from './types';
import {
	ConfigError,
	InstallError,
	LaunchError,
	LauncherError,
	PreconditionError,
	RevisionProbeError,
	toError
} from './errors';
import { resolveConfig } from './config';
import { runCommand } from './run-command';
import { probeInterpreter } from './probe';
import { ensureMarkerDir } from './markers';
import { launchScript } from './launch';
import { lazyRevision } from './revision';
import { checkInstall, shouldInstall } from './install-gate';
import { installRequirements } from './install-requirements';
import { currentExecutableDirectory } from './executable-dir';

const debug = createDebug('pylaunch:bootstrap');

export type {
	BootstrapState,
	CommandResult,
	CommandRunner,
	InstallDecision,
	LauncherConfig,
	LauncherOptions,
	Markers
} from './types';
export type { ProbeResult } from './probe';

export {
	ConfigError,
	InstallError,
	LaunchError,
	LauncherError,
	PreconditionError,
	RevisionProbeError,
	resolveConfig,
	runCommand,
	shouldInstall,
	currentExecutableDirectory
};

/**
 * Probes the interpreter, installs the requirements when this is the first
 * run or the source revision moved, then runs the entry script with `args`.
 * Resolves with the exit status for the launcher process: `0` when the
 * script succeeded, `1` when any step failed.
 */
export async function bootstrap(
	args: readonly string[],
	options: LauncherOptions = {}
): Promise<number> {
	let state: BootstrapState = 'Start';
	function transition(next: BootstrapState): void {
		debug('%s -> %s', state, next);
		state = next;
	}

	try {
		const config = resolveConfig(options);

		transition('ProbingInterpreter');
		const probe = await probeInterpreter(config);
		if (!probe.ok) {
			throw probe.error;
		}
		console.log(`${config.python} is installed: ${probe.output}`);
		debug('Interpreter version %o', probe.version);

		transition('GatingInstall');
		if (await ensureMarkerDir(config.markers)) {
			console.log(`Created temp folder at: ${config.markers.dir}`);
		}
		const currentRevision = lazyRevision(config);
		const decision = await checkInstall(config.markers, currentRevision);

		if (decision.install) {
			transition('Installing');
			console.log('Installing requirements...');
			await installRequirements(config, currentRevision);
		} else {
			console.log(
				'Requirements already installed. Skipping installation...'
			);
		}

		transition('Launching');
		console.log(`Launching ${config.entryScript}...`);
		await launchScript(config, args);
		transition('Done');
		return 0;
	} catch (err) {
		transition('Failed');
		if (err instanceof LauncherError) {
			console.error(`Error: ${err.message}`);
			return 1;
		}
		throw err;
	}
}

/**
 * Entry point of the `pylaunch` binary. Errors the bootstrap does not
 * handle itself are reported as a single line; the full error goes to the
 * debug log.
 */
export async function main(
	args: readonly string[],
	options: LauncherOptions = {}
): Promise<number> {
	try {
		return await bootstrap(args, options);
	} catch (err) {
		debug('Unexpected error %o', err);
		console.error(`Error: ${toError(err).message}`);
		return 1;
	}
}
