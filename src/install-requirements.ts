import ms from 'ms';
import createDebug from 'debug';
import { markInstalled } from './markers';
import { InstallError, toError } from './errors';
import type { LauncherConfig } from './types';

const debug = createDebug('pylaunch:install-requirements');

export function installCommand({ pip, manifest }: LauncherConfig): string[] {
	return [pip, 'install', '-r', manifest];
}

/**
 * Installs the manifest and, only once that succeeded, asks for the
 * revision and writes the markers, so that a failed install is retried on
 * the next run.
 */
export async function installRequirements(
	config: LauncherConfig,
	currentRevision: () => Promise<string | null>
): Promise<void> {
	const argv = installCommand(config);
	const start = Date.now();
	debug('Installing %o', config.manifest);

	let exitCode: number;
	try {
		({ exitCode } = await config.runCommand(argv, { stdio: 'inherit' }));
	} catch (err) {
		throw new InstallError(
			`Failed to install requirements: ${toError(err).message}`
		);
	}
	if (exitCode !== 0) {
		throw new InstallError(
			`Failed to install requirements (\`${argv.join(
				' '
			)}\` exited with code ${exitCode})`,
			exitCode
		);
	}
	debug('Installed requirements in %s', ms(Date.now() - start));

	const revision = await currentRevision();
	await markInstalled(config.markers, revision || '');
}
