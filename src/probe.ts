import createDebug from 'debug';
import { coerce } from 'semver';
import { PreconditionError, toError } from './errors';
import type { LauncherConfig } from './types';

const debug = createDebug('pylaunch:probe');

export type ProbeResult =
	| { ok: true; output: string; version: string | null }
	| { ok: false; error: PreconditionError };

/**
 * Runs `<python> --version`. Only a failure to spawn the interpreter
 * counts as missing; whatever it prints is accepted.
 */
export async function probeInterpreter({
	python,
	runCommand
}: LauncherConfig): Promise<ProbeResult> {
	let output: string;
	try {
		const res = await runCommand([python, '--version']);
		output = res.output.trim();
		debug('%o --version exited with %o: %o', python, res.exitCode, output);
	} catch (err) {
		debug('Failed to spawn %o: %o', python, err);
		return { ok: false, error: new PreconditionError(python, toError(err)) };
	}
	const parsed = coerce(output);
	return { ok: true, output, version: parsed ? parsed.version : null };
}
