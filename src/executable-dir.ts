import { realpathSync } from 'node:fs';
import { dirname } from 'node:path';
import createDebug from 'debug';

const debug = createDebug('pylaunch:executable-dir');

/**
 * Directory of the running launcher. When compiled through `pkg` the
 * launcher is the executable itself, otherwise it is the entry script
 * Node.js was started with. Symlinks (e.g. `node_modules/.bin`) are
 * resolved so the result does not depend on how the launcher was invoked.
 */
export function currentExecutableDirectory(
	proc: Pick<NodeJS.Process, 'argv' | 'execPath'> = process
): string {
	const packaged = 'pkg' in proc;
	const script = proc.argv[1];
	let dir: string;
	if (packaged || !script) {
		dir = dirname(proc.execPath);
	} else {
		dir = dirname(realpathSync(script));
	}
	debug('Executable directory is %o', dir);
	return dir;
}
