/**
 * Subclassing `Error` in TypeScript:
 * https://stackoverflow.com/a/41102306/376773
 */
export class LauncherError extends Error {
	constructor(message?: string) {
		super(message);
		Object.setPrototypeOf(this, new.target.prototype);

		Object.defineProperty(this, 'name', {
			value: new.target.name
		});
	}
}

/**
 * The interpreter binary could not be spawned.
 */
export class PreconditionError extends LauncherError {
	command: string;

	constructor(command: string, cause?: Error) {
		super(
			`${command} is not installed or not in PATH${
				cause ? ` (${cause.message})` : ''
			}`
		);
		this.command = command;
	}
}

export class InstallError extends LauncherError {
	exitCode?: number;

	constructor(message: string, exitCode?: number) {
		super(message);
		this.exitCode = exitCode;
	}
}

export class LaunchError extends LauncherError {
	exitCode?: number;

	constructor(message: string, exitCode?: number) {
		super(message);
		this.exitCode = exitCode;
	}
}

/**
 * Not fatal. The install gate treats an unknown revision as "not updated".
 */
export class RevisionProbeError extends LauncherError {}

export class ConfigError extends LauncherError {
	variable?: string;

	constructor(message: string, variable?: string) {
		super(message);
		this.variable = variable;
	}
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && 'code' in err;
}

export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
