import {
	ConfigError,
	InstallError,
	LaunchError,
	LauncherError,
	PreconditionError,
	RevisionProbeError,
	isErrnoException,
	toError
} from '../src/errors';

it('precondition_error', () => {
	const err = new PreconditionError(
		'python',
		new Error('spawn python ENOENT')
	);
	assert(err instanceof LauncherError);
	assert(err instanceof Error);
	expect(err.name).toBe('PreconditionError');
	expect(err.command).toBe('python');
	expect(err.toString()).toBe(
		'PreconditionError: python is not installed or not in PATH (spawn python ENOENT)'
	);
});

it('precondition_error_without_cause', () => {
	expect(new PreconditionError('python3').message).toBe(
		'python3 is not installed or not in PATH'
	);
});

it('install_and_launch_errors_carry_exit_code', () => {
	const install = new InstallError('Failed to install requirements', 3);
	expect(install.name).toBe('InstallError');
	expect(install.exitCode).toBe(3);

	const launch = new LaunchError('Failed to launch main.py');
	expect(launch.name).toBe('LaunchError');
	expect(launch.exitCode).toBeUndefined();
});

it('revision_probe_and_config_errors', () => {
	const probe = new RevisionProbeError('git exited with code 128');
	expect(probe.name).toBe('RevisionProbeError');
	assert(probe instanceof LauncherError);

	const config = new ConfigError('bad value', 'PYLAUNCH_PIP');
	expect(config.name).toBe('ConfigError');
	expect(config.variable).toBe('PYLAUNCH_PIP');
});

it('is_errno_exception', () => {
	const err: NodeJS.ErrnoException = new Error('spawn git ENOENT');
	err.code = 'ENOENT';
	expect(isErrnoException(err)).toBe(true);
	expect(isErrnoException(new Error('plain'))).toBe(false);
	expect(isErrnoException({ code: 'ENOENT' })).toBe(false);
});

it('to_error', () => {
	const err = new Error('boom');
	expect(toError(err)).toBe(err);
	expect(toError('boom')).toEqual(new Error('boom'));
});
