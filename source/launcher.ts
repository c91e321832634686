// Opening Simulator.app on a specific device
import {createLogger} from './logger.ts';
import {formatCommand, runCommand} from './run-command.ts';
import type {CommandRunner} from './types.ts';

const log = createLogger('launcher');

const LAUNCH_TIMEOUT_MS = 30000;

export class LaunchError extends Error {
	udid: string;

	constructor(udid: string, message: string) {
		super(message);
		this.name = 'LaunchError';
		this.udid = udid;
	}
}

export function buildLaunchArgs(udid: string, app = 'Simulator'): string[] {
	return ['-a', app, '--args', '-CurrentDeviceUDID', udid];
}

/**
 * Ask macOS to open the simulator app with the given device selected.
 */
export function launchSimulator(
	udid: string,
	app = 'Simulator',
	runner: CommandRunner = runCommand,
): void {
	const args = buildLaunchArgs(udid, app);
	const command = formatCommand('open', args);
	log.info(`Running ${command}`);

	const result = runner('open', args, {timeout: LAUNCH_TIMEOUT_MS});

	if (result.error) {
		log.error(`Failed to run ${command}`, result.error);
		throw new LaunchError(udid, `Failed to launch ${app}: ${result.error.message}`);
	}

	if (result.status !== 0) {
		const stderr = result.stderr.trim();
		log.error(`${command} exited with status ${String(result.status)}: ${stderr}`);
		throw new LaunchError(
			udid,
			`Failed to launch ${app}${stderr ? `: ${stderr}` : ''}`,
		);
	}
}
