import {spawnSync} from 'node:child_process';
import type {CommandResult, CommandRunner} from './types.ts';

/**
 * Run a command synchronously and capture its output.
 * Spawn failures (missing binary, timeout) are reported through `error`
 * rather than thrown, matching spawnSync.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
	const result = spawnSync(command, args, {
		encoding: 'utf-8',
		timeout: options.timeout,
	});

	const commandResult: CommandResult = {
		status: result.status,
		stdout: result.stdout ?? '',
		stderr: result.stderr ?? '',
	};
	if (result.error) {
		commandResult.error = result.error;
	}
	return commandResult;
};

export function formatCommand(command: string, args: string[]): string {
	return [command, ...args].join(' ');
}
