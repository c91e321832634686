// Shared types for simpick

/**
 * A device entry as reported by `xcrun simctl list devices --json`.
 * Only the fields simpick reads are modelled.
 */
export interface SimctlDevice {
	udid: string;
	name: string;
	state: string;
	isAvailable?: boolean;
}

// Entries are checked one by one when records are built
export interface SimctlDeviceList {
	devices: Record<string, unknown[]>;
}

// [major, minor, patch]
export type OsVersion = readonly [number, number, number];

export interface Simulator {
	udid: string;
	name: string;
	/** Display OS string, e.g. "iOS 17.5" or "iPadOS 18.0.1" */
	os: string;
	state: string;
	version: OsVersion;
}

export interface CommandResult {
	status: number | null;
	stdout: string;
	stderr: string;
	error?: Error;
}

/**
 * Runs an external command to completion. Swapped for a mock in tests.
 */
export type CommandRunner = (
	command: string,
	args: string[],
	options?: {timeout?: number},
) => CommandResult;

export type ColorMode = 'auto' | 'always' | 'never';
