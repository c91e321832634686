// Simulator enumeration via `xcrun simctl`
import {createLogger} from './logger.ts';
import {formatCommand, runCommand} from './run-command.ts';
import type {
	CommandRunner,
	OsVersion,
	SimctlDevice,
	SimctlDeviceList,
	Simulator,
} from './types.ts';

const log = createLogger('simctl');

export const SIMCTL_LIST_COMMAND = 'xcrun';
export const SIMCTL_LIST_ARGS = [
	'simctl',
	'list',
	'devices',
	'available',
	'--json',
];
const SIMCTL_TIMEOUT_MS = 10000;

// Matches the tail of runtime ids like com.apple.CoreSimulator.SimRuntime.iOS-17-5
const RUNTIME_RE = /(i(?:OS|PadOS))-(\d+)-(\d+)(?:-(\d+))?$/i;

export class SimctlError extends Error {
	stderr: string;
	/** True when xcrun works but simctl itself is missing (no Xcode) */
	unavailable: boolean;

	constructor(message: string, stderr = '') {
		super(message);
		this.name = 'SimctlError';
		this.stderr = stderr;
		this.unavailable = isSimctlUnavailableError(stderr);
	}
}

/**
 * When xcrun exists but Xcode is not installed, `xcrun simctl` fails with
 * 'unable to find utility "simctl"'.
 */
export function isSimctlUnavailableError(stderr: string): boolean {
	return stderr.includes('unable to find utility "simctl"');
}

export interface RuntimeInfo {
	osType: string;
	version: OsVersion;
}

/**
 * Extract the OS family and version from a simctl runtime identifier.
 * Returns null for runtimes that are not iOS or iPadOS.
 */
export function parseRuntimeIdentifier(runtime: string): RuntimeInfo | null {
	const match = RUNTIME_RE.exec(runtime);
	if (!match) return null;

	const [, osType, major, minor, patch] = match;
	if (!osType || !major || !minor) return null;

	return {
		osType,
		version: [
			Number.parseInt(major, 10),
			Number.parseInt(minor, 10),
			patch ? Number.parseInt(patch, 10) : 0,
		],
	};
}

export function formatOsName(osType: string, version: OsVersion): string {
	const [major, minor, patch] = version;
	const base = `${osType} ${major}.${minor}`;
	return patch ? `${base}.${patch}` : base;
}

export function compareVersions(a: OsVersion, b: OsVersion): number {
	for (let i = 0; i < a.length; i++) {
		const diff = (a[i] ?? 0) - (b[i] ?? 0);
		if (diff !== 0) return diff;
	}
	return 0;
}

/**
 * Order by OS version, then by name (plain code-unit comparison).
 */
export function compareSimulators(a: Simulator, b: Simulator): number {
	const byVersion = compareVersions(a.version, b.version);
	if (byVersion !== 0) return byVersion;
	if (a.name < b.name) return -1;
	if (a.name > b.name) return 1;
	return 0;
}

export function isSimctlDevice(value: unknown): value is SimctlDevice {
	if (!value || typeof value !== 'object') return false;
	const device = value as Record<string, unknown>;
	return (
		typeof device['udid'] === 'string' &&
		typeof device['name'] === 'string' &&
		typeof device['state'] === 'string' &&
		(device['isAvailable'] === undefined ||
			typeof device['isAvailable'] === 'boolean')
	);
}

export function isSimctlDeviceList(value: unknown): value is SimctlDeviceList {
	if (!value || typeof value !== 'object') return false;

	const devices = (value as Record<string, unknown>)['devices'];
	if (!devices || typeof devices !== 'object' || Array.isArray(devices)) {
		return false;
	}

	return Object.values(devices).every(list => Array.isArray(list));
}

/**
 * Turn a simctl device list into sorted simulator records.
 * Skips non-iOS/iPadOS runtimes, malformed device entries and devices not
 * flagged as available.
 */
export function buildSimulators(data: SimctlDeviceList): Simulator[] {
	const simulators: Simulator[] = [];

	for (const [runtime, devices] of Object.entries(data.devices)) {
		const info = parseRuntimeIdentifier(runtime);
		if (!info) {
			log.debug(`Skipping runtime ${runtime}`);
			continue;
		}

		const os = formatOsName(info.osType, info.version);
		for (const device of devices) {
			if (!isSimctlDevice(device)) {
				log.debug(`Skipping malformed device entry in ${runtime}`);
				continue;
			}
			if (device.isAvailable !== true) continue;
			simulators.push({
				udid: device.udid,
				name: device.name,
				os,
				state: device.state,
				version: info.version,
			});
		}
	}

	return simulators.sort(compareSimulators);
}

export function parseSimctlOutput(stdout: string): Simulator[] {
	let parsed: unknown;
	try {
		parsed = JSON.parse(stdout);
	} catch (error) {
		throw new SimctlError(
			`Could not parse simctl output: ${
				error instanceof Error ? error.message : String(error)
			}`,
		);
	}

	if (!isSimctlDeviceList(parsed)) {
		throw new SimctlError('Unexpected simctl output: missing device list');
	}

	return buildSimulators(parsed);
}

/**
 * Query simctl for available iOS/iPadOS simulators, sorted by OS version
 * and name.
 */
export function listSimulators(runner: CommandRunner = runCommand): Simulator[] {
	const command = formatCommand(SIMCTL_LIST_COMMAND, SIMCTL_LIST_ARGS);
	log.debug(`Running ${command}`);

	const result = runner(SIMCTL_LIST_COMMAND, SIMCTL_LIST_ARGS, {
		timeout: SIMCTL_TIMEOUT_MS,
	});

	if (result.error) {
		log.error(`Failed to run ${command}`, result.error);
		throw new SimctlError(
			`Failed to run ${command}: ${result.error.message}`,
			result.stderr.trim(),
		);
	}

	if (result.status !== 0) {
		const stderr = result.stderr.trim();
		log.error(`${command} exited with status ${String(result.status)}: ${stderr}`);
		throw new SimctlError(
			stderr || `${command} exited with status ${String(result.status)}`,
			stderr,
		);
	}

	const simulators = parseSimctlOutput(result.stdout);
	log.info(`Found ${simulators.length} available simulators`);
	return simulators;
}
