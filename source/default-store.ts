// Persisted default simulator selection
import fs from 'node:fs';
import path from 'node:path';
import {createLogger} from './logger.ts';

const log = createLogger('default-store');

function isMissingFileError(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read the stored default UDID.
 * Returns null when nothing is stored (missing or blank file).
 */
export function readDefaultUdid(defaultFile: string): string | null {
	let content: string;
	try {
		content = fs.readFileSync(defaultFile, 'utf-8');
	} catch (error) {
		if (isMissingFileError(error)) return null;
		throw error;
	}

	const udid = content.trim();
	return udid.length > 0 ? udid : null;
}

/**
 * Store a default UDID, replacing any previous one.
 * The value is not checked against the simulator list.
 */
export function writeDefaultUdid(defaultFile: string, udid: string): void {
	fs.mkdirSync(path.dirname(defaultFile), {recursive: true});
	fs.writeFileSync(defaultFile, `${udid}\n`, 'utf-8');
	log.info(`Default set to ${udid}`);
}
