// Logging system for simpick
// Everything goes to a dated file under the config dir so stdout stays
// reserved for command output.
import {
	existsSync,
	mkdirSync,
	appendFileSync,
	readdirSync,
	unlinkSync,
	statSync,
} from 'node:fs';
import path from 'node:path';
import {getPaths} from './config.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

const LEVEL_ORDER: Record<LogThreshold, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
};

export interface LogEntry {
	timestamp: string;
	level: LogLevel;
	component: string;
	message: string;
	error?: string;
}

const MAX_LOG_FILES = 7; // Keep last 7 days of logs
const LOG_FILE_PREFIX = 'simpick-';

function isLogThreshold(value: string): value is LogThreshold {
	return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Minimum level written, from SIMPICK_LOG_LEVEL. Unknown values fall back
 * to debug.
 */
export function getLogThreshold(
	env: NodeJS.ProcessEnv = process.env,
): LogThreshold {
	const value = env['SIMPICK_LOG_LEVEL']?.toLowerCase() ?? '';
	return isLogThreshold(value) ? value : 'debug';
}

export function isLevelEnabled(
	level: LogLevel,
	threshold: LogThreshold,
): boolean {
	return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

// Resolved on every write so SIMPICK_CONFIG_DIR set at runtime is honoured
export function getLogDir(): string {
	return getPaths().logDir;
}

export function getLogFileName(date: Date = new Date()): string {
	const day = date.toISOString().split('T')[0]; // YYYY-MM-DD
	return `${LOG_FILE_PREFIX}${day}.log`;
}

export function formatLogEntry(entry: LogEntry): string {
	const parts = [
		entry.timestamp,
		`[${entry.level.toUpperCase().padEnd(5)}]`,
		`[${entry.component}]`,
		entry.message,
	];
	if (entry.error) {
		parts.push(`\n  Error: ${entry.error}`);
	}
	return parts.join(' ');
}

/**
 * Log files beyond the newest `keep` (by mtime) that should be removed.
 */
export function selectLogsToRotate(
	files: Array<{name: string; mtime: number}>,
	keep: number = MAX_LOG_FILES,
): string[] {
	return files
		.filter(f => f.name.startsWith(LOG_FILE_PREFIX) && f.name.endsWith('.log'))
		.sort((a, b) => b.mtime - a.mtime) // Newest first
		.slice(keep)
		.map(f => f.name);
}

function rotateLogs(logDir: string): void {
	const files = readdirSync(logDir).map(name => ({
		name,
		mtime: statSync(path.join(logDir, name)).mtime.getTime(),
	}));

	for (const name of selectLogsToRotate(files)) {
		unlinkSync(path.join(logDir, name));
	}
}

function writeToFile(entry: LogEntry): void {
	try {
		const logDir = getLogDir();
		if (!existsSync(logDir)) {
			mkdirSync(logDir, {recursive: true});
		}
		rotateLogs(logDir);
		appendFileSync(
			path.join(logDir, getLogFileName()),
			formatLogEntry(entry) + '\n',
			'utf-8',
		);
	} catch {
		// Logging must never break a command
	}
}

function log(
	level: LogLevel,
	component: string,
	message: string,
	error?: Error,
): void {
	if (!isLevelEnabled(level, getLogThreshold())) return;

	writeToFile({
		timestamp: new Date().toISOString(),
		level,
		component,
		message,
		error: error?.message,
	});
}

export interface Logger {
	debug: (message: string) => void;
	info: (message: string) => void;
	warn: (message: string, error?: Error) => void;
	error: (message: string, error?: Error) => void;
}

// Create a logger for a specific component
export function createLogger(component: string): Logger {
	return {
		debug: message => log('debug', component, message),
		info: message => log('info', component, message),
		warn: (message, error) => log('warn', component, message, error),
		error: (message, error) => log('error', component, message, error),
	};
}

export const logger = createLogger('app');
