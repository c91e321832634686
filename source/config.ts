// Config directory layout and config.yml loading
import fs from 'node:fs';
import {homedir} from 'node:os';
import path from 'node:path';
import YAML from 'js-yaml';
import type {ColorMode} from './types.ts';

// ============================================================================
// Types
// ============================================================================

export interface SimpickConfig {
	version: number;
	/** App passed to `open -a` when launching */
	simulator_app: string;
	color: ColorMode;
}

export interface SimpickPaths {
	configDir: string;
	defaultFile: string;
	configFile: string;
	logDir: string;
}

export const DEFAULT_CONFIG: SimpickConfig = {
	version: 1,
	simulator_app: 'Simulator',
	color: 'auto',
};

const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

export class ConfigValidationError extends Error {
	source: string;
	errors: string[];

	constructor(source: string, errors: string[]) {
		super(`Invalid ${source}:\n${errors.map(e => `  - ${e}`).join('\n')}`);
		this.name = 'ConfigValidationError';
		this.source = source;
		this.errors = errors;
	}
}

// ============================================================================
// Paths
// ============================================================================

/**
 * Resolve the config directory.
 * SIMPICK_CONFIG_DIR wins, then $XDG_CONFIG_HOME/simpick, then ~/.config/simpick.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
	const override = env['SIMPICK_CONFIG_DIR'];
	if (override) return override;

	const xdg = env['XDG_CONFIG_HOME'];
	return path.join(xdg || path.join(homedir(), '.config'), 'simpick');
}

export function getPaths(configDir: string = getConfigDir()): SimpickPaths {
	return {
		configDir,
		defaultFile: path.join(configDir, 'default'),
		configFile: path.join(configDir, 'config.yml'),
		logDir: path.join(configDir, 'logs'),
	};
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load config.yml, filling in defaults for anything unset.
 * A missing file yields DEFAULT_CONFIG.
 */
export function loadConfig(paths: SimpickPaths = getPaths()): SimpickConfig {
	if (!fs.existsSync(paths.configFile)) {
		return {...DEFAULT_CONFIG};
	}

	const content = fs.readFileSync(paths.configFile, 'utf-8');
	return parseConfig(content, paths.configFile);
}

export function parseConfig(content: string, source = 'config.yml'): SimpickConfig {
	let raw: unknown;
	try {
		raw = YAML.load(content);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigValidationError(source, [`could not parse YAML: ${reason}`]);
	}

	// An empty file loads as undefined
	if (raw === undefined || raw === null) {
		return {...DEFAULT_CONFIG};
	}

	validateConfig(raw, source);
	return {...DEFAULT_CONFIG, ...raw};
}

// ============================================================================
// Validation
// ============================================================================

export function validateConfig(
	config: unknown,
	source = 'config.yml',
): asserts config is Partial<SimpickConfig> {
	if (typeof config !== 'object' || config === null || Array.isArray(config)) {
		throw new ConfigValidationError(source, ['config must be a mapping']);
	}

	const errors: string[] = [];
	const cfg = config as Record<string, unknown>;

	if (cfg['version'] !== undefined && cfg['version'] !== 1) {
		errors.push('version: must be 1');
	}

	if (cfg['simulator_app'] !== undefined) {
		const app = cfg['simulator_app'];
		if (typeof app !== 'string' || app.trim().length === 0) {
			errors.push('simulator_app: must be a non-empty string');
		}
	}

	if (cfg['color'] !== undefined) {
		const color = cfg['color'];
		if (!COLOR_MODES.some(mode => mode === color)) {
			errors.push('color: must be "auto", "always" or "never"');
		}
	}

	if (errors.length > 0) {
		throw new ConfigValidationError(source, errors);
	}
}
