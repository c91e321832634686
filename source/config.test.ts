import {mkdtempSync, writeFileSync} from 'node:fs';
import {tmpdir} from 'node:os';
import {join} from 'node:path';
import test from 'ava';
import {
	ConfigValidationError,
	DEFAULT_CONFIG,
	getConfigDir,
	getPaths,
	loadConfig,
	parseConfig,
	validateConfig,
} from './config.ts';

// ============================================================================
// getConfigDir / getPaths
// ============================================================================

test('getConfigDir prefers SIMPICK_CONFIG_DIR', t => {
	t.is(
		getConfigDir({SIMPICK_CONFIG_DIR: '/tmp/simpick', XDG_CONFIG_HOME: '/xdg'}),
		'/tmp/simpick',
	);
});

test('getConfigDir uses XDG_CONFIG_HOME when set', t => {
	t.is(getConfigDir({XDG_CONFIG_HOME: '/xdg'}), '/xdg/simpick');
});

test('getConfigDir falls back to ~/.config/simpick', t => {
	t.true(getConfigDir({}).endsWith(join('.config', 'simpick')));
});

test('getConfigDir ignores an empty override', t => {
	t.is(getConfigDir({SIMPICK_CONFIG_DIR: '', XDG_CONFIG_HOME: '/xdg'}), '/xdg/simpick');
});

test('getPaths lays out files under the config dir', t => {
	t.deepEqual(getPaths('/cfg'), {
		configDir: '/cfg',
		defaultFile: '/cfg/default',
		configFile: '/cfg/config.yml',
		logDir: '/cfg/logs',
	});
});

// ============================================================================
// parseConfig
// ============================================================================

test('parseConfig returns defaults for an empty document', t => {
	t.deepEqual(parseConfig(''), DEFAULT_CONFIG);
});

test('parseConfig merges provided keys over defaults', t => {
	const config = parseConfig('simulator_app: Simulator Beta\ncolor: never\n');
	t.deepEqual(config, {
		version: 1,
		simulator_app: 'Simulator Beta',
		color: 'never',
	});
});

test('parseConfig reports invalid YAML', t => {
	const error = t.throws(() => parseConfig('color: [never', 'config.yml'), {
		instanceOf: ConfigValidationError,
	});
	t.is(error?.errors.length, 1);
	t.true(error?.errors[0]?.startsWith('could not parse YAML:'));
});

// ============================================================================
// validateConfig
// ============================================================================

test('validateConfig accepts a full valid config', t => {
	t.notThrows(() =>
		validateConfig({version: 1, simulator_app: 'Simulator', color: 'always'}),
	);
});

test('validateConfig rejects non-mapping documents', t => {
	const error = t.throws(() => validateConfig(['a', 'b']), {
		instanceOf: ConfigValidationError,
	});
	t.deepEqual(error?.errors, ['config must be a mapping']);
});

test('validateConfig collects every problem', t => {
	const error = t.throws(
		() => validateConfig({version: 2, simulator_app: '  ', color: 'rainbow'}),
		{instanceOf: ConfigValidationError},
	);
	t.deepEqual(error?.errors, [
		'version: must be 1',
		'simulator_app: must be a non-empty string',
		'color: must be "auto", "always" or "never"',
	]);
});

test('ConfigValidationError message lists problems under the file name', t => {
	const error = new ConfigValidationError('/cfg/config.yml', ['version: must be 1']);
	t.is(error.message, 'Invalid /cfg/config.yml:\n  - version: must be 1');
});

// ============================================================================
// loadConfig
// ============================================================================

test('loadConfig returns defaults when config.yml is missing', t => {
	const dir = mkdtempSync(join(tmpdir(), 'simpick-config-'));
	t.deepEqual(loadConfig(getPaths(dir)), DEFAULT_CONFIG);
});

test('loadConfig reads config.yml from the config dir', t => {
	const dir = mkdtempSync(join(tmpdir(), 'simpick-config-'));
	writeFileSync(join(dir, 'config.yml'), 'version: 1\ncolor: always\n');
	t.is(loadConfig(getPaths(dir)).color, 'always');
});

test('loadConfig names the file in validation errors', t => {
	const dir = mkdtempSync(join(tmpdir(), 'simpick-config-'));
	const paths = getPaths(dir);
	writeFileSync(paths.configFile, 'color: loud\n');
	const error = t.throws(() => loadConfig(paths), {
		instanceOf: ConfigValidationError,
	});
	t.true(error?.message.startsWith(`Invalid ${paths.configFile}:`));
});
