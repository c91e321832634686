// Command implementations behind the simpick CLI
import {
	ConfigValidationError,
	type SimpickConfig,
	type SimpickPaths,
} from './config.ts';
import type {ConfirmPrompt} from './confirm.tsx';
import {readDefaultUdid, writeDefaultUdid} from './default-store.ts';
import {LaunchError, launchSimulator} from './launcher.ts';
import {createLogger} from './logger.ts';
import {filterSimulators, findSimulator} from './matching.ts';
import {SimctlError, listSimulators} from './simctl.ts';
import {createPainter, formatSimulatorTable, type Painter} from './table.ts';
import type {CommandRunner, Simulator} from './types.ts';

const log = createLogger('commands');

export const BIN = 'simpick';

export interface CommandContext {
	runner: CommandRunner;
	paths: SimpickPaths;
	config: SimpickConfig;
	color: boolean;
	/** Whether stdin can drive an interactive prompt */
	interactive: boolean;
	confirm: ConfirmPrompt;
	print: (line: string) => void;
}

export interface CommandFlags {
	json: boolean;
	yes: boolean;
}

export type ExitCode = 0 | 1;

function describeSimulator(sim: Simulator, ctx: CommandContext): string {
	const {paint} = createPainter(ctx.color);
	return `${paint(sim.name, 'bold')} (${paint(sim.os, 'cyan')})`;
}

// ============================================================================
// list
// ============================================================================

export function listCommand(
	ctx: CommandContext,
	filter: string | undefined,
	flags: Pick<CommandFlags, 'json'>,
): ExitCode {
	const simulators = filterSimulators(listSimulators(ctx.runner), filter);
	const defaultUdid = readDefaultUdid(ctx.paths.defaultFile);

	if (flags.json) {
		const records = simulators.map(sim => ({
			...sim,
			isDefault: sim.udid === defaultUdid,
		}));
		ctx.print(JSON.stringify(records, null, 2));
		return simulators.length > 0 ? 0 : 1;
	}

	if (simulators.length === 0) {
		const suffix = filter ? ` matching '${filter}'` : '';
		ctx.print(`No simulators found${suffix}.`);
		return 1;
	}

	for (const line of formatSimulatorTable(simulators, defaultUdid, ctx.color)) {
		ctx.print(line);
	}
	return 0;
}

// ============================================================================
// launch
// ============================================================================

export function launchCommand(ctx: CommandContext, query: string): ExitCode {
	const sim = findSimulator(listSimulators(ctx.runner), query);
	if (!sim) {
		log.warn(`No simulator matches '${query}'`);
		ctx.print(`No simulator found matching '${query}'.`);
		ctx.print(`Run '${BIN} list' to see available simulators.`);
		return 1;
	}

	ctx.print(`Launching ${describeSimulator(sim, ctx)}...`);
	launchSimulator(sim.udid, ctx.config.simulator_app, ctx.runner);
	return 0;
}

export function launchDefaultCommand(ctx: CommandContext): ExitCode {
	const udid = readDefaultUdid(ctx.paths.defaultFile);
	if (!udid) {
		ctx.print('No default simulator set.');
		ctx.print(
			`Run '${BIN} list' to browse simulators, then: ${BIN} default <udid>`,
		);
		return 1;
	}
	return launchCommand(ctx, udid);
}

// ============================================================================
// default
// ============================================================================

export function showDefaultCommand(ctx: CommandContext): ExitCode {
	const udid = readDefaultUdid(ctx.paths.defaultFile);
	if (!udid) {
		ctx.print(`No default set. Run: ${BIN} default <udid>`);
		return 1;
	}

	const sim = findSimulator(listSimulators(ctx.runner), udid);
	if (sim) {
		ctx.print(`Default: ${describeSimulator(sim, ctx)}`);
		ctx.print(`  UDID: ${udid}`);
	} else {
		ctx.print(`Default UDID: ${udid} (not found in available simulators)`);
	}
	return 0;
}

export async function setDefaultCommand(
	ctx: CommandContext,
	udid: string,
	flags: Pick<CommandFlags, 'yes'>,
): Promise<ExitCode> {
	const {paint} = createPainter(ctx.color);
	const sim = findSimulator(listSimulators(ctx.runner), udid);

	if (!sim) {
		ctx.print(
			`${paint('Warning:', 'yellow')} UDID '${udid}' not found in available simulators.`,
		);

		if (!flags.yes) {
			if (!ctx.interactive) {
				ctx.print('Not an interactive terminal; pass --yes to store it anyway.');
				return 0;
			}

			const confirmed = await ctx.confirm({
				title: 'Unknown simulator',
				message: 'Set anyway?',
				detail: udid,
			});
			if (!confirmed) {
				log.info(`Declined to store unknown UDID ${udid}`);
				return 0;
			}
		}
	}

	writeDefaultUdid(ctx.paths.defaultFile, udid);

	ctx.print(`Default set to: ${sim ? describeSimulator(sim, ctx) : udid}`);
	return 0;
}

// ============================================================================
// help
// ============================================================================

export const USAGE_ROWS: ReadonlyArray<readonly [string, string]> = [
	['', 'Launch the default simulator'],
	['list [filter]', 'List available simulators'],
	['launch <query>', 'Launch by name, OS version, or UDID'],
	['default', 'Show current default'],
	['default <udid>', 'Set default simulator'],
	['help', 'Show this help'],
];

export const EXAMPLES = [
	'list',
	'list iphone',
	"list 'iOS 17'",
	'list --json',
	"launch 'iPhone 15 Pro'",
	"launch 'iPad 18'",
	'default A1B2C3D4-E5F6-...',
];

export function usageLines(color: boolean): string[] {
	const {paint} = createPainter(color);
	const width = Math.max(...USAGE_ROWS.map(([cmd]) => cmd.length)) + 4;

	return [
		`${paint(BIN, 'bold')} - iOS Simulator launcher`,
		'',
		paint('Usage:', 'bold'),
		...USAGE_ROWS.map(
			([cmd, text]) => `  ${`${BIN} ${cmd}`.trimEnd().padEnd(BIN.length + 1 + width)}${text}`,
		),
		'',
		paint('Options:', 'bold'),
		'  --json       Print the list as JSON',
		'  --yes, -y    Store an unknown UDID as default without asking',
		'  --version    Show version',
		'',
		paint('Examples:', 'bold'),
		...EXAMPLES.map(example => `  ${BIN} ${example}`),
	];
}

export function helpCommand(ctx: CommandContext): ExitCode {
	for (const line of usageLines(ctx.color)) {
		ctx.print(line);
	}
	return 0;
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Route positional arguments to a command. Anything that is not a known
 * subcommand is treated as a launch query.
 */
export async function dispatch(
	ctx: CommandContext,
	input: string[],
	flags: CommandFlags,
): Promise<ExitCode> {
	const [command = '', arg] = input;
	log.debug(`Dispatching '${command}' with ${input.length} args`);

	switch (command) {
		case 'list':
			return listCommand(ctx, arg, flags);
		case 'launch':
			if (arg === undefined) {
				ctx.print(`Usage: ${BIN} launch <name|os|udid>`);
				return 1;
			}
			return launchCommand(ctx, arg);
		case 'default':
			return arg === undefined
				? showDefaultCommand(ctx)
				: setDefaultCommand(ctx, arg, flags);
		case 'help':
			return helpCommand(ctx);
		case '':
			return launchDefaultCommand(ctx);
		default:
			return launchCommand(ctx, command);
	}
}

// ============================================================================
// Error reporting
// ============================================================================

/**
 * Print a known failure as a red error line and return exit code 1.
 * Anything that is not a simctl, launch or config error is rethrown.
 */
export function reportError(
	error: unknown,
	paint: Painter['paint'],
	printErr: (line: string) => void,
): ExitCode {
	if (error instanceof SimctlError) {
		printErr(paint(`Error: ${error.message}`, 'red'));
		if (error.unavailable) {
			printErr(paint('simctl is not available. Install Xcode and run:', 'yellow'));
			printErr('  sudo xcode-select -s /Applications/Xcode.app');
		}
		return 1;
	}

	if (error instanceof LaunchError) {
		printErr(paint(`Error: ${error.message}`, 'red'));
		return 1;
	}

	if (error instanceof ConfigValidationError) {
		printErr(paint(`Error: Invalid ${error.source}`, 'red'));
		printErr('');
		for (const problem of error.errors) {
			printErr(`  - ${problem}`);
		}
		return 1;
	}

	throw error;
}
