// Terminal rendering for simulator lists
import type {ColorMode, Simulator} from './types.ts';

export const ANSI = {
	bold: '\x1b[1m',
	dim: '\x1b[2m',
	red: '\x1b[31m',
	cyan: '\x1b[0;36m',
	green: '\x1b[0;32m',
	yellow: '\x1b[1;33m',
	reset: '\x1b[0m',
} as const;

export type AnsiStyle = Exclude<keyof typeof ANSI, 'reset'>;

const UDID_WIDTH = 36;
const OS_WIDTH = 12;
const STATE_WIDTH = 8;
const MIN_NAME_WIDTH = 'DEVICE'.length;
const RULE = '─';
const STAR = '★';

/**
 * Decide whether output should carry ANSI colour.
 * `auto` follows the stream's TTY status and the NO_COLOR convention.
 */
export function shouldUseColor(
	mode: ColorMode,
	isTTY: boolean,
	env: NodeJS.ProcessEnv = process.env,
): boolean {
	if (mode === 'always') return true;
	if (mode === 'never') return false;
	return isTTY && !env['NO_COLOR'];
}

export interface Painter {
	paint: (text: string, ...styles: AnsiStyle[]) => string;
}

export function createPainter(color: boolean): Painter {
	return {
		paint: (text, ...styles) =>
			color && styles.length > 0
				? `${styles.map(s => ANSI[s]).join('')}${text}${ANSI.reset}`
				: text,
	};
}

function row(
	udid: string,
	name: string,
	os: string,
	state: string,
	nameWidth: number,
): string {
	return [
		udid.padEnd(UDID_WIDTH),
		name.padEnd(nameWidth),
		os.padEnd(OS_WIDTH),
		state.padEnd(STATE_WIDTH),
	].join('  ');
}

/**
 * Render the simulator table as lines, default marked with a star and
 * booted devices in green. Columns pad but never truncate.
 */
export function formatSimulatorTable(
	simulators: Simulator[],
	defaultUdid: string | null,
	color: boolean,
): string[] {
	const {paint} = createPainter(color);
	const nameWidth = Math.max(
		MIN_NAME_WIDTH,
		...simulators.map(sim => sim.name.length),
	);

	const header = `  ${row('UDID', 'DEVICE', 'OS', 'STATE', nameWidth)}`;
	const separator = `  ${row(
		RULE.repeat(UDID_WIDTH),
		RULE.repeat(nameWidth),
		RULE.repeat(OS_WIDTH),
		RULE.repeat(STATE_WIDTH),
		nameWidth,
	)}`;

	const lines = [paint(header, 'bold', 'cyan'), paint(separator, 'dim')];

	for (const sim of simulators) {
		const prefix = sim.udid === defaultUdid ? paint(`${STAR} `, 'yellow') : '  ';
		const line = row(sim.udid, sim.name, sim.os, sim.state, nameWidth);
		lines.push(prefix + (sim.state === 'Booted' ? paint(line, 'green') : line));
	}

	lines.push('');
	lines.push(
		color
			? `  ${paint(STAR, 'yellow')} = default   ${paint('green', 'green')} = booted`
			: `  ${STAR} = default`,
	);

	return lines;
}
