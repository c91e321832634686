#!/usr/bin/env node
import meow from 'meow';
import {
	dispatch,
	reportError,
	usageLines,
	type CommandContext,
	type ExitCode,
} from './commands.ts';
import {getPaths, loadConfig, type SimpickConfig} from './config.ts';
import {confirmInTerminal} from './confirm.tsx';
import {logger} from './logger.ts';
import {runCommand} from './run-command.ts';
import {createPainter, shouldUseColor} from './table.ts';

const cli = meow(usageLines(false).join('\n'), {
	importMeta: import.meta,
	flags: {
		json: {
			type: 'boolean',
			default: false,
		},
		yes: {
			type: 'boolean',
			shortFlag: 'y',
			default: false,
		},
		help: {
			type: 'boolean',
			shortFlag: 'h',
			default: false,
		},
	},
});

if (cli.flags.help) {
	cli.showHelp(0);
}

const printErr = (line: string) => {
	console.error(line);
};

async function main(): Promise<ExitCode> {
	const paths = getPaths();
	const isTTY = Boolean(process.stdout.isTTY);

	let config: SimpickConfig;
	try {
		config = loadConfig(paths);
	} catch (error) {
		const {paint} = createPainter(shouldUseColor('auto', isTTY));
		return reportError(error, paint, printErr);
	}

	const color = shouldUseColor(config.color, isTTY);
	const ctx: CommandContext = {
		runner: runCommand,
		paths,
		config,
		color,
		interactive: Boolean(process.stdin.isTTY),
		confirm: confirmInTerminal,
		print: line => console.log(line),
	};

	logger.debug(`Invoked with: ${process.argv.slice(2).join(' ')}`);

	try {
		return await dispatch(ctx, cli.input, cli.flags);
	} catch (error) {
		return reportError(error, createPainter(color).paint, printErr);
	}
}

process.exitCode = await main();
