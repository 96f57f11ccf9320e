/**
 * @playsmith/cli — Command dispatch.
 *
 * `run()` never exits the process: it returns the exit status so the bin
 * script (and tests) decide what to do with it.
 */

import { PlaysmithError } from "@playsmith/core";
import type { FallbackGenerator } from "@playsmith/intent";
import { COMMANDS, HELP, parseArgs, UsageError, type ParsedArgs } from "./args.js";
import { red, stripAnsi } from "./ansi.js";
import { artifactsCommand } from "./commands/artifacts.js";
import { interpretCommand } from "./commands/interpret.js";
import { intentsCommand } from "./commands/intents.js";
import { planCommand } from "./commands/plan.js";
import { openSession, type CliSession, type Output } from "./session.js";

export const VERSION = "0.3.0";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface RunOptions {
	cwd?: string;
	/** Defaults to process.stdout / process.stderr. */
	out?: Output;
	/** Colored output. Defaults to whether stdout is a TTY. */
	color?: boolean;
	/** Client used for intents with no template. */
	fallback?: FallbackGenerator;
	now?: () => Date;
}

function processOutput(color: boolean): Output {
	const clean = (text: string) => (color ? text : stripAnsi(text));
	return {
		stdout: (text) => process.stdout.write(clean(text)),
		stderr: (text) => process.stderr.write(clean(text)),
	};
}

function withoutColor(out: Output): Output {
	return {
		stdout: (text) => out.stdout(stripAnsi(text)),
		stderr: (text) => out.stderr(stripAnsi(text)),
	};
}

async function dispatch(session: CliSession, args: ParsedArgs): Promise<number> {
	switch (args.command) {
		case "interpret":
			return interpretCommand(session, args);
		case "plan":
			return planCommand(session, args);
		case "intents":
			return intentsCommand(session);
		case "artifacts":
			return artifactsCommand(session, args);
		default:
			throw new UsageError(`Unknown command "${args.command ?? ""}"`);
	}
}

/**
 * Run one CLI invocation.
 *
 * @param argv - Arguments without the node and script entries.
 * @returns The process exit status.
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
	const color = options.color ?? (process.stdout.isTTY ?? false);
	const out = options.out ? (color ? options.out : withoutColor(options.out)) : processOutput(color);

	let args: ParsedArgs;
	try {
		args = parseArgs(argv);
	} catch (err) {
		if (err instanceof UsageError) {
			out.stderr(`${red("Error:")} ${err.message}\n${HELP}`);
			return EXIT_USAGE;
		}
		throw err;
	}

	if (args.version) {
		out.stdout(`playsmith v${VERSION}\n`);
		return EXIT_OK;
	}
	if (args.help || !args.command) {
		out.stdout(HELP);
		return args.help ? EXIT_OK : EXIT_USAGE;
	}
	if (!COMMANDS.has(args.command)) {
		out.stderr(`${red("Error:")} Unknown command "${args.command}"\n${HELP}`);
		return EXIT_USAGE;
	}

	let session: CliSession | undefined;
	try {
		session = openSession(args, { cwd: options.cwd ?? process.cwd(), out, fallback: options.fallback, now: options.now });
		return await dispatch(session, args);
	} catch (err) {
		if (err instanceof UsageError) {
			out.stderr(`${red("Error:")} ${err.message}\n`);
			return EXIT_USAGE;
		}
		if (err instanceof PlaysmithError) {
			out.stderr(`${red("Error:")} ${err.message} [${err.code}]\n`);
			return EXIT_FAILURE;
		}
		throw err;
	} finally {
		session?.close();
	}
}
