/**
 * @playsmith/cli — Argument parser.
 *
 * Simple CLI argument parser with no external dependencies.
 * Parses flags, the command, its subcommand and positional arguments.
 */

import { PlaysmithError } from "@playsmith/core";
import type { OsTarget } from "@playsmith/intent";

export interface ParsedArgs {
	command?: string;
	subcommand?: string;
	/** Print machine-readable JSON instead of text. */
	json?: boolean;
	/** `plan`: write the generated playbook and record it. */
	write?: boolean;
	/** Intent catalog override (--catalog). */
	catalog?: string;
	/** Artifact index override (--store). */
	store?: string;
	/** Pin the OS target (--os). */
	os?: OsTarget;
	/** Clarification answers (--param key=value, repeatable). */
	params: Record<string, string>;
	version?: boolean;
	help?: boolean;
	/** Positional arguments after the command (and subcommand). */
	rest: string[];
}

/** Bad command line. The CLI exits with status 2. */
export class UsageError extends PlaysmithError {
	constructor(message: string) {
		super(message, "USAGE_ERROR");
		this.name = "UsageError";
	}
}

/**
 * Known commands.
 */
export const COMMANDS = new Set(["interpret", "plan", "intents", "artifacts"]);

/**
 * Commands that take a second-level command.
 */
const SUBCOMMANDS = new Set(["artifacts"]);

const OS_TARGETS: readonly OsTarget[] = ["debian-family", "redhat-family", "fedora", "all", "unspecified"];

function toOsTarget(value: string): OsTarget {
	const target = OS_TARGETS.find((t) => t === value);
	if (!target) {
		throw new UsageError(`--os must be one of ${OS_TARGETS.join(", ")}, got "${value}"`);
	}
	return target;
}

/**
 * Parse process.argv (or a custom argv array) into structured arguments.
 *
 * Expects argv WITHOUT the leading `node` and script path entries,
 * i.e., pass `process.argv.slice(2)`.
 *
 * @throws {UsageError} for a flag missing its value or a malformed `--param`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const result: ParsedArgs = {
		params: {},
		rest: [],
	};

	let i = 0;

	const valueOf = (flag: string): string => {
		i++;
		if (i >= argv.length || argv[i].startsWith("-")) {
			throw new UsageError(`${flag} requires a value`);
		}
		return argv[i];
	};

	while (i < argv.length) {
		const arg = argv[i];

		// ─── Flags with values ──────────────────────────────────────────
		if (arg === "--catalog") {
			result.catalog = valueOf(arg);
			i++;
			continue;
		}

		if (arg === "--store") {
			result.store = valueOf(arg);
			i++;
			continue;
		}

		if (arg === "--os") {
			result.os = toOsTarget(valueOf(arg));
			i++;
			continue;
		}

		if (arg === "--param") {
			const pair = valueOf(arg);
			const eq = pair.indexOf("=");
			if (eq <= 0) {
				throw new UsageError(`--param expects key=value, got "${pair}"`);
			}
			result.params[pair.slice(0, eq).trim()] = pair.slice(eq + 1);
			i++;
			continue;
		}

		// ─── Boolean flags ──────────────────────────────────────────────
		if (arg === "--json") {
			result.json = true;
			i++;
			continue;
		}

		if (arg === "--write") {
			result.write = true;
			i++;
			continue;
		}

		if (arg === "-v" || arg === "--version") {
			result.version = true;
			i++;
			continue;
		}

		if (arg === "-h" || arg === "--help") {
			result.help = true;
			i++;
			continue;
		}

		if (arg.startsWith("-") && arg.length > 1) {
			throw new UsageError(`Unknown option ${arg}`);
		}

		// ─── Command, subcommand, positionals ───────────────────────────
		if (!result.command) {
			result.command = arg;
		} else if (SUBCOMMANDS.has(result.command) && !result.subcommand) {
			result.subcommand = arg;
		} else {
			result.rest.push(arg);
		}
		i++;
	}

	return result;
}

export const HELP = `
playsmith — turn infrastructure requests into Ansible playbooks

Usage:
  playsmith interpret <request>         Show how a request is understood
  playsmith plan <request> [--write]    Decide: reuse, generate, or ask
  playsmith intents                     List the intents in the catalog
  playsmith artifacts list [intent]     List recorded playbooks
  playsmith artifacts record <path> <request>
                                        Record an existing playbook for reuse
  playsmith artifacts remove <path>     Forget a recorded playbook

Options:
  --param <key=value>           Supply a parameter (repeatable)
  --os <target>                 debian-family|redhat-family|fedora|all|unspecified
  --write                       Write and record the generated playbook (plan)
  --catalog <file>              Use another intent catalog
  --store <file>                Use another artifact index
  --json                        Print JSON
  -v, --version                 Show version
  -h, --help                    Show this help

Exit status: 0 on any decision, 1 on configuration or storage errors,
2 on usage errors.
`;
