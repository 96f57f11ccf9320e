/**
 * Structured, levelled logging for playsmith.
 *
 * Level filtering, pluggable transports, child loggers and contextual
 * metadata. Entries below the threshold are dropped before any formatting.
 */

import { writeFileSync, appendFileSync, statSync, renameSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { LogLevelName } from "../types.js";

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
};

const LOG_LEVEL_PARSE: Record<LogLevelName, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
};

/** Map a settings level name (or `LOG_LEVEL` value) to a {@link LogLevel}. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
	if (!name) return undefined;
	const key = name.toLowerCase();
	return key === "debug" || key === "info" || key === "warn" || key === "error"
		? LOG_LEVEL_PARSE[key]
		: undefined;
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context metadata */
	context: Record<string, unknown>;
	error?: { name: string; code?: string; message: string; stack?: string };
	/** Duration in milliseconds for timed operations */
	duration?: number;
	/** Logger name, e.g. "intent:classifier" */
	logger: string;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. */
	level?: LogLevel;
	/** Output transports. Defaults to a single ConsoleTransport. */
	transports?: LogTransport[];
	/** Context merged into every entry. */
	defaultContext?: Record<string, unknown>;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};

/**
 * Configure global logging defaults. Affects loggers created after this call.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

/** Reset global config to defaults. Primarily for testing. */
export function resetLoggingConfig(): void {
	globalConfig = {};
}

// ─── Transports ──────────────────────────────────────────────────────────────

const ANSI_RESET = "\x1b[0m";
const ANSI_DIM = "\x1b[2m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",
	[LogLevel.INFO]: "\x1b[32m",
	[LogLevel.WARN]: "\x1b[33m",
	[LogLevel.ERROR]: "\x1b[31m",
};

function formatContext(context: Record<string, unknown>): string {
	return Object.keys(context)
		.map((k) => `${k}=${JSON.stringify(context[k])}`)
		.join(" ");
}

/**
 * Human-readable lines. Colored when stderr is a TTY; everything goes to
 * stderr so stdout stays free for command output.
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;

	constructor(opts?: { colors?: boolean }) {
		this.useColors = opts?.colors ?? (process.stderr.isTTY ?? false);
	}

	/** Render one entry without writing it. */
	format(entry: LogEntry): string {
		const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
		const lvl = entry.levelName.padEnd(5);
		const ctx = formatContext(entry.context);

		let line = this.useColors
			? `${ANSI_DIM}${ts}${ANSI_RESET} ${LEVEL_COLORS[entry.level]}${lvl}${ANSI_RESET} [${entry.logger}] ${entry.message}`
			: `${ts} ${lvl} [${entry.logger}] ${entry.message}`;

		if (ctx) line += this.useColors ? ` ${ANSI_DIM}${ctx}${ANSI_RESET}` : ` ${ctx}`;
		if (entry.duration !== undefined) line += ` duration=${entry.duration}ms`;
		if (entry.error) line += `\n  ${entry.error.name}: ${entry.error.message}`;
		return line;
	}

	write(entry: LogEntry): void {
		process.stderr.write(this.format(entry) + "\n");
	}
}

function toJsonLine(entry: LogEntry): string {
	return JSON.stringify({
		timestamp: entry.timestamp,
		level: entry.levelName,
		logger: entry.logger,
		message: entry.message,
		...(Object.keys(entry.context).length > 0 ? { context: entry.context } : {}),
		...(entry.error ? { error: entry.error } : {}),
		...(entry.duration !== undefined ? { duration: entry.duration } : {}),
	});
}

/**
 * One JSON object per line on stderr, for log aggregation.
 */
export class JsonTransport implements LogTransport {
	write(entry: LogEntry): void {
		process.stderr.write(toJsonLine(entry) + "\n");
	}
}

/**
 * Appends JSON lines to a file, rotating by size (`app.log` → `app.log.1` …).
 */
export class FileTransport implements LogTransport {
	private readonly filePath: string;
	private readonly maxSizeBytes: number;
	private readonly maxFiles: number;
	private currentSize: number;

	constructor(opts: {
		filePath: string;
		/** Default: 5 MiB. */
		maxSizeBytes?: number;
		/** Rotated files kept. Default: 3. */
		maxFiles?: number;
	}) {
		this.filePath = opts.filePath;
		this.maxSizeBytes = opts.maxSizeBytes ?? 5 * 1024 * 1024;
		this.maxFiles = opts.maxFiles ?? 3;
		mkdirSync(dirname(this.filePath), { recursive: true });
		try {
			this.currentSize = statSync(this.filePath).size;
		} catch {
			this.currentSize = 0; // not created yet
		}
	}

	write(entry: LogEntry): void {
		const line = toJsonLine(entry) + "\n";
		const bytes = Buffer.byteLength(line, "utf-8");
		if (this.currentSize > 0 && this.currentSize + bytes > this.maxSizeBytes) {
			this.rotate();
		}
		appendFileSync(this.filePath, line, "utf-8");
		this.currentSize += bytes;
	}

	private rotate(): void {
		for (let i = this.maxFiles - 1; i >= 1; i--) {
			try {
				renameSync(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
			} catch {
				continue; // gap in the rotation chain
			}
		}
		renameSync(this.filePath, `${this.filePath}.1`);
		writeFileSync(this.filePath, "", "utf-8");
		this.currentSize = 0;
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

function resolveLevel(configLevel?: LogLevel): LogLevel {
	const envLevel = parseLogLevel(process.env.LOG_LEVEL);
	if (envLevel !== undefined) return envLevel;
	if (configLevel !== undefined) return configLevel;
	if (globalConfig.level !== undefined) return globalConfig.level;
	return LogLevel.INFO;
}

export class Logger {
	private readonly name: string;
	private readonly level: LogLevel;
	private readonly transports: LogTransport[];
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = resolveLevel(config?.level);
		this.transports = config?.transports ?? globalConfig.transports ?? [new ConsoleTransport()];
		this.context = {
			...(globalConfig.defaultContext ?? {}),
			...(config?.defaultContext ?? {}),
		};
	}

	debug(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, undefined, ctx);
	}

	info(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, undefined, ctx);
	}

	warn(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, undefined, ctx);
	}

	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	/**
	 * Child logger named `parent:child`, sharing level, transports and context.
	 */
	child(childName: string): Logger {
		return new Logger(`${this.name}:${childName}`, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context },
		});
	}

	/** A copy of this logger with extra context merged in. */
	withContext(ctx: Record<string, unknown>): Logger {
		return new Logger(this.name, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context, ...ctx },
		});
	}

	private emit(level: LogLevel, message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		if (level < this.level) return;

		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LOG_LEVEL_NAMES[level],
			message,
			context: { ...this.context, ...(ctx ?? {}) },
			logger: this.name,
		};

		const duration = entry.context.duration;
		if (typeof duration === "number") {
			entry.duration = duration;
			delete entry.context.duration;
		}

		if (error instanceof Error) {
			const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
			entry.error = { name: error.name, message: error.message, stack: error.stack, ...(code ? { code } : {}) };
		} else if (error !== undefined) {
			entry.error = { name: "Error", message: String(error) };
		}

		for (const transport of this.transports) {
			transport.write(entry);
		}
	}
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Create a named logger with global defaults.
 *
 * @param name - Package or module identifier (e.g. "intent", "cli:plan").
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
