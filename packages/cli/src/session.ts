/**
 * One CLI invocation's resolved settings and collaborators.
 *
 * The catalog is loaded (and validated) eagerly; the artifact index is
 * opened on first use so `intents` never touches the database.
 */

import path from "node:path";
import {
	configureLogging,
	ConsoleTransport,
	FileTransport,
	JsonTransport,
	parseLogLevel,
	resolveSettings,
	type LogTransport,
	type PlaysmithSettings,
} from "@playsmith/core";
import { createRequestEngine, loadCatalog, type FallbackGenerator, type RequestEngine } from "@playsmith/intent";
import { ArtifactIndex } from "@playsmith/store";
import { TemplateGenerator } from "@playsmith/templates";
import type { ParsedArgs } from "./args.js";

export interface Output {
	stdout(text: string): void;
	stderr(text: string): void;
}

export interface CliSession {
	readonly settings: PlaysmithSettings;
	readonly engine: RequestEngine;
	readonly generator: TemplateGenerator;
	readonly fallback?: FallbackGenerator;
	readonly cwd: string;
	readonly out: Output;
	readonly json: boolean;
	readonly now: () => Date;
	/** Opens the artifact index on first call. */
	index(): ArtifactIndex;
	close(): void;
}

export interface SessionOptions {
	cwd: string;
	out: Output;
	fallback?: FallbackGenerator;
	now?: () => Date;
}

function overridesFrom(args: ParsedArgs): Record<string, unknown> {
	const overrides: Record<string, unknown> = {};
	if (args.catalog) overrides.catalogPath = args.catalog;
	if (args.store) overrides.storePath = args.store;
	return overrides;
}

function setUpLogging(settings: PlaysmithSettings, cwd: string): void {
	const transports: LogTransport[] = [settings.logFormat === "json" ? new JsonTransport() : new ConsoleTransport()];
	if (settings.logFile) {
		transports.push(new FileTransport({ filePath: path.resolve(cwd, settings.logFile) }));
	}
	configureLogging({ level: parseLogLevel(settings.logLevel), transports });
}

/**
 * Resolve settings and build the engine.
 *
 * @throws {ConfigError} for invalid settings.
 * @throws {CatalogError} for an invalid catalog.
 */
export function openSession(args: ParsedArgs, options: SessionOptions): CliSession {
	const { cwd, out } = options;
	const settings = resolveSettings(cwd, overridesFrom(args));
	setUpLogging(settings, cwd);

	const catalog = settings.catalogPath ? loadCatalog(path.resolve(cwd, settings.catalogPath)) : loadCatalog();
	const engine = createRequestEngine(catalog, settings.matching);
	const generator = new TemplateGenerator({
		templatesDir: settings.templatesDir ? path.resolve(cwd, settings.templatesDir) : undefined,
	});

	let index: ArtifactIndex | undefined;

	return {
		settings,
		engine,
		generator,
		fallback: options.fallback,
		cwd,
		out,
		json: args.json ?? false,
		now: options.now ?? (() => new Date()),
		index() {
			if (!index) {
				index = ArtifactIndex.open({
					dbPath: settings.storePath ? path.resolve(cwd, settings.storePath) : undefined,
				});
			}
			return index;
		},
		close() {
			index?.close();
		},
	};
}
