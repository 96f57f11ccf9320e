import fs from "fs";
import path from "path";
import { ConfigError, PlaysmithError } from "./errors.js";
import type { Config, ConfigLayer, PlaysmithSettings } from "./types.js";
import { DEFAULT_SETTINGS } from "./types.js";
import { v, assertValid } from "./validation.js";

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep-get a nested value from an object using dot-notation keys.
 */
function deepGet(obj: Record<string, unknown>, key: string): unknown {
	let current: unknown = obj;
	for (const part of key.split(".")) {
		if (!isRecord(current)) return undefined;
		current = current[part];
	}
	return current;
}

/**
 * Deep-set a nested value on an object using dot-notation keys.
 */
function deepSet(obj: Record<string, unknown>, key: string, value: unknown): void {
	const parts = key.split(".");
	let current = obj;
	for (let i = 0; i < parts.length - 1; i++) {
		const next = current[parts[i]];
		if (isRecord(next)) {
			current = next;
		} else {
			const created: Record<string, unknown> = {};
			current[parts[i]] = created;
			current = created;
		}
	}
	current[parts[parts.length - 1]] = value;
}

function deepDelete(obj: Record<string, unknown>, key: string): void {
	const parts = key.split(".");
	let current = obj;
	for (let i = 0; i < parts.length - 1; i++) {
		const next = current[parts[i]];
		if (!isRecord(next)) return;
		current = next;
	}
	delete current[parts[parts.length - 1]];
}

/**
 * Deep-merge source into target (mutates target). Arrays are replaced, not concatenated.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
	for (const key of Object.keys(source)) {
		const sv = source[key];
		const tv = target[key];
		if (isRecord(sv) && isRecord(tv)) {
			deepMerge(tv, sv);
		} else if (isRecord(sv)) {
			const copy: Record<string, unknown> = {};
			deepMerge(copy, sv);
			target[key] = copy;
		} else {
			target[key] = sv;
		}
	}
}

/**
 * Create a config layer backed by an in-memory object with dot-notation keys.
 *
 * @example
 * ```ts
 * const cfg = createConfig("session", { outputDir: "out" });
 * cfg.set("matching.reuseThreshold", 0.9);
 * cfg.get("matching.reuseThreshold"); // 0.9
 * ```
 */
export function createConfig(layer: ConfigLayer, initial: Record<string, unknown> = {}): Config {
	const data: Record<string, unknown> = {};
	deepMerge(data, initial);

	function get<T>(key: string): T | undefined;
	function get<T>(key: string, fallback: T): T;
	function get<T>(key: string, fallback?: T): T | undefined {
		const val = deepGet(data, key);
		// Values come from validated settings files; the caller names the type.
		return val !== undefined ? (val as T) : fallback;
	}

	return {
		layer,
		get,

		set(key: string, value: unknown): void {
			deepSet(data, key, value);
		},

		has(key: string): boolean {
			return deepGet(data, key) !== undefined;
		},

		delete(key: string): void {
			deepDelete(data, key);
		},

		all(): Record<string, unknown> {
			const copy: Record<string, unknown> = {};
			deepMerge(copy, data);
			return copy;
		},

		merge(other: Record<string, unknown>): void {
			deepMerge(data, other);
		},
	};
}

/**
 * Cascade config layers left-to-right; later layers win on key conflicts.
 */
export function cascadeConfigs(...layers: Config[]): Config {
	const merged = createConfig("session");
	for (const layer of layers) {
		merged.merge(layer.all());
	}
	return merged;
}

/**
 * The playsmith home directory. Honors `PLAYSMITH_HOME`, otherwise
 * `$HOME/.playsmith` (`$USERPROFILE` on Windows).
 */
export function getPlaysmithHome(): string {
	const override = process.env.PLAYSMITH_HOME?.trim();
	if (override) return override;
	return path.join(process.env.HOME || process.env.USERPROFILE || "~", ".playsmith");
}

const settingsValidator = v.object({
	matching: v.object({
		minConfidence: v.number().min(0).max(1).validate,
		reuseThreshold: v.number().min(0).max(1).validate,
	}).validate,
	catalogPath: v.optional(v.string().min(1).validate).validate,
	templatesDir: v.optional(v.string().min(1).validate).validate,
	outputDir: v.string().min(1).validate,
	storePath: v.optional(v.string().min(1).validate).validate,
	logLevel: v.enum("debug", "info", "warn", "error").validate,
	logFormat: v.enum("text", "json").validate,
	logFile: v.optional(v.string().min(1).validate).validate,
}).validate;

function readJsonFile(filePath: string): Record<string, unknown> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Failed to parse ${filePath}`, err instanceof Error ? err : undefined);
	}
	if (!isRecord(parsed)) {
		throw new ConfigError(`${filePath} must contain a JSON object`);
	}
	return parsed;
}

/**
 * Load `<home>/config/settings.json` as a config layer. Empty when absent.
 *
 * @throws {ConfigError} if the file exists but is not a JSON object.
 */
export function loadGlobalConfig(): Config {
	const settingsPath = path.join(getPlaysmithHome(), "config", "settings.json");
	if (!fs.existsSync(settingsPath)) return createConfig("global");
	return createConfig("global", readJsonFile(settingsPath));
}

/**
 * Load `<projectPath>/playsmith.json` as a config layer. Empty when absent.
 *
 * @throws {ConfigError} if the file exists but is not a JSON object.
 */
export function loadProjectConfig(projectPath: string): Config {
	const configPath = path.join(projectPath, "playsmith.json");
	if (!fs.existsSync(configPath)) return createConfig("project");
	return createConfig("project", readJsonFile(configPath));
}

/**
 * Resolve settings: defaults, then global settings, then project config,
 * then the given overrides. The merged result is validated as a whole.
 *
 * @throws {ConfigError} if any layer is unreadable or the result is invalid.
 */
export function resolveSettings(projectPath: string, overrides: Record<string, unknown> = {}): PlaysmithSettings {
	const merged = cascadeConfigs(
		createConfig("defaults", { ...DEFAULT_SETTINGS }),
		loadGlobalConfig(),
		loadProjectConfig(projectPath),
		createConfig("session", overrides),
	);
	try {
		return assertValid(merged.all(), settingsValidator, "settings");
	} catch (err) {
		if (err instanceof PlaysmithError) {
			throw new ConfigError(err.message, err);
		}
		throw err;
	}
}
