// ─── Configuration ───────────────────────────────────────────────────────────

/** The scope/priority tier of a configuration layer. */
export type ConfigLayer = "defaults" | "global" | "project" | "session";

/** A configuration store with dot-notation key access and layer awareness. */
export interface Config {
	get<T>(key: string): T | undefined;
	get<T>(key: string, fallback: T): T;
	set(key: string, value: unknown): void;
	has(key: string): boolean;
	delete(key: string): void;
	layer: ConfigLayer;
	all(): Record<string, unknown>;
	merge(other: Record<string, unknown>): void;
}

// ─── Settings ────────────────────────────────────────────────────────────────

export type LogLevelName = "debug" | "info" | "warn" | "error";

/** `text` for human-readable lines, `json` for one JSON object per line. */
export type LogFormat = "text" | "json";

/** Thresholds for classification and artifact reuse. Both in [0, 1]. */
export interface MatchingSettings {
	/** Intents scoring below this are reported as `unknown`. */
	minConfidence: number;
	/** A top match scoring at or above this is reused (inclusive). */
	reuseThreshold: number;
}

/** Resolved settings for one session. */
export interface PlaysmithSettings {
	matching: MatchingSettings;
	/** Intent catalog file. Unset means the catalog shipped with @playsmith/intent. */
	catalogPath?: string;
	/** Playbook template directory. Unset means the templates shipped with @playsmith/templates. */
	templatesDir?: string;
	/** Where generated playbooks are written, relative to the working directory. */
	outputDir: string;
	/** SQLite artifact index. Unset means `<home>/artifacts.db`. */
	storePath?: string;
	logLevel: LogLevelName;
	/** Format of log lines on stderr. */
	logFormat: LogFormat;
	logFile?: string;
}

export const DEFAULT_SETTINGS: PlaysmithSettings = {
	matching: {
		minConfidence: 0.34,
		reuseThreshold: 0.8,
	},
	outputDir: "output",
	logLevel: "info",
	logFormat: "text",
};
