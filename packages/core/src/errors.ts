/**
 * Typed error hierarchy for playsmith.
 *
 * Every error carries a machine-readable `code` so callers (the CLI, a batch
 * runner) can pick an exit status or message without string matching.
 */

/**
 * Base class for all playsmith errors.
 */
export class PlaysmithError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, { cause });
		this.name = "PlaysmithError";
		this.code = code;
	}
}

/**
 * Settings or project configuration could not be read or failed validation.
 */
export class ConfigError extends PlaysmithError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}

/**
 * The intent catalog is malformed. Raised once, at load time, and fatal to
 * starting a session: an intent that fails validation is never skipped.
 */
export class CatalogError extends PlaysmithError {
	readonly issues: readonly string[];
	readonly source?: string;

	constructor(issues: readonly string[], source?: string) {
		const where = source ? ` (${source})` : "";
		super(`Invalid intent catalog${where}: ${issues.join("; ")}`, "CATALOG_ERROR");
		this.name = "CatalogError";
		this.issues = issues;
		this.source = source;
	}
}

/**
 * A value failed a runtime validator (see `assertValid`).
 */
export class ValidationError extends PlaysmithError {
	readonly label?: string;

	constructor(message: string, label?: string) {
		super(message, "VALIDATION_ERROR");
		this.name = "ValidationError";
		this.label = label;
	}
}

/**
 * Artifact index failure: closed store, unreadable row, SQLite error.
 */
export class StoreError extends PlaysmithError {
	constructor(message: string, cause?: Error) {
		super(message, "STORE_ERROR", cause);
		this.name = "StoreError";
	}
}

/**
 * Template missing, unreadable, or left with unfilled placeholders.
 */
export class TemplateError extends PlaysmithError {
	readonly template: string;

	constructor(message: string, template: string, cause?: Error) {
		super(message, "TEMPLATE_ERROR", cause);
		this.name = "TemplateError";
		this.template = template;
	}
}
