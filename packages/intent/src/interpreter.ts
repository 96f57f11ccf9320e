import { classifyIntent } from "./classifier.js";
import { extractParams } from "./extractor.js";
import { detectOsTarget, defaultOsTarget } from "./os.js";
import { findIntent } from "./catalog.js";
import type { IntentCatalog, InterpretOverrides, ParsedRequest } from "./types.js";

export interface InterpretOptions {
	/** Best classification scores below this become `unknown`. */
	minConfidence: number;
}

/**
 * Turn free text into a frozen {@link ParsedRequest}.
 *
 * Overrides fill in or replace parameters the intent declares and may pin
 * the OS target; they never change the classification. Undeclared override
 * keys are dropped.
 */
export function interpret(
	rawText: string,
	catalog: IntentCatalog,
	options: InterpretOptions,
	overrides: InterpretOverrides = {},
): ParsedRequest {
	const { intentName, confidence } = classifyIntent(rawText, catalog, options.minConfidence);
	const intent = findIntent(catalog, intentName);
	const params = intent ? extractParams(rawText, intent, catalog, overrides.params) : {};
	const osTarget = overrides.osTarget ?? detectOsTarget(rawText, catalog);

	return Object.freeze({
		rawText,
		intentName,
		confidence,
		params: Object.freeze(params),
		osTarget,
	});
}

/** A copy of `parsed` targeting `"all"` when it named no OS. */
export function withOsDefault(parsed: ParsedRequest): ParsedRequest {
	const osTarget = defaultOsTarget(parsed.osTarget);
	if (osTarget === parsed.osTarget) return parsed;
	return Object.freeze({ ...parsed, osTarget });
}
