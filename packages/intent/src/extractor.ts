/**
 * Parameter extraction for a classified request.
 *
 * Recognizers run in a fixed priority order and the first value registered
 * for a name wins:
 *
 *   1. supplied values (clarification answers)
 *   2. captures attached to the intent's trigger patterns, in pattern order
 *   3. catalog parameter recognizers, in catalog order
 *   4. derivations (lookup tables, constants), in intent order
 *
 * Only names the intent declares are ever kept.
 */

import { recognize, captureAfter, type RecognizerContext } from "./recognizers.js";
import { tokenize } from "./normalize.js";
import type { IntentCatalog, IntentDefinition, ParsedRequest, RequestParams } from "./types.js";
import { findIntent } from "./catalog.js";

/** Names the intent accepts: required first, then optional. */
export function declaredParams(intent: IntentDefinition): string[] {
	return [...intent.requiredParams, ...intent.optionalParams];
}

/** Keep only the non-blank entries of `params` that the intent declares, trimmed. */
export function filterDeclared(intent: IntentDefinition, params: Readonly<Record<string, string>>): Record<string, string> {
	const out: Record<string, string> = {};
	for (const name of declaredParams(intent)) {
		if (!Object.hasOwn(params, name)) continue;
		const value = params[name].trim();
		if (value.length > 0) out[name] = value;
	}
	return out;
}

function derive(intent: IntentDefinition, catalog: IntentCatalog, params: Record<string, string>): void {
	for (const rule of intent.derive) {
		if (params[rule.param] !== undefined) continue;
		if ("value" in rule) {
			params[rule.param] = rule.value;
			continue;
		}
		const source = params[rule.from];
		if (source === undefined) continue;
		const table = catalog.lookups[rule.lookup] ?? {};
		if (Object.hasOwn(table, source)) {
			params[rule.param] = table[source];
		} else if (rule.fallback !== undefined) {
			params[rule.param] = rule.fallback.replaceAll("{value}", source);
		}
	}
}

/**
 * Extract the parameters of `intent` from `text`.
 *
 * @param supplied - Values that take precedence over anything recognized.
 */
export function extractParams(
	text: string,
	intent: IntentDefinition,
	catalog: IntentCatalog,
	supplied: Readonly<Record<string, string>> = {},
): RequestParams {
	const ctx: RecognizerContext = { tokens: tokenize(text), catalog };
	const declared = new Set(declaredParams(intent));
	const params = filterDeclared(intent, supplied);

	for (const pattern of intent.triggerPatterns) {
		if (pattern.capture === undefined || params[pattern.capture] !== undefined) continue;
		const value = captureAfter(ctx, pattern.forms, pattern.skip);
		if (value !== undefined) params[pattern.capture] = value;
	}

	for (const parameter of catalog.parameters) {
		if (!parameter.recognizer || !declared.has(parameter.name)) continue;
		if (params[parameter.name] !== undefined) continue;
		const value = recognize(ctx, parameter.recognizer);
		if (value !== undefined) params[parameter.name] = value;
	}

	derive(intent, catalog, params);

	// Same key order every time: declaration order.
	const ordered: Record<string, string> = {};
	for (const name of declared) {
		if (params[name] !== undefined) ordered[name] = params[name];
	}
	return ordered;
}

/**
 * Required parameters of the request's intent that are absent, in
 * declaration order. Empty for unknown intents.
 */
export function missingRequiredParams(parsed: ParsedRequest, catalog: IntentCatalog): ReadonlySet<string> {
	const intent = findIntent(catalog, parsed.intentName);
	const missing = new Set<string>();
	if (!intent) return missing;
	for (const name of intent.requiredParams) {
		if (parsed.params[name] === undefined) missing.add(name);
	}
	return missing;
}
