/**
 * Decision engine: routes one parsed request to reuse, a generator, or
 * clarification.
 *
 * Rules, first match wins:
 *
 *   1. unknown intent                       → clarify (unclassified)
 *   2. top match score ≥ reuse threshold    → reuse
 *   3. required parameters missing          → clarify (missing-params)
 *   4. deterministic-eligible intent        → generate-deterministic
 *   5. otherwise                            → generate-fallback
 */

import { findIntent, intentNames } from "./catalog.js";
import { missingRequiredParams } from "./extractor.js";
import { matchArtifacts } from "./matcher.js";
import type { ArtifactRecord, Decision, IntentCatalog, ParsedRequest } from "./types.js";
import { UNKNOWN_INTENT } from "./types.js";

export interface DecideOptions {
	/** Inclusive: a top score equal to the threshold is reused. */
	reuseThreshold: number;
}

export function decide(
	parsed: ParsedRequest,
	artifacts: readonly ArtifactRecord[],
	catalog: IntentCatalog,
	options: DecideOptions,
): Decision {
	const intent = findIntent(catalog, parsed.intentName);
	if (parsed.intentName === UNKNOWN_INTENT || !intent) {
		return { kind: "clarify", reason: "unclassified", intents: intentNames(catalog) };
	}

	const matches = matchArtifacts(parsed, artifacts);
	const top = matches[0];
	if (top && top.score >= options.reuseThreshold) {
		return {
			kind: "reuse",
			intentName: intent.name,
			artifact: top.artifact,
			locationRef: top.artifact.locationRef,
			score: top.score,
			candidates: matches.slice(1),
		};
	}

	const missing = missingRequiredParams(parsed, catalog);
	if (missing.size > 0) {
		return {
			kind: "clarify",
			reason: "missing-params",
			intentName: intent.name,
			missing: [...missing],
			candidates: matches,
		};
	}

	if (intent.generationPath === "deterministic") {
		return {
			kind: "generate-deterministic",
			intentName: intent.name,
			template: intent.template,
			params: parsed.params,
			osTarget: parsed.osTarget,
			candidates: matches,
		};
	}

	return {
		kind: "generate-fallback",
		intentName: intent.name,
		rawText: parsed.rawText,
		params: parsed.params,
		osTarget: parsed.osTarget,
		candidates: matches,
	};
}
