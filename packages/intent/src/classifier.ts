/**
 * Intent classification by trigger-pattern coverage.
 *
 * An intent's score is the fraction of its trigger patterns with at least
 * one surface form in the request, or 0 when a pattern marked `required`
 * is absent. The best score wins; ties go to the intent listed first in
 * the catalog.
 */

import { containsPhrase, tokenize } from "./normalize.js";
import type { IntentCatalog, IntentDefinition } from "./types.js";
import { UNKNOWN_INTENT } from "./types.js";

export interface IntentScore {
	readonly intentName: string;
	readonly matched: number;
	readonly total: number;
	readonly score: number;
}

export interface Classification {
	readonly intentName: string;
	readonly confidence: number;
	/** Every intent's score, in catalog order. */
	readonly scores: readonly IntentScore[];
}

export function scoreIntent(tokens: readonly string[], intent: IntentDefinition): IntentScore {
	const total = intent.triggerPatterns.length;
	const present = intent.triggerPatterns.map((pattern) => pattern.forms.some((form) => containsPhrase(tokens, form)));
	const matched = present.filter(Boolean).length;
	const gated = intent.triggerPatterns.some((pattern, i) => pattern.required && !present[i]);
	return { intentName: intent.name, matched, total, score: total === 0 || gated ? 0 : matched / total };
}

/**
 * Classify `text` against the catalog.
 *
 * @param minConfidence - Best scores below this yield {@link UNKNOWN_INTENT}.
 */
export function classifyIntent(text: string, catalog: IntentCatalog, minConfidence: number): Classification {
	const tokens = tokenize(text);
	const scores = catalog.intents.map((intent) => scoreIntent(tokens, intent));

	let best: IntentScore | undefined;
	for (const s of scores) {
		if (best === undefined || s.score > best.score) best = s;
	}

	if (!best || best.score === 0 || best.score < minConfidence) {
		return { intentName: UNKNOWN_INTENT, confidence: 0, scores };
	}
	return { intentName: best.intentName, confidence: best.score, scores };
}
