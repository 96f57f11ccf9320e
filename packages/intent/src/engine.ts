/**
 * RequestEngine — the catalog bound to its thresholds.
 *
 * One engine serves a whole session. It holds no per-request state, so
 * calling `interpret` twice with the same text yields equal results.
 */

import { createLogger, DEFAULT_SETTINGS, type Logger, type MatchingSettings } from "@playsmith/core";
import { decide } from "./decision.js";
import { missingRequiredParams } from "./extractor.js";
import { interpret } from "./interpreter.js";
import type { ArtifactRecord, Decision, IntentCatalog, InterpretOverrides, ParsedRequest } from "./types.js";

export interface RequestEngine {
	readonly catalog: IntentCatalog;
	readonly settings: Readonly<MatchingSettings>;
	interpret(rawText: string, overrides?: InterpretOverrides): ParsedRequest;
	decide(parsed: ParsedRequest, artifacts: readonly ArtifactRecord[]): Decision;
	missingRequiredParams(parsed: ParsedRequest): ReadonlySet<string>;
}

export interface RequestEngineOptions extends Partial<MatchingSettings> {
	logger?: Logger;
}

export function createRequestEngine(catalog: IntentCatalog, options: RequestEngineOptions = {}): RequestEngine {
	const settings: MatchingSettings = Object.freeze({
		minConfidence: options.minConfidence ?? DEFAULT_SETTINGS.matching.minConfidence,
		reuseThreshold: options.reuseThreshold ?? DEFAULT_SETTINGS.matching.reuseThreshold,
	});
	const log = options.logger ?? createLogger("intent");

	return {
		catalog,
		settings,

		interpret(rawText, overrides) {
			const parsed = interpret(rawText, catalog, settings, overrides);
			log.debug("interpreted request", {
				intent: parsed.intentName,
				confidence: parsed.confidence,
				osTarget: parsed.osTarget,
				params: Object.keys(parsed.params),
			});
			return parsed;
		},

		decide(parsed, artifacts) {
			const decision = decide(parsed, artifacts, catalog, settings);
			log.debug("decided", { intent: parsed.intentName, decision: decision.kind, artifacts: artifacts.length });
			return decision;
		},

		missingRequiredParams(parsed) {
			return missingRequiredParams(parsed, catalog);
		},
	};
}
