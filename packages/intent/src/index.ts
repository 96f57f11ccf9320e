// @playsmith/intent — request interpretation, artifact matching, routing
export * from "./types.js";
export {
	DEFAULT_CATALOG_PATH,
	parseCatalog,
	loadCatalog,
	findIntent,
	intentNames,
} from "./catalog.js";
export { tokenize, findPhrase, containsPhrase, phraseText } from "./normalize.js";
export { recognize, recognizePort } from "./recognizers.js";
export { extractParams, missingRequiredParams, declaredParams } from "./extractor.js";
export { detectOsTarget, defaultOsTarget } from "./os.js";
export { classifyIntent, scoreIntent } from "./classifier.js";
export type { Classification, IntentScore } from "./classifier.js";
export { interpret, withOsDefault } from "./interpreter.js";
export type { InterpretOptions } from "./interpreter.js";
export { matchArtifacts, scoreArtifact, compareMatches, paramPoints, MATCH_WEIGHTS } from "./matcher.js";
export { decide } from "./decision.js";
export type { DecideOptions } from "./decision.js";
export { createRequestEngine } from "./engine.js";
export type { RequestEngine, RequestEngineOptions } from "./engine.js";
