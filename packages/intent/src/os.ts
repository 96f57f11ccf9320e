import { containsPhrase, tokenize } from "./normalize.js";
import type { IntentCatalog, OsTarget } from "./types.js";

/**
 * Detect the target OS family from the catalog's vocabulary.
 *
 * The first vocabulary entry present in the text wins, so a request naming
 * two families resolves by catalog order, not by position in the text.
 * Returns `"unspecified"` when nothing matches.
 */
export function detectOsTarget(text: string | readonly string[], catalog: IntentCatalog): OsTarget {
	const tokens = typeof text === "string" ? tokenize(text) : text;
	for (const entry of catalog.osVocabulary) {
		if (containsPhrase(tokens, entry.phrase)) return entry.target;
	}
	return "unspecified";
}

/** `"all"` for unspecified requests; anything else unchanged. */
export function defaultOsTarget(target: OsTarget): OsTarget {
	return target === "unspecified" ? "all" : target;
}
