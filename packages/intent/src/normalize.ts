import type { Phrase } from "./types.js";

/**
 * Lowercase, collapse whitespace, and split into tokens.
 *
 * Punctuation other than the characters that appear inside paths, image
 * tags and times (`/ . _ - : ~ @ +`) separates tokens. Leading and
 * trailing `.`, `:` and `-` are trimmed, so "ubuntu." and "ubuntu" agree.
 */
export function tokenize(text: string): string[] {
	return text
		.toLowerCase()
		.replace(/[^a-z0-9_./:~@+-]+/g, " ")
		.split(/\s+/)
		.map((token) => token.replace(/^[.:-]+|[.:-]+$/g, ""))
		.filter((token) => token.length > 0);
}

/** Normalize a catalog phrase ("Set  Up") into its tokens (["set", "up"]). */
export function toPhrase(text: string): Phrase {
	return tokenize(text);
}

/**
 * Index of the first occurrence of `phrase` in `tokens` at or after `from`,
 * or -1.
 */
export function findPhrase(tokens: readonly string[], phrase: Phrase, from = 0): number {
	if (phrase.length === 0) return -1;
	outer: for (let i = from; i <= tokens.length - phrase.length; i++) {
		for (let j = 0; j < phrase.length; j++) {
			if (tokens[i + j] !== phrase[j]) continue outer;
		}
		return i;
	}
	return -1;
}

/** Every start index of `phrase` in `tokens`, ascending. */
export function findAllPhrases(tokens: readonly string[], phrase: Phrase): number[] {
	const hits: number[] = [];
	let at = findPhrase(tokens, phrase);
	while (at !== -1) {
		hits.push(at);
		at = findPhrase(tokens, phrase, at + 1);
	}
	return hits;
}

export function containsPhrase(tokens: readonly string[], phrase: Phrase): boolean {
	return findPhrase(tokens, phrase) !== -1;
}

export function phraseText(phrase: Phrase): string {
	return phrase.join(" ");
}
