/**
 * Parameter recognizers: small lexical extractors, one per recognizer kind.
 *
 * Each takes the request's tokens and returns a value or `undefined`.
 * Values are lowercase strings; no recognizer ever throws.
 */

import { findAllPhrases, findPhrase } from "./normalize.js";
import type { IntentCatalog, Phrase, RecognizerSpec } from "./types.js";

export interface RecognizerContext {
	readonly tokens: readonly string[];
	readonly catalog: IntentCatalog;
}

const PORT_RE = /^(\d{1,5})(?:\/(?:tcp|udp))?$/;

/** Phrase occurrences across all triggers, in text order. */
function occurrences(tokens: readonly string[], triggers: readonly Phrase[]): Array<{ end: number }> {
	const hits: Array<{ start: number; end: number }> = [];
	for (const trigger of triggers) {
		for (const start of findAllPhrases(tokens, trigger)) {
			hits.push({ start, end: start + trigger.length });
		}
	}
	return hits.sort((a, b) => a.start - b.start);
}

/**
 * The token following any trigger, stepping over filler and `skip` words.
 * A stop word ends the search for that occurrence.
 */
export function captureAfter(
	ctx: RecognizerContext,
	triggers: readonly Phrase[],
	skip: readonly string[],
): string | undefined {
	const { tokens, catalog } = ctx;
	for (const { end } of occurrences(tokens, triggers)) {
		let i = end;
		while (i < tokens.length && (catalog.fillerWords.includes(tokens[i]) || skip.includes(tokens[i]))) i++;
		const candidate = tokens[i];
		if (candidate !== undefined && !catalog.stopWords.includes(candidate)) return candidate;
	}
	return undefined;
}

function portNumber(token: string): string | undefined {
	const m = PORT_RE.exec(token);
	if (!m) return undefined;
	const n = Number.parseInt(m[1], 10);
	return n >= 1 && n <= 65535 ? String(n) : undefined;
}

/** A port number, preferring one right after the word "port". */
export function recognizePort(tokens: readonly string[]): string | undefined {
	for (let i = 0; i < tokens.length - 1; i++) {
		if (tokens[i] === "port" || tokens[i] === "ports") {
			const port = portNumber(tokens[i + 1]);
			if (port) return port;
		}
	}
	for (const token of tokens) {
		const port = portNumber(token);
		if (port) return port;
	}
	return undefined;
}

function recognizeChoice(tokens: readonly string[], choices: Readonly<Record<string, string>>): string | undefined {
	for (const token of tokens) {
		// "8080/udp" offers "udp" too
		for (const part of [token, ...token.split("/")]) {
			if (Object.hasOwn(choices, part)) return choices[part];
		}
	}
	return undefined;
}

function recognizePath(tokens: readonly string[]): string | undefined {
	return tokens.find((token) => (token.startsWith("/") && token.length > 1) || token.startsWith("~/"));
}

function recognizeList(ctx: RecognizerContext, triggers: readonly Phrase[]): string | undefined {
	const { tokens, catalog } = ctx;
	for (const { end } of occurrences(tokens, triggers)) {
		const items: string[] = [];
		for (let i = end; i < tokens.length; i++) {
			const token = tokens[i];
			if (token === "and" || catalog.fillerWords.includes(token)) continue;
			if (catalog.stopWords.includes(token)) break;
			items.push(token);
		}
		if (items.length > 0) return items.join(",");
	}
	return undefined;
}

/** Run one recognizer against the request. */
export function recognize(ctx: RecognizerContext, spec: RecognizerSpec): string | undefined {
	switch (spec.kind) {
		case "after":
			return captureAfter(ctx, spec.triggers, spec.skip);
		case "port":
			return recognizePort(ctx.tokens);
		case "choice":
			return recognizeChoice(ctx.tokens, spec.choices);
		case "flag":
			return spec.phrases.some((phrase) => findPhrase(ctx.tokens, phrase) !== -1) ? spec.value : undefined;
		case "path":
			return recognizePath(ctx.tokens);
		case "list":
			return recognizeList(ctx, spec.triggers);
	}
}
