/**
 * Intent catalog loading and validation.
 *
 * The catalog is data, not code: intents, their trigger patterns, the
 * parameter recognizers, lookup tables and the OS vocabulary all live in a
 * JSON file. It is validated once, up front, and any problem is fatal.
 * A session never starts with a partially valid catalog.
 */

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { CatalogError, v, type ValidatorFn } from "@playsmith/core";
import { toPhrase } from "./normalize.js";
import type {
	DerivationSpec,
	IntentCatalog,
	IntentDefinition,
	OsVocabularyEntry,
	ParameterDefinition,
	Phrase,
	RecognizerSpec,
	TriggerPattern,
} from "./types.js";
import { UNKNOWN_INTENT } from "./types.js";

/** The catalog shipped with this package. */
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../catalog/intents.json", import.meta.url));

const NAME_RE = /^[a-z][a-z0-9_]*$/;

// ─── Raw Shape ──────────────────────────────────────────────────────────────

const stringsV = v.array(v.string().validate).validate;
const optionalStringsV = v.optional(stringsV).validate;

const recognizerShapeV = v.object({
	kind: v.enum("after", "port", "choice", "flag", "path", "list").validate,
	triggers: optionalStringsV,
	skip: optionalStringsV,
	choices: v.optional(v.record(v.string().validate).validate).validate,
	phrases: optionalStringsV,
	value: v.optional(v.string().validate).validate,
}).validate;

const parameterShapeV = v.object({
	name: v.string().min(1).validate,
	recognizer: v.optional(recognizerShapeV).validate,
}).validate;

const patternShapeV = v.object({
	forms: stringsV,
	capture: v.optional(v.string().min(1).validate).validate,
	skip: optionalStringsV,
	required: v.optional(v.boolean().validate).validate,
}).validate;

const deriveShapeV = v.object({
	param: v.string().min(1).validate,
	from: v.optional(v.string().validate).validate,
	lookup: v.optional(v.string().validate).validate,
	fallback: v.optional(v.string().validate).validate,
	value: v.optional(v.string().validate).validate,
}).validate;

const intentShapeV = v.object({
	name: v.string().min(1).validate,
	description: v.optional(v.string().validate).validate,
	triggerPatterns: v.array(patternShapeV).validate,
	requiredParams: v.array(v.string().validate).validate,
	optionalParams: optionalStringsV,
	generationPath: v.string().validate,
	template: v.optional(v.string().min(1).validate).validate,
	derive: v.optional(v.array(deriveShapeV).validate).validate,
}).validate;

const osShapeV = v.object({
	phrase: v.string().min(1).validate,
	target: v.enum("debian-family", "redhat-family", "fedora", "all").validate,
}).validate;

// Intents are checked one by one below so that every bad entry is reported.
const anyV: ValidatorFn<unknown> = (value) => ({ valid: true, value });

const catalogShapeV = v.object({
	version: v.number().min(1).validate,
	intents: v.array(anyV).validate,
	parameters: v.array(parameterShapeV).validate,
	osVocabulary: v.array(osShapeV).validate,
	lookups: v.optional(v.record(v.record(v.string().validate).validate).validate).validate,
	fillerWords: optionalStringsV,
	stopWords: optionalStringsV,
}).validate;

interface RawRecognizer {
	kind: RecognizerSpec["kind"];
	triggers?: string[];
	skip?: string[];
	choices?: Record<string, string>;
	phrases?: string[];
	value?: string;
}

// ─── Builders ───────────────────────────────────────────────────────────────

function phrases(texts: readonly string[], where: string, issues: string[]): Phrase[] {
	const out: Phrase[] = [];
	for (const text of texts) {
		const phrase = toPhrase(text);
		if (phrase.length === 0) {
			issues.push(`${where}: phrase ${JSON.stringify(text)} is empty after normalization`);
			continue;
		}
		out.push(phrase);
	}
	return out;
}

function words(texts: readonly string[] | undefined): string[] {
	return (texts ?? []).flatMap((text) => toPhrase(text));
}

function buildRecognizer(name: string, raw: RawRecognizer, issues: string[]): RecognizerSpec | undefined {
	const where = `parameter '${name}'`;
	switch (raw.kind) {
		case "after":
		case "list": {
			const triggers = phrases(raw.triggers ?? [], where, issues);
			if (triggers.length === 0) {
				issues.push(`${where}: '${raw.kind}' recognizer needs at least one trigger`);
				return undefined;
			}
			return raw.kind === "after"
				? { kind: "after", triggers, skip: words(raw.skip) }
				: { kind: "list", triggers };
		}
		case "choice": {
			const choices: Record<string, string> = {};
			for (const [word, value] of Object.entries(raw.choices ?? {})) {
				choices[word.toLowerCase()] = value;
			}
			if (Object.keys(choices).length === 0) {
				issues.push(`${where}: 'choice' recognizer needs at least one choice`);
				return undefined;
			}
			return { kind: "choice", choices };
		}
		case "flag": {
			const flagPhrases = phrases(raw.phrases ?? [], where, issues);
			if (flagPhrases.length === 0 || raw.value === undefined) {
				issues.push(`${where}: 'flag' recognizer needs phrases and a value`);
				return undefined;
			}
			return { kind: "flag", phrases: flagPhrases, value: raw.value };
		}
		case "port":
		case "path":
			return { kind: raw.kind };
	}
}

function buildIntent(
	raw: unknown,
	index: number,
	known: ReadonlySet<string>,
	lookups: Readonly<Record<string, unknown>>,
	issues: string[],
): IntentDefinition | undefined {
	const shape = intentShapeV(raw);
	if (!shape.valid) {
		issues.push(`intents[${index}]: ${shape.error}`);
		return undefined;
	}
	const r = shape.value;
	const where = `intent '${r.name}'`;
	const before = issues.length;

	if (r.name === UNKNOWN_INTENT) {
		issues.push(`intents[${index}]: '${UNKNOWN_INTENT}' is reserved`);
	} else if (!NAME_RE.test(r.name)) {
		issues.push(`intents[${index}]: name ${JSON.stringify(r.name)} must be lowercase snake_case`);
	}

	if (r.generationPath !== "deterministic" && r.generationPath !== "fallback") {
		issues.push(`${where}: unknown generation path ${JSON.stringify(r.generationPath)}`);
	}
	const generationPath = r.generationPath === "fallback" ? "fallback" : "deterministic";

	const required = r.requiredParams;
	const optional = r.optionalParams ?? [];
	const declared = new Set([...required, ...optional]);
	for (const param of declared) {
		if (!known.has(param)) issues.push(`${where}: parameter '${param}' is not in the parameter table`);
	}
	for (const param of required) {
		if (optional.includes(param)) issues.push(`${where}: parameter '${param}' is both required and optional`);
	}

	if (r.triggerPatterns.length === 0) {
		issues.push(`${where}: has no trigger patterns`);
	}
	const triggerPatterns: TriggerPattern[] = r.triggerPatterns.map((p, i) => {
		const forms = phrases(p.forms, `${where} pattern ${i}`, issues);
		if (p.forms.length === 0) issues.push(`${where} pattern ${i}: has no surface forms`);
		if (p.capture !== undefined && !declared.has(p.capture)) {
			issues.push(`${where} pattern ${i}: captures undeclared parameter '${p.capture}'`);
		}
		return { forms, capture: p.capture, skip: words(p.skip), required: p.required ?? false };
	});

	const derive: DerivationSpec[] = [];
	for (const d of r.derive ?? []) {
		if (!declared.has(d.param)) {
			issues.push(`${where}: derives undeclared parameter '${d.param}'`);
			continue;
		}
		if (d.value !== undefined) {
			derive.push({ param: d.param, value: d.value });
			continue;
		}
		if (d.from === undefined || d.lookup === undefined) {
			issues.push(`${where}: derivation of '${d.param}' needs either a value or from + lookup`);
			continue;
		}
		if (!declared.has(d.from)) {
			issues.push(`${where}: derives '${d.param}' from undeclared parameter '${d.from}'`);
		}
		if (!(d.lookup in lookups)) {
			issues.push(`${where}: derivation of '${d.param}' names unknown lookup '${d.lookup}'`);
		}
		derive.push({ param: d.param, from: d.from, lookup: d.lookup, fallback: d.fallback });
	}

	if (issues.length > before) return undefined;
	return {
		name: r.name,
		description: r.description ?? "",
		triggerPatterns,
		requiredParams: required,
		optionalParams: optional,
		generationPath,
		template: r.template,
		derive,
	};
}

function deepFreeze<T>(value: T): T {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) deepFreeze(child);
	}
	return value;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Validate a raw catalog document and build the frozen {@link IntentCatalog}.
 *
 * Collects every problem it can find before failing, so one run reports
 * them all.
 *
 * @param source - Where the document came from, for error messages.
 * @throws {CatalogError} listing every issue found.
 */
export function parseCatalog(raw: unknown, source?: string): IntentCatalog {
	const shape = catalogShapeV(raw);
	if (!shape.valid) throw new CatalogError([shape.error], source);
	const doc = shape.value;
	const issues: string[] = [];

	if (doc.intents.length === 0) {
		issues.push("intents: the catalog declares no intents");
	}

	const parameters: ParameterDefinition[] = [];
	const known = new Set<string>();
	for (const p of doc.parameters) {
		if (known.has(p.name)) {
			issues.push(`parameters: duplicate parameter '${p.name}'`);
			continue;
		}
		known.add(p.name);
		parameters.push({
			name: p.name,
			recognizer: p.recognizer ? buildRecognizer(p.name, p.recognizer, issues) : undefined,
		});
	}

	const lookups = doc.lookups ?? {};
	const intents: IntentDefinition[] = [];
	const seen = new Set<string>();
	doc.intents.forEach((rawIntent, index) => {
		const intent = buildIntent(rawIntent, index, known, lookups, issues);
		if (!intent) return;
		if (seen.has(intent.name)) {
			issues.push(`intents[${index}]: duplicate intent name '${intent.name}'`);
			return;
		}
		seen.add(intent.name);
		intents.push(intent);
	});

	const osVocabulary: OsVocabularyEntry[] = [];
	for (const entry of doc.osVocabulary) {
		const phrase = toPhrase(entry.phrase);
		if (phrase.length === 0) {
			issues.push(`osVocabulary: phrase ${JSON.stringify(entry.phrase)} is empty after normalization`);
			continue;
		}
		osVocabulary.push({ phrase, target: entry.target });
	}

	if (issues.length > 0) throw new CatalogError(issues, source);

	return deepFreeze({
		version: doc.version,
		intents,
		parameters,
		osVocabulary,
		lookups,
		fillerWords: words(doc.fillerWords),
		stopWords: words(doc.stopWords),
	});
}

/**
 * Read and validate a catalog file.
 *
 * @throws {CatalogError} when the file is unreadable, not JSON, or invalid.
 */
export function loadCatalog(filePath: string = DEFAULT_CATALOG_PATH): IntentCatalog {
	let text: string;
	try {
		text = fs.readFileSync(filePath, "utf-8");
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new CatalogError([`cannot read file: ${reason}`], filePath);
	}
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new CatalogError([`not valid JSON: ${reason}`], filePath);
	}
	return parseCatalog(raw, filePath);
}

/** Look up an intent definition by name. */
export function findIntent(catalog: IntentCatalog, name: string): IntentDefinition | undefined {
	return catalog.intents.find((intent) => intent.name === name);
}

/** Intent names in catalog order. */
export function intentNames(catalog: IntentCatalog): string[] {
	return catalog.intents.map((intent) => intent.name);
}
