/**
 * Shared types for request interpretation, artifact matching and routing.
 *
 * @packageDocumentation
 */

// ─── Catalog ────────────────────────────────────────────────────────────────

/** Target operating-system family of a request or artifact. */
export type OsTarget = "debian-family" | "redhat-family" | "fedora" | "all" | "unspecified";

/** Sentinel intent name for text that no catalog intent claims. */
export const UNKNOWN_INTENT = "unknown";

/**
 * `deterministic`: a template can produce a guaranteed-valid artifact.
 * `fallback`: only the generative path can handle the intent.
 */
export type GenerationPath = "deterministic" | "fallback";

/** A normalized phrase: one or more lowercase tokens that must appear contiguously. */
export type Phrase = readonly string[];

/**
 * One lexical trigger of an intent. Matches when any surface form appears
 * in the request. With `capture`, the token following the matched form
 * becomes that parameter's value (`skip` tokens are stepped over first).
 */
export interface TriggerPattern {
	readonly forms: readonly Phrase[];
	readonly capture?: string;
	readonly skip: readonly string[];
	/** An intent scores 0 unless every required pattern is present. */
	readonly required: boolean;
}

export type RecognizerSpec =
	/** First non-filler token after any trigger phrase. */
	| { readonly kind: "after"; readonly triggers: readonly Phrase[]; readonly skip: readonly string[] }
	/** A 1-5 digit port number, optionally suffixed `/tcp` or `/udp`. */
	| { readonly kind: "port" }
	/** First token found in a fixed vocabulary, mapped to its value. */
	| { readonly kind: "choice"; readonly choices: Readonly<Record<string, string>> }
	/** A fixed value whenever any phrase is present. */
	| { readonly kind: "flag"; readonly phrases: readonly Phrase[]; readonly value: string }
	/** First absolute or home-relative path. */
	| { readonly kind: "path" }
	/** Comma- or "and"-separated tokens after a trigger phrase. */
	| { readonly kind: "list"; readonly triggers: readonly Phrase[] };

export type RecognizerKind = RecognizerSpec["kind"];

/**
 * A parameter known to the catalog. Parameters without a recognizer are
 * ask-only: they are filled in by clarification, never from text.
 */
export interface ParameterDefinition {
	readonly name: string;
	readonly recognizer?: RecognizerSpec;
}

/** Fill an absent parameter from a recognized one, or with a constant. */
export type DerivationSpec =
	| { readonly param: string; readonly from: string; readonly lookup: string; readonly fallback?: string }
	| { readonly param: string; readonly value: string };

export interface IntentDefinition {
	readonly name: string;
	readonly description: string;
	readonly triggerPatterns: readonly TriggerPattern[];
	readonly requiredParams: readonly string[];
	readonly optionalParams: readonly string[];
	readonly generationPath: GenerationPath;
	/** Template file for the deterministic generator. */
	readonly template?: string;
	readonly derive: readonly DerivationSpec[];
}

export interface OsVocabularyEntry {
	readonly phrase: Phrase;
	readonly target: Exclude<OsTarget, "unspecified">;
}

/**
 * The loaded, validated and frozen intent catalog. Every list is ordered:
 * intent order breaks classification ties, parameter order is recognizer
 * priority, vocabulary order decides between several OS mentions.
 */
export interface IntentCatalog {
	readonly version: number;
	readonly intents: readonly IntentDefinition[];
	readonly parameters: readonly ParameterDefinition[];
	readonly osVocabulary: readonly OsVocabularyEntry[];
	readonly lookups: Readonly<Record<string, Readonly<Record<string, string>>>>;
	/** Stepped over when capturing a value ("the", "a"). */
	readonly fillerWords: readonly string[];
	/** End a capture without a value ("on", "with"). */
	readonly stopWords: readonly string[];
}

// ─── Requests ───────────────────────────────────────────────────────────────

export type RequestParams = Readonly<Record<string, string>>;

/** The structured form of one request. Frozen once returned. */
export interface ParsedRequest {
	readonly rawText: string;
	/** A catalog intent name, or {@link UNKNOWN_INTENT}. Never empty. */
	readonly intentName: string;
	/** In [0, 1]. Exactly 0 when `intentName` is unknown. */
	readonly confidence: number;
	readonly params: RequestParams;
	readonly osTarget: OsTarget;
}

/** Answers gathered by clarification, applied on re-interpretation. */
export interface InterpretOverrides {
	readonly params?: Readonly<Record<string, string>>;
	readonly osTarget?: OsTarget;
}

// ─── Artifacts ──────────────────────────────────────────────────────────────

/** A previously generated artifact. Owned by the artifact store; read-only here. */
export interface ArtifactRecord {
	readonly intentName: string;
	readonly params: RequestParams;
	readonly osTarget: OsTarget;
	/** Unix epoch milliseconds. */
	readonly createdAt: number;
	/** Opaque handle, usually a file path. */
	readonly locationRef: string;
}

export interface MatchBreakdown {
	/** Points out of 50. */
	readonly intent: number;
	/** Points out of 20. */
	readonly os: number;
	/** Points out of 30. */
	readonly params: number;
}

export interface MatchResult {
	readonly artifact: ArtifactRecord;
	/** In [0, 1]. */
	readonly score: number;
	readonly breakdown: MatchBreakdown;
}

// ─── Decisions ──────────────────────────────────────────────────────────────

export type DecisionKind = "reuse" | "generate-deterministic" | "generate-fallback" | "clarify";

export interface ReuseDecision {
	readonly kind: "reuse";
	readonly intentName: string;
	readonly artifact: ArtifactRecord;
	readonly locationRef: string;
	readonly score: number;
	readonly candidates: readonly MatchResult[];
}

export interface GenerateDeterministicDecision {
	readonly kind: "generate-deterministic";
	readonly intentName: string;
	readonly template?: string;
	readonly params: RequestParams;
	readonly osTarget: OsTarget;
	/** Near matches below the reuse threshold, for review. */
	readonly candidates: readonly MatchResult[];
}

export interface GenerateFallbackDecision {
	readonly kind: "generate-fallback";
	readonly intentName: string;
	readonly rawText: string;
	readonly params: RequestParams;
	readonly osTarget: OsTarget;
	readonly candidates: readonly MatchResult[];
}

export type ClarifyDecision =
	| {
		readonly kind: "clarify";
		/** Nothing in the catalog claimed the request: restate or pick an intent. */
		readonly reason: "unclassified";
		readonly intents: readonly string[];
	}
	| {
		readonly kind: "clarify";
		/** The intent is known but required parameters are missing. */
		readonly reason: "missing-params";
		readonly intentName: string;
		readonly missing: readonly string[];
		readonly candidates: readonly MatchResult[];
	};

export type Decision =
	| ReuseDecision
	| GenerateDeterministicDecision
	| GenerateFallbackDecision
	| ClarifyDecision;

// ─── Collaborators ──────────────────────────────────────────────────────────

/** Read accessor over previously generated artifacts. */
export interface ArtifactSource {
	/** A stable snapshot; later writes to the store do not change it. */
	snapshot(): readonly ArtifactRecord[];
}

/** What a generator needs to produce an artifact. */
export interface GenerationRequest {
	readonly intentName: string;
	readonly rawText: string;
	readonly params: RequestParams;
	readonly osTarget: OsTarget;
	readonly template?: string;
}

/** Template-filling generator for deterministic-eligible intents. */
export interface DeterministicGenerator {
	render(request: GenerationRequest): string;
}

/** Generative-model client for everything else. */
export interface FallbackGenerator {
	generate(request: GenerationRequest): Promise<string>;
}
