/**
 * Artifact matching.
 *
 * Scores stored artifacts against a parsed request on a 100-point scale:
 *
 *   intent   50  hard filter; artifacts of another intent are dropped
 *   os       20  equal targets, or either side unspecified or "all"
 *   params   30  matching key/value pairs over the union of keys
 *
 * Points are summed first and divided by 100 once, so whole-point totals
 * such as 80 compare exactly against a 0.8 threshold.
 */

import type { ArtifactRecord, MatchBreakdown, MatchResult, OsTarget, ParsedRequest, RequestParams } from "./types.js";
import { UNKNOWN_INTENT } from "./types.js";

export const MATCH_WEIGHTS = {
	intent: 50,
	os: 20,
	params: 30,
} as const;

function osCompatible(a: OsTarget, b: OsTarget): boolean {
	const wildcard = (t: OsTarget) => t === "all" || t === "unspecified";
	return a === b || wildcard(a) || wildcard(b);
}

/**
 * Parameter points: agreeing key/value pairs over the union of keys, scaled
 * to {@link MATCH_WEIGHTS.params}. Values agree only when identical, case
 * included. Empty on both sides is full agreement.
 */
export function paramPoints(a: RequestParams, b: RequestParams): number {
	const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
	if (keys.size === 0) return MATCH_WEIGHTS.params;
	let agree = 0;
	for (const key of keys) {
		const left = a[key];
		const right = b[key];
		if (left !== undefined && left === right) agree++;
	}
	return (MATCH_WEIGHTS.params * agree) / keys.size;
}

/** Score one artifact, or `undefined` when its intent differs. */
export function scoreArtifact(parsed: ParsedRequest, artifact: ArtifactRecord): MatchResult | undefined {
	if (parsed.intentName === UNKNOWN_INTENT || artifact.intentName !== parsed.intentName) return undefined;

	const breakdown: MatchBreakdown = {
		intent: MATCH_WEIGHTS.intent,
		os: osCompatible(parsed.osTarget, artifact.osTarget) ? MATCH_WEIGHTS.os : 0,
		params: paramPoints(parsed.params, artifact.params),
	};
	const points = breakdown.intent + breakdown.os + breakdown.params;
	const score = Math.max(0, Math.min(1, points / 100));
	return { artifact, score, breakdown };
}

/** Best first; newer artifacts break ties, then `locationRef` ascending. */
export function compareMatches(a: MatchResult, b: MatchResult): number {
	if (a.score !== b.score) return b.score - a.score;
	if (a.artifact.createdAt !== b.artifact.createdAt) return b.artifact.createdAt - a.artifact.createdAt;
	if (a.artifact.locationRef < b.artifact.locationRef) return -1;
	if (a.artifact.locationRef > b.artifact.locationRef) return 1;
	return 0;
}

/**
 * Score and rank artifacts for a request. Unknown requests match nothing.
 */
export function matchArtifacts(parsed: ParsedRequest, artifacts: readonly ArtifactRecord[]): MatchResult[] {
	const results: MatchResult[] = [];
	for (const artifact of artifacts) {
		const result = scoreArtifact(parsed, artifact);
		if (result) results.push(result);
	}
	return results.sort(compareMatches);
}
