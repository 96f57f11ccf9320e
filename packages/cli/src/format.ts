/**
 * Text rendering of requests, decisions and artifacts.
 */

import type { ArtifactRecord, Decision, IntentDefinition, MatchResult, ParsedRequest } from "@playsmith/intent";
import { phraseText } from "@playsmith/intent";
import { bold, cyan, dim, gray, green, yellow } from "./ansi.js";

function formatParams(params: Readonly<Record<string, string>>): string {
	const entries = Object.entries(params);
	if (entries.length === 0) return dim("(none)");
	return entries.map(([k, v]) => `${k}=${v}`).join(" ");
}

function formatScore(score: number): string {
	return score.toFixed(2);
}

export function formatParsed(parsed: ParsedRequest, missing: ReadonlySet<string>): string {
	const lines = [
		`${gray("intent:")}     ${bold(parsed.intentName)} ${dim(`(confidence ${formatScore(parsed.confidence)})`)}`,
		`${gray("os:")}         ${parsed.osTarget}`,
		`${gray("params:")}     ${formatParams(parsed.params)}`,
	];
	if (missing.size > 0) {
		lines.push(`${gray("missing:")}    ${yellow([...missing].join(", "))}`);
	}
	return lines.join("\n");
}

function formatCandidates(candidates: readonly MatchResult[]): string[] {
	if (candidates.length === 0) return [];
	return [
		gray("near matches:"),
		...candidates.map((c) => `  ${formatScore(c.score)}  ${c.artifact.locationRef}`),
	];
}

export function formatDecision(decision: Decision): string {
	switch (decision.kind) {
		case "reuse":
			return [
				`${green("reuse")} ${decision.locationRef} ${dim(`(score ${formatScore(decision.score)})`)}`,
				...formatCandidates(decision.candidates),
			].join("\n");
		case "generate-deterministic":
			return [
				`${cyan("generate")} from template ${decision.template ?? dim("(none)")}`,
				...formatCandidates(decision.candidates),
			].join("\n");
		case "generate-fallback":
			return [`${cyan("generate")} with the fallback generator`, ...formatCandidates(decision.candidates)].join("\n");
		case "clarify":
			if (decision.reason === "unclassified") {
				return `${yellow("clarify")}: could not classify the request. Known intents: ${decision.intents.join(", ")}`;
			}
			return [
				`${yellow("clarify")}: ${decision.intentName} needs ${decision.missing.join(", ")}`,
				dim(`  answer with ${decision.missing.map((m) => `--param ${m}=...`).join(" ")}`),
				...formatCandidates(decision.candidates),
			].join("\n");
	}
}

export function formatIntent(intent: IntentDefinition): string {
	const forms = intent.triggerPatterns.map((p) => p.forms.map(phraseText).join("|")).join("  +  ");
	const required = intent.requiredParams.length > 0 ? intent.requiredParams.join(", ") : dim("(none)");
	const optional = intent.optionalParams.length > 0 ? intent.optionalParams.join(", ") : dim("(none)");
	return [
		`${bold(intent.name)} ${dim(`[${intent.generationPath}]`)} ${intent.description}`,
		`  ${gray("triggers:")} ${forms}`,
		`  ${gray("required:")} ${required}`,
		`  ${gray("optional:")} ${optional}`,
	].join("\n");
}

export function formatArtifact(artifact: ArtifactRecord): string {
	const created = new Date(artifact.createdAt).toISOString().replace("T", " ").slice(0, 19);
	return `${bold(artifact.intentName)} ${gray(artifact.osTarget)} ${dim(created)}\n  ${artifact.locationRef}\n  ${formatParams(artifact.params)}`;
}
