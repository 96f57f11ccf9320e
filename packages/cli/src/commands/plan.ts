/**
 * `playsmith plan <request> [--write]` — decide what to do with a request
 * and, with `--write`, generate and record the playbook.
 */

import fs from "node:fs";
import path from "node:path";
import { createLogger } from "@playsmith/core";
import {
	defaultOsTarget,
	type Decision,
	type GenerateDeterministicDecision,
	type GenerateFallbackDecision,
	type GenerationRequest,
	type OsTarget,
	type RequestParams,
} from "@playsmith/intent";
import type { ArtifactIndex } from "@playsmith/store";
import { writePlaybook } from "@playsmith/templates";
import type { ParsedArgs } from "../args.js";
import { formatDecision, formatParsed } from "../format.js";
import type { CliSession } from "../session.js";
import { requestText } from "./shared.js";

type GenerateDecision = GenerateDeterministicDecision | GenerateFallbackDecision;

async function render(session: CliSession, decision: GenerateDecision, rawText: string): Promise<string | undefined> {
	const request: GenerationRequest = {
		intentName: decision.intentName,
		rawText,
		params: decision.params,
		osTarget: defaultOsTarget(decision.osTarget),
		template: decision.kind === "generate-deterministic" ? decision.template : undefined,
	};
	if (decision.kind === "generate-deterministic") {
		return session.generator.render(request);
	}
	if (!session.fallback) {
		createLogger("cli:plan").warn("no fallback generator configured; nothing written", { intent: decision.intentName });
		return undefined;
	}
	return session.fallback.generate(request);
}

export interface SaveTarget {
	outputDir: string;
	intentName: string;
	params: RequestParams;
	osTarget: OsTarget;
	now: Date;
}

/**
 * Write a playbook and record it in the index. A playbook whose record
 * fails is deleted again, so the output directory never holds a file the
 * index cannot reuse.
 *
 * @returns The written path.
 */
export function savePlaybook(index: ArtifactIndex, content: string, target: SaveTarget): string {
	const filePath = writePlaybook(content, {
		outputDir: target.outputDir,
		intentName: target.intentName,
		osTarget: target.osTarget,
		now: target.now,
	});
	try {
		index.record({
			intentName: target.intentName,
			params: target.params,
			osTarget: target.osTarget,
			createdAt: target.now.getTime(),
			locationRef: filePath,
		});
	} catch (err) {
		fs.rmSync(filePath, { force: true });
		throw err;
	}
	return filePath;
}

/**
 * Generate the playbook for a generate decision, write it and record it.
 * Returns the written path, or undefined when nothing could be generated.
 */
async function generate(session: CliSession, decision: GenerateDecision, rawText: string): Promise<string | undefined> {
	const content = await render(session, decision, rawText);
	if (content === undefined) return undefined;

	return savePlaybook(session.index(), content, {
		outputDir: path.resolve(session.cwd, session.settings.outputDir),
		intentName: decision.intentName,
		params: decision.params,
		osTarget: defaultOsTarget(decision.osTarget),
		now: session.now(),
	});
}

export async function planCommand(session: CliSession, args: ParsedArgs): Promise<number> {
	const text = requestText(args, "plan");
	const parsed = session.engine.interpret(text, { params: args.params, osTarget: args.os });
	const artifacts = session.index().snapshot();
	const decision: Decision = session.engine.decide(parsed, artifacts);

	let written: string | undefined;
	if (args.write && (decision.kind === "generate-deterministic" || decision.kind === "generate-fallback")) {
		written = await generate(session, decision, text);
	}

	if (session.json) {
		session.out.stdout(JSON.stringify({ request: parsed, decision, written: written ?? null }, null, 2) + "\n");
		return 0;
	}

	const missing = session.engine.missingRequiredParams(parsed);
	const lines = [formatParsed(parsed, missing), "", formatDecision(decision)];
	if (written) lines.push(`wrote ${written}`);
	session.out.stdout(lines.join("\n") + "\n");
	return 0;
}
