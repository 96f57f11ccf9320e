/**
 * `playsmith artifacts list|record|remove` — manage the artifact index.
 */

import path from "node:path";
import { UNKNOWN_INTENT, withOsDefault } from "@playsmith/intent";
import { UsageError, type ParsedArgs } from "../args.js";
import { formatArtifact } from "../format.js";
import type { CliSession } from "../session.js";
import { requestText } from "./shared.js";

function list(session: CliSession, intentName: string | undefined): number {
	const artifacts = session.index().list(intentName);
	if (session.json) {
		session.out.stdout(JSON.stringify(artifacts, null, 2) + "\n");
	} else if (artifacts.length === 0) {
		session.out.stdout("No artifacts recorded.\n");
	} else {
		session.out.stdout(artifacts.map(formatArtifact).join("\n\n") + "\n");
	}
	return 0;
}

function record(session: CliSession, args: ParsedArgs): number {
	const locationRef = args.rest[0];
	if (!locationRef) {
		throw new UsageError("Playbook path required.\nUsage: playsmith artifacts record <path> <request>");
	}
	const text = requestText(args, "artifacts record <path>", 1);
	const parsed = withOsDefault(session.engine.interpret(text, { params: args.params, osTarget: args.os }));
	if (parsed.intentName === UNKNOWN_INTENT) {
		throw new UsageError(`Cannot classify "${text}"; describe what the playbook does.`);
	}

	const stored = session.index().record({
		intentName: parsed.intentName,
		params: parsed.params,
		osTarget: parsed.osTarget,
		createdAt: session.now().getTime(),
		locationRef: path.resolve(session.cwd, locationRef),
	});

	if (session.json) {
		session.out.stdout(JSON.stringify(stored, null, 2) + "\n");
	} else {
		session.out.stdout(`recorded ${formatArtifact(stored)}\n`);
	}
	return 0;
}

function remove(session: CliSession, args: ParsedArgs): number {
	const locationRef = args.rest[0];
	if (!locationRef) {
		throw new UsageError("Playbook path required.\nUsage: playsmith artifacts remove <path>");
	}
	const resolved = path.resolve(session.cwd, locationRef);
	const removed = session.index().remove(resolved);
	if (session.json) {
		session.out.stdout(JSON.stringify({ locationRef: resolved, removed }) + "\n");
	} else {
		session.out.stdout(removed ? `removed ${resolved}\n` : `not recorded: ${resolved}\n`);
	}
	return removed ? 0 : 1;
}

export function artifactsCommand(session: CliSession, args: ParsedArgs): number {
	switch (args.subcommand) {
		case "list":
			return list(session, args.rest[0]);
		case "record":
			return record(session, args);
		case "remove":
			return remove(session, args);
		default:
			throw new UsageError("Usage: playsmith artifacts <list|record|remove>");
	}
}
