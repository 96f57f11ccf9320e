/**
 * `playsmith interpret <request>` — show the structured form of a request.
 */

import type { ParsedArgs } from "../args.js";
import { formatParsed } from "../format.js";
import type { CliSession } from "../session.js";
import { requestText } from "./shared.js";

export function interpretCommand(session: CliSession, args: ParsedArgs): number {
	const text = requestText(args, "interpret");
	const parsed = session.engine.interpret(text, { params: args.params, osTarget: args.os });
	const missing = session.engine.missingRequiredParams(parsed);

	if (session.json) {
		session.out.stdout(JSON.stringify({ ...parsed, missing: [...missing] }, null, 2) + "\n");
	} else {
		session.out.stdout(formatParsed(parsed, missing) + "\n");
	}
	return 0;
}
