import { UsageError, type ParsedArgs } from "../args.js";

/** The request text: every positional argument, joined. */
export function requestText(args: ParsedArgs, command: string, from = 0): string {
	const text = args.rest.slice(from).join(" ").trim();
	if (!text) {
		throw new UsageError(`Request text required.\nUsage: playsmith ${command} <request>`);
	}
	return text;
}
