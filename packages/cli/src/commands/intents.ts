/**
 * `playsmith intents` — list the catalog.
 */

import { formatIntent } from "../format.js";
import type { CliSession } from "../session.js";
import { phraseText } from "@playsmith/intent";

export function intentsCommand(session: CliSession): number {
	const { intents } = session.engine.catalog;

	if (session.json) {
		const rows = intents.map((intent) => ({
			name: intent.name,
			description: intent.description,
			generationPath: intent.generationPath,
			template: intent.template,
			requiredParams: intent.requiredParams,
			optionalParams: intent.optionalParams,
			triggers: intent.triggerPatterns.map((p) => p.forms.map(phraseText)),
		}));
		session.out.stdout(JSON.stringify(rows, null, 2) + "\n");
		return 0;
	}

	session.out.stdout(intents.map(formatIntent).join("\n\n") + "\n");
	return 0;
}
