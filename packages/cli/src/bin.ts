#!/usr/bin/env node

/**
 * @playsmith/cli — Entry point.
 */

import { run } from "./main.js";

run(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		const message = err instanceof Error ? (err.stack ?? err.message) : String(err);
		process.stderr.write(`\nFatal: ${message}\n\n`);
		process.exitCode = 1;
	},
);
