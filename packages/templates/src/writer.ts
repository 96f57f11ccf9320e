import fs from "node:fs";
import path from "node:path";
import type { OsTarget } from "@playsmith/intent";

function pad(n: number): string {
	return String(n).padStart(2, "0");
}

/** `yyyyMMdd_HHmmss` in local time. */
export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
	return `${day}_${time}`;
}

/** `<intent>_<os>_<yyyyMMdd_HHmmss>.yml` */
export function playbookFileName(intentName: string, osTarget: OsTarget, date: Date): string {
	return `${intentName}_${osTarget}_${formatTimestamp(date)}.yml`;
}

export interface WritePlaybookOptions {
	outputDir: string;
	intentName: string;
	osTarget: OsTarget;
	now?: Date;
}

/**
 * Write a playbook under `outputDir` and return its path.
 *
 * Never overwrites: a second playbook for the same intent and OS within
 * the same second gets a `_2`, `_3`, ... suffix.
 */
export function writePlaybook(content: string, options: WritePlaybookOptions): string {
	const now = options.now ?? new Date();
	fs.mkdirSync(options.outputDir, { recursive: true });

	const base = playbookFileName(options.intentName, options.osTarget, now).replace(/\.yml$/, "");
	for (let attempt = 1; ; attempt++) {
		const name = attempt === 1 ? `${base}.yml` : `${base}_${attempt}.yml`;
		const filePath = path.join(options.outputDir, name);
		try {
			fs.writeFileSync(filePath, content, { encoding: "utf-8", flag: "wx" });
			return filePath;
		} catch (err) {
			if (err instanceof Error && "code" in err && err.code === "EEXIST") continue;
			throw err;
		}
	}
}
