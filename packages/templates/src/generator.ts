/**
 * TemplateGenerator — fills `{{key}}` placeholders in playbook templates.
 *
 * Placeholders are written without inner spaces. Ansible's own Jinja
 * expressions (`{{ item }}`, with spaces) pass through untouched.
 *
 * Values come from, in increasing precedence: the template's entry in
 * `defaults.json`, then `target_hosts: all`, then the request parameters,
 * then `os_type` (always the request's OS target). A rendered playbook
 * with any placeholder left is refused rather than written.
 *
 * Inside a YAML double-quoted scalar, `\` and `"` in a value are escaped.
 * Elsewhere a value may not contain `"`, and no value may span lines.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { TemplateError, createLogger, v, type Logger } from "@playsmith/core";
import type { DeterministicGenerator, GenerationRequest } from "@playsmith/intent";

/** Templates shipped with this package. */
export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL("../templates", import.meta.url));

const DEFAULTS_FILE = "defaults.json";
const PLACEHOLDER_RE = /\{\{([a-z0-9_]+)\}\}/g;
const UNSAFE_VALUE_RE = /[\n\r]|\{\{/;

const defaultsV = v.record(v.record(v.string().validate).validate).validate;

export interface TemplateGeneratorOptions {
	templatesDir?: string;
	logger?: Logger;
}

export class TemplateGenerator implements DeterministicGenerator {
	readonly templatesDir: string;
	private readonly log: Logger;
	private defaults: Record<string, Record<string, string>> | undefined;

	constructor(options: TemplateGeneratorOptions = {}) {
		this.templatesDir = options.templatesDir ?? DEFAULT_TEMPLATES_DIR;
		this.log = options.logger ?? createLogger("templates");
	}

	/**
	 * Render the request's template.
	 *
	 * @throws {TemplateError} when the request names no template, the file
	 *   is missing, a value is unsafe to embed, or placeholders remain.
	 */
	render(request: GenerationRequest): string {
		const template = request.template;
		if (template === undefined) {
			throw new TemplateError(`Intent ${request.intentName} has no template`, "");
		}

		const source = this.readTemplate(template);
		const values: Record<string, string> = {
			...this.defaultsFor(template),
			target_hosts: "all",
			...request.params,
			os_type: request.osTarget,
		};

		const unsafe = (key: string, value: string) =>
			new TemplateError(`Value of ${key} cannot be embedded in ${template}: ${JSON.stringify(value)}`, template);
		for (const [key, value] of Object.entries(values)) {
			if (UNSAFE_VALUE_RE.test(value)) throw unsafe(key, value);
		}

		const rendered = source
			.split("\n")
			.map((line) =>
				line.replace(PLACEHOLDER_RE, (match: string, key: string, offset: number) => {
					if (!Object.hasOwn(values, key)) return match;
					const value = values[key];
					if (insideDoubleQuotes(line, offset)) return escapeDoubleQuoted(value);
					if (value.includes('"')) throw unsafe(key, value);
					return value;
				}),
			)
			.join("\n");

		const left = unfilledPlaceholders(rendered);
		if (left.length > 0) {
			throw new TemplateError(`Template ${template} left unfilled placeholders: ${left.join(", ")}`, template);
		}

		this.log.debug("template rendered", { template, intent: request.intentName });
		return rendered;
	}

	private readTemplate(template: string): string {
		const filePath = path.join(this.templatesDir, template);
		if (path.dirname(path.resolve(filePath)) !== path.resolve(this.templatesDir)) {
			throw new TemplateError(`Template name ${template} escapes the templates directory`, template);
		}
		try {
			return fs.readFileSync(filePath, "utf-8");
		} catch (err) {
			const cause = err instanceof Error ? err : undefined;
			throw new TemplateError(`Template not found: ${filePath}`, template, cause);
		}
	}

	private defaultsFor(template: string): Record<string, string> {
		if (this.defaults === undefined) this.defaults = this.loadDefaults();
		return this.defaults[template] ?? {};
	}

	private loadDefaults(): Record<string, Record<string, string>> {
		const filePath = path.join(this.templatesDir, DEFAULTS_FILE);
		if (!fs.existsSync(filePath)) return {};
		let raw: unknown;
		try {
			raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
		} catch (err) {
			const cause = err instanceof Error ? err : undefined;
			throw new TemplateError(`Failed to parse ${filePath}`, DEFAULTS_FILE, cause);
		}
		const result = defaultsV(raw);
		if (!result.valid) {
			throw new TemplateError(`${filePath}: ${result.error}`, DEFAULTS_FILE);
		}
		return result.value;
	}
}

/** Whether `offset` in a template line falls inside a double-quoted scalar. */
function insideDoubleQuotes(line: string, offset: number): boolean {
	let open = false;
	for (let i = 0; i < offset; i++) {
		if (line[i] === "\\") i++;
		else if (line[i] === '"') open = !open;
	}
	return open;
}

function escapeDoubleQuoted(value: string): string {
	return value.replace(/[\\"]/g, (c) => `\\${c}`);
}

/** Distinct placeholder names still present in `text`, in order of appearance. */
export function unfilledPlaceholders(text: string): string[] {
	const names = new Set<string>();
	for (const match of text.matchAll(PLACEHOLDER_RE)) names.add(match[1]);
	return [...names];
}
