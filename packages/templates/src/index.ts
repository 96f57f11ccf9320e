// @playsmith/templates — deterministic playbook generation
export { TemplateGenerator, DEFAULT_TEMPLATES_DIR, unfilledPlaceholders } from "./generator.js";
export type { TemplateGeneratorOptions } from "./generator.js";
export { writePlaybook, playbookFileName, formatTimestamp } from "./writer.js";
export type { WritePlaybookOptions } from "./writer.js";
