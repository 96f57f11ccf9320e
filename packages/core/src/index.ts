// @playsmith/core — errors, validation, configuration, logging
export * from "./types.js";
export * from "./errors.js";
export {
	createConfig,
	cascadeConfigs,
	getPlaysmithHome,
	loadGlobalConfig,
	loadProjectConfig,
	resolveSettings,
} from "./config.js";

export { v, validate, assertValid } from "./validation.js";
export type { ValidatorFn, ValidatorResult, ValidationIssue, ValidationResult } from "./validation.js";

export * from "./observability/index.js";
