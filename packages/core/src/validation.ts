/**
 * Runtime validation for configuration files and the intent catalog.
 *
 * A small fluent builder in the shape of the usual schema libraries. Every
 * validator is a plain function `(value) => result`, so they compose by
 * passing `.validate` around.
 */

import { ValidationError } from "./errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type ValidatorResult<T> =
	| { valid: true; value: T }
	| { valid: false; error: string };

export type ValidatorFn<T = unknown> = (value: unknown) => ValidatorResult<T>;

export interface ValidationIssue {
	path: string;
	message: string;
	received: unknown;
}

export interface ValidationResult<T = unknown> {
	valid: boolean;
	errors: ValidationIssue[];
	value?: T;
}

function describe(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Validator Classes ───────────────────────────────────────────────────────

class StringValidator {
	private minLen?: number;
	private patternRe?: RegExp;

	min(n: number): this {
		this.minLen = n;
		return this;
	}

	pattern(re: RegExp): this {
		this.patternRe = re;
		return this;
	}

	validate: ValidatorFn<string> = (value) => {
		if (typeof value !== "string") {
			return { valid: false, error: `Expected string, received ${describe(value)}` };
		}
		if (this.minLen !== undefined && value.length < this.minLen) {
			return { valid: false, error: `String length ${value.length} is below minimum ${this.minLen}` };
		}
		if (this.patternRe && !this.patternRe.test(value)) {
			return { valid: false, error: `String ${JSON.stringify(value)} does not match ${this.patternRe}` };
		}
		return { valid: true, value };
	};
}

class NumberValidator {
	private minVal?: number;
	private maxVal?: number;

	min(n: number): this {
		this.minVal = n;
		return this;
	}

	max(n: number): this {
		this.maxVal = n;
		return this;
	}

	validate: ValidatorFn<number> = (value) => {
		if (typeof value !== "number" || Number.isNaN(value)) {
			return { valid: false, error: `Expected number, received ${describe(value)}` };
		}
		if (this.minVal !== undefined && value < this.minVal) {
			return { valid: false, error: `Number ${value} is below minimum ${this.minVal}` };
		}
		if (this.maxVal !== undefined && value > this.maxVal) {
			return { valid: false, error: `Number ${value} exceeds maximum ${this.maxVal}` };
		}
		return { valid: true, value };
	};
}

class BooleanValidator {
	validate: ValidatorFn<boolean> = (value) => {
		if (typeof value !== "boolean") {
			return { valid: false, error: `Expected boolean, received ${describe(value)}` };
		}
		return { valid: true, value };
	};
}

class EnumValidator<T extends string> {
	constructor(private readonly allowed: readonly T[]) {}

	validate: ValidatorFn<T> = (value) => {
		const match = this.allowed.find((candidate) => candidate === value);
		if (match === undefined) {
			return { valid: false, error: `Expected one of ${this.allowed.join(", ")}, received ${JSON.stringify(value)}` };
		}
		return { valid: true, value: match };
	};
}

class ArrayValidator<T> {
	private minLen?: number;

	constructor(private readonly itemValidator: ValidatorFn<T>) {}

	min(n: number): this {
		this.minLen = n;
		return this;
	}

	validate: ValidatorFn<T[]> = (value) => {
		if (!Array.isArray(value)) {
			return { valid: false, error: `Expected array, received ${describe(value)}` };
		}
		if (this.minLen !== undefined && value.length < this.minLen) {
			return { valid: false, error: `Array length ${value.length} is below minimum ${this.minLen}` };
		}
		const items: T[] = [];
		for (let i = 0; i < value.length; i++) {
			const result = this.itemValidator(value[i]);
			if (!result.valid) {
				return { valid: false, error: `[${i}]: ${result.error}` };
			}
			items.push(result.value);
		}
		return { valid: true, value: items };
	};
}

class RecordValidator<T> {
	constructor(private readonly valueValidator: ValidatorFn<T>) {}

	validate: ValidatorFn<Record<string, T>> = (value) => {
		if (!isRecord(value)) {
			return { valid: false, error: `Expected object, received ${describe(value)}` };
		}
		const out: Record<string, T> = {};
		for (const [key, raw] of Object.entries(value)) {
			const result = this.valueValidator(raw);
			if (!result.valid) {
				return { valid: false, error: `${key}: ${result.error}` };
			}
			out[key] = result.value;
		}
		return { valid: true, value: out };
	};
}

type InferSchema<S extends Record<string, ValidatorFn>> = {
	[K in keyof S]: S[K] extends ValidatorFn<infer U> ? U : never;
};

class ObjectValidator<S extends Record<string, ValidatorFn>> {
	constructor(private readonly schema: S) {}

	validate: ValidatorFn<InferSchema<S>> = (value) => {
		if (!isRecord(value)) {
			return { valid: false, error: `Expected object, received ${describe(value)}` };
		}
		const out: Record<string, unknown> = {};
		const errors: string[] = [];

		for (const key of Object.keys(this.schema)) {
			const result = this.schema[key](value[key]);
			if (result.valid) {
				if (result.value !== undefined) out[key] = result.value;
			} else {
				errors.push(`${key}: ${result.error}`);
			}
		}

		if (errors.length > 0) {
			return { valid: false, error: errors.join("; ") };
		}
		// Every schema key was checked above.
		return { valid: true, value: out as InferSchema<S> };
	};
}

class OptionalValidator<T> {
	constructor(private readonly inner: ValidatorFn<T>) {}

	validate: ValidatorFn<T | undefined> = (value) => {
		if (value === undefined || value === null) {
			return { valid: true, value: undefined };
		}
		return this.inner(value);
	};
}

// ─── Fluent Builder ──────────────────────────────────────────────────────────

/**
 * Fluent validator builders.
 *
 * ```ts
 * const matchingV = v.object({
 *   minConfidence: v.number().min(0).max(1).validate,
 *   reuseThreshold: v.number().min(0).max(1).validate,
 * }).validate;
 * ```
 */
export const v = {
	string: () => new StringValidator(),
	number: () => new NumberValidator(),
	boolean: () => new BooleanValidator(),
	enum: <T extends string>(...allowed: T[]) => new EnumValidator<T>(allowed),
	array: <T>(itemValidator: ValidatorFn<T>) => new ArrayValidator<T>(itemValidator),
	record: <T>(valueValidator: ValidatorFn<T>) => new RecordValidator<T>(valueValidator),
	object: <S extends Record<string, ValidatorFn>>(schema: S) => new ObjectValidator<S>(schema),
	optional: <T>(validator: ValidatorFn<T>) => new OptionalValidator<T>(validator),
};

// ─── Utility Functions ───────────────────────────────────────────────────────

/**
 * Validate a value, collecting the failure into a {@link ValidationResult}
 * instead of throwing.
 */
export function validate<T>(value: unknown, validator: ValidatorFn<T>): ValidationResult<T> {
	const result = validator(value);
	if (result.valid) {
		return { valid: true, errors: [], value: result.value };
	}
	return {
		valid: false,
		errors: [{ path: "$", message: result.error, received: value }],
	};
}

/**
 * Validate or throw.
 *
 * @param label - Prefix for the error message (e.g. a file path).
 * @throws {ValidationError} when the value does not pass.
 */
export function assertValid<T>(value: unknown, validator: ValidatorFn<T>, label?: string): T {
	const result = validator(value);
	if (!result.valid) {
		const prefix = label ? `${label}: ` : "";
		throw new ValidationError(`${prefix}${result.error}`, label);
	}
	return result.value;
}
