import { describe, it, expect } from "vitest";
import {
	PlaysmithError,
	ConfigError,
	CatalogError,
	ValidationError,
	StoreError,
	TemplateError,
} from "../src/errors.js";

describe("PlaysmithError", () => {
	it("stores message and code", () => {
		const err = new PlaysmithError("something broke", "MY_CODE");
		expect(err.message).toBe("something broke");
		expect(err.code).toBe("MY_CODE");
		expect(err.name).toBe("PlaysmithError");
		expect(err).toBeInstanceOf(Error);
	});

	it("chains the cause", () => {
		const cause = new Error("root cause");
		const err = new PlaysmithError("wrapper", "WRAP", cause);
		expect(err.cause).toBe(cause);
	});

	it("has no cause when none is given", () => {
		expect(new PlaysmithError("msg", "C").cause).toBeUndefined();
	});
});

describe("ConfigError", () => {
	it("uses CONFIG_ERROR and extends PlaysmithError", () => {
		const err = new ConfigError("bad settings");
		expect(err.code).toBe("CONFIG_ERROR");
		expect(err.name).toBe("ConfigError");
		expect(err).toBeInstanceOf(PlaysmithError);
	});
});

describe("CatalogError", () => {
	it("joins issues into the message and keeps them", () => {
		const err = new CatalogError(["intent 'a' has no trigger patterns", "duplicate intent 'b'"], "intents.json");
		expect(err.code).toBe("CATALOG_ERROR");
		expect(err.issues).toEqual(["intent 'a' has no trigger patterns", "duplicate intent 'b'"]);
		expect(err.source).toBe("intents.json");
		expect(err.message).toBe(
			"Invalid intent catalog (intents.json): intent 'a' has no trigger patterns; duplicate intent 'b'",
		);
	});

	it("omits the source when not given", () => {
		expect(new CatalogError(["empty"]).message).toBe("Invalid intent catalog: empty");
	});
});

describe("other errors", () => {
	it("carry their codes", () => {
		expect(new ValidationError("nope", "settings").code).toBe("VALIDATION_ERROR");
		expect(new ValidationError("nope", "settings").label).toBe("settings");
		expect(new StoreError("closed").code).toBe("STORE_ERROR");
		const tpl = new TemplateError("missing", "install_package.yml");
		expect(tpl.code).toBe("TEMPLATE_ERROR");
		expect(tpl.template).toBe("install_package.yml");
	});
});
