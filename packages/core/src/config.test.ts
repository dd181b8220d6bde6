import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadJobConfig } from "./config";
import { FormatError, NotFoundError, ValidationError } from "./errors";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");
const fixture = (name: string): string => path.join(FIXTURE_DIR, name);

describe("loadJobConfig", () => {
	it("loads the required keys from a YAML document", () => {
		expect(loadJobConfig(fixture("valid.yaml"))).toEqual({
			seed: 42,
			window: 5,
			version: "v1",
			extras: {},
		});
	});

	it("accepts JSON documents and keeps extra keys aside", () => {
		expect(loadJobConfig(fixture("valid.json"))).toEqual({
			seed: 7,
			window: 3,
			version: "json-1",
			extras: { symbol: "BTC-USD" },
		});
	});

	it("coerces integer strings and numeric versions", () => {
		expect(loadJobConfig(fixture("string-values.yaml"))).toEqual({
			seed: 11,
			window: 4,
			version: "2",
			extras: { notes: { owner: "research" } },
		});
	});

	it("throws NotFoundError when the file does not exist", () => {
		expect(() => loadJobConfig(fixture("nope.yaml"))).toThrowError(
			NotFoundError
		);
		expect(() => loadJobConfig(fixture("nope.yaml"))).toThrowError(
			"Configuration file not found"
		);
	});

	it("throws FormatError for unparsable YAML", () => {
		expect(() => loadJobConfig(fixture("malformed.yaml"))).toThrowError(
			FormatError
		);
		expect(() => loadJobConfig(fixture("malformed.yaml"))).toThrowError(
			/^Invalid configuration file format: /
		);
	});

	it("throws FormatError when the document is not a mapping", () => {
		for (const name of ["list.yaml", "empty.yaml"]) {
			expect(() => loadJobConfig(fixture(name))).toThrowError(
				"Invalid configuration file format: expected a key-value mapping"
			);
		}
	});

	it("names the first missing required key", () => {
		expect(() => loadJobConfig(fixture("missing-window.yaml"))).toThrowError(
			new ValidationError(
				"Invalid configuration file structure: missing key window"
			)
		);
		expect(() =>
			loadJobConfig(fixture("missing-seed-and-version.yaml"))
		).toThrowError("Invalid configuration file structure: missing key seed");
	});

	it("rejects values that cannot be coerced", () => {
		expect(() => loadJobConfig(fixture("fractional-seed.yaml"))).toThrowError(
			"Invalid configuration value for seed: expected an integer"
		);
		expect(() => loadJobConfig(fixture("boolean-version.yaml"))).toThrowError(
			"Invalid configuration value for version: expected a string"
		);
	});
});
