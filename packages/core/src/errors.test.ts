import { describe, expect, it } from "vitest";
import {
	FormatError,
	NotFoundError,
	ValidationError,
	getErrorMessage,
	isJobError,
} from "./errors";

describe("job errors", () => {
	it("tags each error with its kind and name", () => {
		const notFound = new NotFoundError("Input CSV file not found", "in.csv");
		const format = new FormatError("Invalid CSV file format", "bad quote");
		const validation = new ValidationError("Input file is empty", "close");

		expect(notFound.kind).toBe("not_found");
		expect(notFound.name).toBe("NotFoundError");
		expect(notFound.path).toBe("in.csv");
		expect(format.kind).toBe("format");
		expect(format.detail).toBe("bad quote");
		expect(validation.kind).toBe("validation");
		expect(validation.field).toBe("close");
		expect(validation).toBeInstanceOf(Error);
	});

	it("recognises job errors only", () => {
		expect(isJobError(new ValidationError("x"))).toBe(true);
		expect(isJobError(new Error("x"))).toBe(false);
		expect(isJobError("x")).toBe(false);
	});

	it("extracts messages from anything thrown", () => {
		expect(getErrorMessage(new FormatError("boom"))).toBe("boom");
		expect(getErrorMessage("plain")).toBe("plain");
		expect(getErrorMessage(42)).toBe("An unknown error occurred");
	});
});
