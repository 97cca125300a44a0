import { describe, expect, it } from "vitest";
import {
	AppError,
	CommandNotFoundError,
	errnoCode,
	exitCodeForError,
	SchemaError,
} from "@core/errors";

describe("SchemaError", () => {
	it("summarizes the first issue and counts the rest", () => {
		const error = new SchemaError([
			{ fieldPath: "settings.recent_projects_limit", rule: "range", value: 0 },
			{ fieldPath: "editor", rule: "type", value: 3 },
		]);

		expect(error.code).toBe("SCHEMA_INVALID");
		expect(error.message).toBe(
			"Schema validation failed: settings.recent_projects_limit violates range (+1 more)",
		);
	});

	it("names the root for document-level issues", () => {
		const error = new SchemaError([{ fieldPath: "", rule: "type", value: null }]);

		expect(error.message).toBe("Schema validation failed: <root> violates type");
	});
});

describe("exitCodeForError", () => {
	it("separates start failures from other errors", () => {
		expect(exitCodeForError(new AppError("SPAWN_FAILED", "cannot start"))).toBe(126);
		expect(exitCodeForError(new AppError("EXTENSION_NOT_FOUND", "missing"))).toBe(127);
		expect(exitCodeForError(new CommandNotFoundError("hooks", "status", "/ext/hooks/bin/hooks"))).toBe(1);
		expect(exitCodeForError(new Error("boom"))).toBe(1);
		expect(exitCodeForError("boom")).toBe(1);
	});
});

describe("errnoCode", () => {
	it("reads string codes from system errors only", () => {
		expect(errnoCode(Object.assign(new Error("gone"), { code: "ENOENT" }))).toBe("ENOENT");
		expect(errnoCode({ code: 2 })).toBeUndefined();
		expect(errnoCode(null)).toBeUndefined();
	});
});
