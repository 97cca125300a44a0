import { describe, expect, it } from "vitest";
import { SchemaError } from "@core/errors";
import { parseManifest } from "@core/extensions/manifest-schema";
import { manifestFor } from "@tests/helpers/extension-builders";

function failure(raw: unknown, expectedName?: string): unknown {
	try {
		parseManifest(raw, "manifest.json", expectedName);
	} catch (err: unknown) {
		return err;
	}
	throw new Error("expected the manifest to be rejected");
}

describe("parseManifest", () => {
	it("accepts a well-formed manifest", () => {
		const manifest = manifestFor("hooks", "1.4.2");

		expect(parseManifest(manifest, "manifest.json", "hooks")).toEqual(manifest);
	});

	it("rejects a manifest named differently from its directory", () => {
		expect(failure(manifestFor("hooks"), "deploy")).toMatchObject({
			code: "MANIFEST_INVALID",
			message: "Manifest manifest.json declares 'hooks' but is installed as 'deploy'",
		});
	});

	it("wraps field issues in MANIFEST_INVALID with the schema error as cause", () => {
		const error = failure({ ...manifestFor("hooks"), version: "1.0" });

		expect(error).toMatchObject({ code: "MANIFEST_INVALID" });
		const cause = error instanceof Error ? error.cause : undefined;
		expect(cause).toBeInstanceOf(SchemaError);
		expect(cause).toMatchObject({
			issues: [{ fieldPath: "version", rule: "pattern", value: "1.0" }],
		});
	});

	it.each([
		["an unknown field", { ...manifestFor("hooks"), homepage: "https://example.test" }, "homepage", "additional_property"],
		["a bad command name", manifestFor("hooks", "1.0.0", [{ name: "run now", help: "" }]), "commands.0.name", "pattern"],
		[
			"duplicate commands",
			manifestFor("hooks", "1.0.0", [
				{ name: "run", help: "a" },
				{ name: "run", help: "b" },
			]),
			"commands.1.name",
			"unique",
		],
		["no commands", manifestFor("hooks", "1.0.0", []), "commands", "range"],
		["a missing author", { name: "hooks", version: "1.0.0", description: "x", commands: [{ name: "run", help: "" }] }, "author", "required"],
	])("rejects %s", (_label, raw, fieldPath, rule) => {
		const error = failure(raw);
		const cause = error instanceof Error ? error.cause : undefined;

		expect(cause).toMatchObject({ issues: [{ fieldPath, rule }] });
	});
});
