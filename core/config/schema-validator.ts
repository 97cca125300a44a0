import type { ZodIssue, ZodTypeAny, z } from "zod";
import { type SchemaIssue, SchemaError } from "../errors";
import { type Config, configSchema } from "./config-schema";

export type ValidationResult<T> =
	| { ok: true; value: T }
	| { ok: false; error: SchemaError };

function ruleFor(issue: ZodIssue): string {
	switch (issue.code) {
		case "invalid_type":
			return issue.received === "undefined" ? "required" : "type";
		case "invalid_string":
			return issue.validation === "datetime" ? "timestamp" : "pattern";
		case "too_small":
			return issue.type === "string" && issue.minimum === 1 ? "non_empty" : "range";
		case "too_big":
			return "range";
		case "invalid_enum_value":
			return "enum";
		case "unrecognized_keys":
			return "additional_property";
		case "custom": {
			const rule: unknown = issue.params?.rule;
			return typeof rule === "string" ? rule : "custom";
		}
		default:
			return issue.code;
	}
}

function valueAt(document: unknown, path: ReadonlyArray<string | number>): unknown {
	let current = document;
	for (const segment of path) {
		if (typeof current !== "object" || current === null) {
			return undefined;
		}
		current = Reflect.get(current, segment);
	}
	return current;
}

function toSchemaIssues(issues: ZodIssue[], document: unknown): SchemaIssue[] {
	return issues.flatMap((issue) => {
		if (issue.code === "unrecognized_keys") {
			return issue.keys.map((key) => {
				const path = [...issue.path, key];
				return {
					fieldPath: path.join("."),
					rule: "additional_property",
					value: valueAt(document, path),
				};
			});
		}
		return [
			{
				fieldPath: issue.path.join("."),
				rule: ruleFor(issue),
				value: valueAt(document, issue.path),
			},
		];
	});
}

/** Validate any document against a schema, collecting every field-level issue. */
export function validateWith<S extends ZodTypeAny>(
	schema: S,
	document: unknown,
): ValidationResult<z.output<S>> {
	const result = schema.safeParse(document);
	if (result.success) {
		return { ok: true, value: result.data };
	}
	return {
		ok: false,
		error: new SchemaError(toSchemaIssues(result.error.issues, document)),
	};
}

/** Pure check of a configuration document. Defaults are applied to the returned value. */
export function validate(document: unknown): ValidationResult<Config> {
	return validateWith(configSchema, document);
}

export function assertValidConfig(document: unknown): Config {
	const result = validate(document);
	if (!result.ok) {
		throw result.error;
	}
	return result.value;
}
