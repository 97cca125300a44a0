import { readFile } from "node:fs/promises";
import { z } from "zod";
import { validateWith } from "../config/schema-validator";
import { AppError, errnoCode, errorMessage } from "../errors";

export const MANIFEST_FILENAME = "manifest.json";

const IDENTIFIER_PATTERN = /^[A-Za-z0-9_-]+$/;
const SEMVER_PATTERN = /^\d+\.\d+\.\d+$/;

export const extensionNameSchema = z
	.string()
	.regex(IDENTIFIER_PATTERN, "must contain only letters, digits, '-' and '_'");

export const extensionCommandSchema = z
	.object({
		name: extensionNameSchema,
		help: z.string(),
	})
	.strict();

export const extensionManifestSchema = z
	.object({
		name: extensionNameSchema,
		version: z.string().regex(SEMVER_PATTERN, "must be MAJOR.MINOR.PATCH"),
		description: z.string().min(1),
		author: z.string(),
		commands: z
			.array(extensionCommandSchema)
			.min(1)
			.superRefine((commands, ctx) => {
				const seen = new Set<string>();
				commands.forEach((command, index) => {
					if (seen.has(command.name)) {
						ctx.addIssue({
							code: z.ZodIssueCode.custom,
							path: [index, "name"],
							message: `duplicate command '${command.name}'`,
							params: { rule: "unique" },
						});
					}
					seen.add(command.name);
				});
			}),
	})
	.strict();

export type ExtensionCommand = z.infer<typeof extensionCommandSchema>;
export type ExtensionManifest = z.infer<typeof extensionManifestSchema>;

/**
 * Validate a decoded manifest. When `expectedName` is given the manifest
 * must carry that name (the directory an extension is installed under).
 */
export function parseManifest(
	raw: unknown,
	source: string,
	expectedName?: string,
): ExtensionManifest {
	const result = validateWith(extensionManifestSchema, raw);
	if (!result.ok) {
		throw new AppError("MANIFEST_INVALID", `Invalid manifest ${source}: ${result.error.message}`, {
			cause: result.error,
			context: { path: source },
		});
	}
	if (expectedName !== undefined && result.value.name !== expectedName) {
		throw new AppError(
			"MANIFEST_INVALID",
			`Manifest ${source} declares '${result.value.name}' but is installed as '${expectedName}'`,
			{ context: { path: source, extension: expectedName } },
		);
	}
	return result.value;
}

export async function loadManifest(
	manifestPath: string,
	expectedName?: string,
): Promise<ExtensionManifest> {
	let raw: string;
	try {
		raw = await readFile(manifestPath, "utf-8");
	} catch (err: unknown) {
		const reason = errnoCode(err) === "ENOENT" ? "missing" : errorMessage(err);
		throw new AppError("MANIFEST_INVALID", `Cannot read manifest ${manifestPath}: ${reason}`, {
			cause: err,
			context: { path: manifestPath },
		});
	}

	let decoded: unknown;
	try {
		decoded = JSON.parse(raw);
	} catch (err: unknown) {
		throw new AppError(
			"MANIFEST_INVALID",
			`Malformed manifest ${manifestPath}: ${errorMessage(err)}`,
			{ cause: err, context: { path: manifestPath } },
		);
	}
	return parseManifest(decoded, manifestPath, expectedName);
}
