import { isAbsolute } from "node:path";
import { z } from "zod";

export const CURRENT_CONFIG_VERSION = "1.2";
export const DEFAULT_EDITOR = "hx";
export const DEFAULT_RECENT_PROJECTS_LIMIT = 10;

const UUID_V4_PATTERN =
	/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

// GitHub: alphanumerics and single inner hyphens, at most 39 characters.
const GITHUB_USERNAME_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9]|-(?=[A-Za-z0-9])){0,38}$/;

export function isProjectId(value: string): boolean {
	return UUID_V4_PATTERN.test(value);
}

// -- Scalars --
export const configVersionSchema = z
	.string()
	.regex(/^\d+\.\d+$/, "must look like MAJOR.MINOR");

export const githubUsernameSchema = z
	.string()
	.regex(GITHUB_USERNAME_PATTERN, "must be a valid GitHub username");

export const timestampSchema = z.string().datetime({ offset: true });

export const projectIdSchema = z
	.string()
	.regex(UUID_V4_PATTERN, "must be a UUID v4");

export const tagSchema = z
	.string()
	.min(1)
	.max(50)
	.regex(/^[^\s,]+$/, "must not contain commas or whitespace");

export const gitStatusSchema = z.enum(["clean", "dirty", "unknown"]);

export type GitStatus = z.infer<typeof gitStatusSchema>;

/** Record keyed by project UUID; keys that are not UUIDs are rejected. */
function uuidKeyed<T extends z.ZodTypeAny>(valueSchema: T) {
	return z.record(z.string(), valueSchema).superRefine((record, ctx) => {
		for (const key of Object.keys(record)) {
			if (!isProjectId(key)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: [key],
					message: `key '${key}' is not a UUID v4`,
					params: { rule: "uuid_key" },
				});
			}
		}
	});
}

// -- Project entry --
export const projectEntrySchema = z
	.object({
		id: projectIdSchema,
		name: z.string().min(1),
		path: z.string().refine((value) => isAbsolute(value), {
			message: "must be an absolute path",
			params: { rule: "absolute_path" },
		}),
		tags: z.array(tagSchema).superRefine((tags, ctx) => {
			const seen = new Set<string>();
			tags.forEach((tag, index) => {
				if (seen.has(tag)) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						path: [index],
						message: `duplicate tag '${tag}'`,
						params: { rule: "unique" },
					});
				}
				seen.add(tag);
			});
		}),
		description: z.string().nullable().optional(),
		language: z.string().nullable().optional(),
		git_remote_url: z.string().nullable().optional(),
		git_current_branch: z.string().nullable().optional(),
		git_status: gitStatusSchema.nullable().optional(),
		last_git_commit_time: timestampSchema.nullable().optional(),
		created_at: timestampSchema,
		updated_at: timestampSchema,
	})
	.strict()
	.superRefine((entry, ctx) => {
		if (Date.parse(entry.updated_at) < Date.parse(entry.created_at)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["updated_at"],
				message: "updated_at precedes created_at",
				params: { rule: "timestamp_order" },
			});
		}
	});

export type ProjectEntry = z.infer<typeof projectEntrySchema>;

// -- Machine metadata --
export const machineStatsSchema = z
	.object({
		last_accessed: uuidKeyed(timestampSchema),
		access_counts: uuidKeyed(z.number().int().nonnegative()),
	})
	.strict();

export type MachineStats = z.infer<typeof machineStatsSchema>;

// -- Settings --
export const settingsSchema = z
	.object({
		auto_open_editor: z.boolean().default(false),
		show_git_status: z.boolean().default(true),
		recent_projects_limit: z
			.number()
			.int()
			.min(1)
			.max(100)
			.default(DEFAULT_RECENT_PROJECTS_LIMIT),
	})
	.strict();

export type Settings = z.infer<typeof settingsSchema>;

// -- Document --
export const configSchema = z
	.object({
		version: configVersionSchema,
		github_username: githubUsernameSchema,
		projects_root_dir: z.string().min(1),
		editor: z.string().min(1).default(DEFAULT_EDITOR),
		settings: settingsSchema.default({}),
		projects: uuidKeyed(projectEntrySchema).superRefine((projects, ctx) => {
			for (const [key, entry] of Object.entries(projects)) {
				if (isProjectId(key) && entry.id !== key) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						path: [key, "id"],
						message: `id '${entry.id}' does not match its key`,
						params: { rule: "id_matches_key" },
					});
				}
			}
		}),
		machine_metadata: z.record(z.string().min(1), machineStatsSchema),
	})
	.strict();

export type Config = z.infer<typeof configSchema>;
