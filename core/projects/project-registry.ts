import { randomUUID } from "node:crypto";
import { realpath, stat } from "node:fs/promises";
import { basename, resolve, sep } from "node:path";
import type { Config } from "../config/config-schema";
import { tagSchema } from "../config/config-schema";
import type { ConfigStore } from "../config/config-store";
import { AppError, errnoCode, errorMessage } from "../errors";
import { resolveMachineId } from "../runtime-config";
import { hasEntry, ownEntry, setEntry } from "../store/own-record";
import type {
	AccessInfo,
	AddProjectOptions,
	MachineStats,
	ProjectEntry,
	ProjectFilter,
	ProjectMetadataPatch,
	TagCount,
} from "./project-types";

export interface ProjectRegistryDeps {
	now: () => Date;
	generateId: () => string;
	machineId: string;
	cwd: () => string;
}

function requireProject(config: Config, id: string): ProjectEntry {
	const entry = ownEntry(config.projects, id);
	if (!entry) {
		throw new AppError("NOT_FOUND", `Project not found: ${id}`, {
			context: { projectId: id },
		});
	}
	return entry;
}

/** Validate and de-duplicate tags, keeping first occurrence order. */
export function normalizeTags(tags: readonly string[]): string[] {
	const result: string[] = [];
	for (const raw of tags) {
		const tag = raw.trim();
		const parsed = tagSchema.safeParse(tag);
		if (!parsed.success) {
			throw new AppError(
				"INVALID_TAG",
				`Invalid tag '${raw}': ${parsed.error.issues[0]?.message ?? "rejected"}`,
				{ context: { tag: raw } },
			);
		}
		if (!result.includes(tag)) {
			result.push(tag);
		}
	}
	return result;
}

function byName(a: ProjectEntry, b: ProjectEntry): number {
	return a.name.localeCompare(b.name);
}

function byUpdatedDesc(a: ProjectEntry, b: ProjectEntry): number {
	return Date.parse(b.updated_at) - Date.parse(a.updated_at) || byName(a, b);
}

function byCreatedDesc(a: ProjectEntry, b: ProjectEntry): number {
	return Date.parse(b.created_at) - Date.parse(a.created_at) || byName(a, b);
}

function accessedAt(stats: MachineStats | undefined, id: string): number {
	const value = stats ? ownEntry(stats.last_accessed, id) : undefined;
	return value ? Date.parse(value) : Number.NEGATIVE_INFINITY;
}

/**
 * CRUD and queries over the `projects` map plus per-machine access stats.
 * Every mutation is a fresh load-modify-validate-save through the ConfigStore.
 *
 * Stats referencing removed projects are left in place and ignored on read.
 */
export class ProjectRegistry {
	private readonly deps: ProjectRegistryDeps;

	constructor(
		private readonly configStore: ConfigStore,
		deps?: Partial<ProjectRegistryDeps>,
	) {
		this.deps = {
			now: () => new Date(),
			generateId: () => randomUUID(),
			machineId: resolveMachineId(),
			cwd: () => process.cwd(),
			...deps,
		};
	}

	get machineId(): string {
		return this.deps.machineId;
	}

	/** Register a directory. Fails INVALID_PATH, INVALID_TAG or ALREADY_EXISTS. */
	async add(
		path: string,
		tags: readonly string[] = [],
		options: AddProjectOptions = {},
	): Promise<ProjectEntry> {
		const projectPath = await this.resolveDirectory(path);
		const normalizedTags = normalizeTags(tags);

		return this.configStore.update((config) => {
			const existing = Object.values(config.projects).find(
				(project) => project.path === projectPath,
			);
			if (existing) {
				throw new AppError(
					"ALREADY_EXISTS",
					`Project already added: ${projectPath} (${existing.name})`,
					{ context: { path: projectPath, projectId: existing.id } },
				);
			}

			const timestamp = this.deps.now().toISOString();
			const entry: ProjectEntry = {
				id: this.uniqueId(config),
				name: options.name ?? basename(projectPath),
				path: projectPath,
				tags: normalizedTags,
				description: options.description ?? null,
				language: options.language ?? null,
				created_at: timestamp,
				updated_at: timestamp,
			};
			setEntry(config.projects, entry.id, entry);
			return entry;
		});
	}

	/** Delete the entry only; machine stats that reference it are kept. */
	async remove(id: string): Promise<void> {
		await this.configStore.update((config) => {
			requireProject(config, id);
			delete config.projects[id];
		});
	}

	/** Replace the tag set. */
	async updateTags(id: string, tags: readonly string[]): Promise<ProjectEntry> {
		const normalizedTags = normalizeTags(tags);
		return this.configStore.update((config) => {
			const entry = requireProject(config, id);
			entry.tags = normalizedTags;
			this.bump(entry);
			return entry;
		});
	}

	async updateMetadata(id: string, patch: ProjectMetadataPatch): Promise<ProjectEntry> {
		return this.configStore.update((config) => {
			const entry = requireProject(config, id);
			if (patch.name !== undefined) entry.name = patch.name;
			if (patch.description !== undefined) entry.description = patch.description;
			if (patch.language !== undefined) entry.language = patch.language;
			if (patch.git_remote_url !== undefined) entry.git_remote_url = patch.git_remote_url;
			if (patch.git_current_branch !== undefined) {
				entry.git_current_branch = patch.git_current_branch;
			}
			if (patch.git_status !== undefined) entry.git_status = patch.git_status;
			if (patch.last_git_commit_time !== undefined) {
				entry.last_git_commit_time = patch.last_git_commit_time;
			}
			this.bump(entry);
			return entry;
		});
	}

	/** Record one switch to the project from `machineId`. */
	async touch(id: string, machineId: string = this.deps.machineId): Promise<void> {
		await this.configStore.update((config) => {
			requireProject(config, id);
			const stats = ownEntry(config.machine_metadata, machineId) ?? {
				last_accessed: {},
				access_counts: {},
			};
			setEntry(stats.last_accessed, id, this.deps.now().toISOString());
			setEntry(stats.access_counts, id, (ownEntry(stats.access_counts, id) ?? 0) + 1);
			setEntry(config.machine_metadata, machineId, stats);
		});
	}

	async get(id: string): Promise<ProjectEntry> {
		const config = await this.configStore.load();
		return requireProject(config, id);
	}

	async findByName(name: string): Promise<ProjectEntry | undefined> {
		const config = await this.configStore.load();
		return Object.values(config.projects).find((project) => project.name === name);
	}

	async list(filter: ProjectFilter = {}): Promise<ProjectEntry[]> {
		const config = await this.configStore.load();
		const language = filter.language?.toLowerCase();
		const since = filter.updatedSince?.getTime();

		const matches = Object.values(config.projects).filter((project) => {
			if (filter.tag && !project.tags.includes(filter.tag)) return false;
			if (filter.tags && !filter.tags.every((tag) => project.tags.includes(tag))) {
				return false;
			}
			if (
				filter.anyTags &&
				filter.anyTags.length > 0 &&
				!filter.anyTags.some((tag) => project.tags.includes(tag))
			) {
				return false;
			}
			if (language !== undefined && project.language?.toLowerCase() !== language) {
				return false;
			}
			if (since !== undefined && Date.parse(project.updated_at) < since) return false;
			return true;
		});

		const stats = ownEntry(config.machine_metadata, this.deps.machineId);
		switch (filter.sort ?? "updated") {
			case "name":
				matches.sort(byName);
				break;
			case "created":
				matches.sort(byCreatedDesc);
				break;
			case "accessed":
				matches.sort(
					(a, b) =>
						accessedAt(stats, b.id) - accessedAt(stats, a.id) || byUpdatedDesc(a, b),
				);
				break;
			case "updated":
				matches.sort(byUpdatedDesc);
				break;
		}

		return filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
	}

	/**
	 * Candidates for switching: path starts with `query`, or name starts with it
	 * ignoring case. Most used on this machine first, then most recently used.
	 */
	async findByPathPrefix(
		query: string,
		machineId: string = this.deps.machineId,
	): Promise<ProjectEntry[]> {
		const config = await this.configStore.load();
		const lowered = query.toLowerCase();
		const stats = ownEntry(config.machine_metadata, machineId);
		const countOf = (id: string) => (stats ? ownEntry(stats.access_counts, id) : undefined) ?? 0;

		return Object.values(config.projects)
			.filter(
				(project) =>
					project.path.startsWith(query) ||
					project.name.toLowerCase().startsWith(lowered),
			)
			.sort(
				(a, b) =>
					countOf(b.id) - countOf(a.id) ||
					accessedAt(stats, b.id) - accessedAt(stats, a.id) ||
					byName(a, b),
			);
	}

	/** The innermost registered project containing `cwd`, if any. */
	async current(cwd: string = this.deps.cwd()): Promise<ProjectEntry | undefined> {
		const config = await this.configStore.load();
		const target = resolve(cwd);
		let best: ProjectEntry | undefined;
		for (const project of Object.values(config.projects)) {
			const root = project.path.endsWith(sep) ? project.path : `${project.path}${sep}`;
			const contains = target === project.path || target.startsWith(root);
			if (contains && (!best || project.path.length > best.path.length)) {
				best = project;
			}
		}
		return best;
	}

	async listTags(): Promise<TagCount[]> {
		const config = await this.configStore.load();
		const counts = new Map<string, number>();
		for (const project of Object.values(config.projects)) {
			for (const tag of project.tags) {
				counts.set(tag, (counts.get(tag) ?? 0) + 1);
			}
		}
		return [...counts.entries()]
			.map(([tag, count]) => ({ tag, count }))
			.sort((a, b) => b.count - a.count || a.tag.localeCompare(b.tag));
	}

	async accessInfo(id: string, machineId: string = this.deps.machineId): Promise<AccessInfo> {
		const config = await this.configStore.load();
		requireProject(config, id);
		const stats = ownEntry(config.machine_metadata, machineId);
		return {
			lastAccessed: (stats && ownEntry(stats.last_accessed, id)) ?? null,
			accessCount: (stats && ownEntry(stats.access_counts, id)) ?? 0,
		};
	}

	async totalAccessCount(id: string): Promise<number> {
		const config = await this.configStore.load();
		requireProject(config, id);
		return Object.values(config.machine_metadata).reduce(
			(sum, stats) => sum + (ownEntry(stats.access_counts, id) ?? 0),
			0,
		);
	}

	/** Drop stats for projects that no longer exist. Returns the (machine, project) pairs removed. */
	async pruneOrphanedStats(): Promise<number> {
		return this.configStore.update((config) => {
			let removed = 0;
			for (const stats of Object.values(config.machine_metadata)) {
				const orphans = new Set(
					[...Object.keys(stats.last_accessed), ...Object.keys(stats.access_counts)].filter(
						(id) => !hasEntry(config.projects, id),
					),
				);
				for (const id of orphans) {
					delete stats.last_accessed[id];
					delete stats.access_counts[id];
				}
				removed += orphans.size;
			}
			return removed;
		});
	}

	private uniqueId(config: Config): string {
		let id = this.deps.generateId();
		while (hasEntry(config.projects, id)) {
			id = this.deps.generateId();
		}
		return id;
	}

	/** Keep `updated_at >= created_at` even if the clock stepped backwards. */
	private bump(entry: ProjectEntry): void {
		const now = this.deps.now();
		const created = Date.parse(entry.created_at);
		entry.updated_at = (now.getTime() < created ? new Date(created) : now).toISOString();
	}

	private async resolveDirectory(path: string): Promise<string> {
		const absolute = resolve(this.deps.cwd(), path);
		try {
			const info = await stat(absolute);
			if (!info.isDirectory()) {
				throw new AppError("INVALID_PATH", `Not a directory: ${absolute}`, {
					context: { path: absolute },
				});
			}
			return await realpath(absolute);
		} catch (err: unknown) {
			if (err instanceof AppError) {
				throw err;
			}
			const reason = errnoCode(err) === "ENOENT" ? "Directory does not exist" : errorMessage(err);
			throw new AppError("INVALID_PATH", `${reason}: ${absolute}`, {
				cause: err,
				context: { path: absolute },
			});
		}
	}
}
