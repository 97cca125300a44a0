import type { GitStatus, MachineStats, ProjectEntry } from "../config/config-schema";

export type { GitStatus, MachineStats, ProjectEntry };

export type ProjectSort = "updated" | "created" | "name" | "accessed";

/**
 * Query for ProjectRegistry.list. All given conditions must hold.
 * Results are ordered by `updated_at` descending unless `sort` says otherwise.
 */
export interface ProjectFilter {
	/** Project carries this tag */
	tag?: string;
	/** Project carries every one of these tags */
	tags?: string[];
	/** Project carries at least one of these tags */
	anyTags?: string[];
	/** Case-insensitive match on `language` */
	language?: string;
	/** Only projects updated at or after this instant */
	updatedSince?: Date;
	sort?: ProjectSort;
	limit?: number;
}

export interface AddProjectOptions {
	/** Display name, defaults to the directory basename */
	name?: string;
	description?: string;
	language?: string;
}

export interface ProjectMetadataPatch {
	name?: string;
	description?: string | null;
	language?: string | null;
	git_remote_url?: string | null;
	git_current_branch?: string | null;
	git_status?: GitStatus | null;
	last_git_commit_time?: string | null;
}

export interface AccessInfo {
	/** ISO 8601, null when never accessed from the machine */
	lastAccessed: string | null;
	accessCount: number;
}

export interface TagCount {
	tag: string;
	count: number;
}
