import { AppError } from "../errors";
import { CURRENT_CONFIG_VERSION, DEFAULT_RECENT_PROJECTS_LIMIT } from "./config-schema";

type RawDocument = Record<string, unknown>;

export interface MigrationStep {
	from: string;
	to: string;
	/** Additive only: fills in defaults, never removes or rewrites user data. */
	apply: (document: RawDocument) => void;
}

function isRecord(value: unknown): value is RawDocument {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export const MIGRATIONS: readonly MigrationStep[] = [
	{
		from: "1.0",
		to: "1.1",
		apply: (document) => {
			if (document.settings === undefined) {
				document.settings = {
					show_git_status: true,
					recent_projects_limit: DEFAULT_RECENT_PROJECTS_LIMIT,
				};
			}
		},
	},
	{
		from: "1.1",
		to: "1.2",
		apply: (document) => {
			const settings = document.settings;
			if (isRecord(settings) && settings.auto_open_editor === undefined) {
				settings.auto_open_editor = false;
			}
			if (document.machine_metadata === undefined) {
				document.machine_metadata = {};
			}
		},
	},
];

const VERSION_PATTERN = /^(\d+)\.(\d+)$/;

/** Numeric comparison of MAJOR.MINOR strings; "1.10" is newer than "1.9". */
export function compareVersions(a: string, b: string): number {
	const left = VERSION_PATTERN.exec(a);
	const right = VERSION_PATTERN.exec(b);
	if (!left || !right) {
		throw new Error(`Not a MAJOR.MINOR version: ${left ? b : a}`);
	}
	const major = Number(left[1]) - Number(right[1]);
	return major !== 0 ? major : Number(left[2]) - Number(right[2]);
}

export interface MigrationOutcome {
	document: unknown;
	/** Versions stepped through, e.g. ["1.1", "1.2"] */
	applied: string[];
}

/**
 * Bring an older document up to the current version. Documents without a
 * well-formed version are returned untouched for the schema to reject.
 * Fails closed on versions newer than this build understands.
 */
export function migrateDocument(raw: unknown): MigrationOutcome {
	if (!isRecord(raw)) {
		return { document: raw, applied: [] };
	}
	const declared = raw.version;
	if (typeof declared !== "string" || !VERSION_PATTERN.test(declared)) {
		return { document: raw, applied: [] };
	}

	if (compareVersions(declared, CURRENT_CONFIG_VERSION) > 0) {
		throw new AppError(
			"UNSUPPORTED_CONFIG_VERSION",
			`Configuration version ${declared} is newer than supported ${CURRENT_CONFIG_VERSION}`,
			{ context: { version: declared } },
		);
	}

	const document = structuredClone(raw);
	const applied: string[] = [];
	let version = declared;
	while (compareVersions(version, CURRENT_CONFIG_VERSION) < 0) {
		const step = MIGRATIONS.find((candidate) => candidate.from === version);
		if (!step) {
			throw new AppError(
				"UNSUPPORTED_CONFIG_VERSION",
				`No migration path from configuration version ${version}`,
				{ context: { version } },
			);
		}
		step.apply(document);
		version = step.to;
		document.version = version;
		applied.push(version);
	}
	return { document, applied };
}
