export type AppErrorCode =
	| "NOT_FOUND"
	| "CONFIG_NOT_FOUND"
	| "PARSE_ERROR"
	| "SCHEMA_INVALID"
	| "IO_ERROR"
	| "UNSUPPORTED_CONFIG_VERSION"
	| "ALREADY_EXISTS"
	| "INVALID_PATH"
	| "INVALID_TAG"
	| "UNSUPPORTED_PLATFORM"
	| "DOWNLOAD_FAILED"
	| "EXTRACT_FAILED"
	| "CHECKSUM_MISMATCH"
	| "PERMISSION_DENIED"
	| "MANIFEST_INVALID"
	| "EXTENSION_NOT_FOUND"
	| "COMMAND_NOT_FOUND"
	| "SPAWN_FAILED"
	| "CONFIG_INVALID"
	| "INVALID_CONFIG_KEY"
	| "COMMAND_CONFLICT";

export type ErrorContext = Record<string, string | number | undefined>;

export interface AppErrorOptions {
	cause?: unknown;
	/** Path, URL or extension name a user needs to retry by hand */
	context?: ErrorContext;
}

/**
 * Application-level error with a machine-readable code.
 * Every failure the core reports to its caller is one of these.
 */
export class AppError extends Error {
	public readonly code: AppErrorCode;
	public readonly context: ErrorContext;
	public readonly cause?: unknown;

	constructor(code: AppErrorCode, message: string, options?: AppErrorOptions) {
		super(message);
		this.name = "AppError";
		this.code = code;
		this.context = options?.context ?? {};
		this.cause = options?.cause;
	}
}

/** One field-level violation found while validating a document. */
export interface SchemaIssue {
	/** Dotted path from the document root, e.g. `settings.recent_projects_limit` */
	fieldPath: string;
	rule: string;
	value: unknown;
}

export class SchemaError extends AppError {
	public readonly issues: SchemaIssue[];

	constructor(issues: SchemaIssue[], options?: AppErrorOptions) {
		const first = issues[0];
		const summary = first
			? `${first.fieldPath || "<root>"} violates ${first.rule}`
			: "document is invalid";
		const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : "";
		super("SCHEMA_INVALID", `Schema validation failed: ${summary}${more}`, options);
		this.name = "SchemaError";
		this.issues = issues;
	}
}

/**
 * The extension exists but does not declare the command. Callers fall back
 * to running `entryPoint` with the raw arguments.
 */
export class CommandNotFoundError extends AppError {
	public readonly entryPoint: string;

	constructor(extensionName: string, commandName: string, entryPoint: string) {
		super(
			"COMMAND_NOT_FOUND",
			`Command '${commandName}' is not declared by extension '${extensionName}'`,
			{ context: { extension: extensionName, command: commandName } },
		);
		this.name = "CommandNotFoundError";
		this.entryPoint = entryPoint;
	}
}

export function isAppError(error: unknown): error is AppError {
	return error instanceof AppError;
}

/** Node system errors carry a string `code` such as ENOENT. */
export function errnoCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		return typeof error.code === "string" ? error.code : undefined;
	}
	return undefined;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Process exit status for a failure surfaced at the top of an invocation.
 * Follows the shell: 126 cannot execute, 127 not found. An extension's own
 * exit code is passed through unchanged, so 255 may mean either a signal or
 * a plain `exit 255`; `ExitStatus.kind` distinguishes them.
 */
export function exitCodeForError(error: unknown): number {
	if (!(error instanceof AppError)) {
		return 1;
	}
	switch (error.code) {
		case "SPAWN_FAILED":
			return 126;
		case "EXTENSION_NOT_FOUND":
			return 127;
		default:
			return 1;
	}
}
