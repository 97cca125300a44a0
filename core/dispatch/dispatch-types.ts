import type { ProjectEntry } from "../projects/project-types";

/**
 * Exit status reported for a child ended by a signal. An extension that
 * itself exits 255 maps to the same number; use `ExitStatus.kind` to tell
 * the two apart.
 */
export const SIGNAL_EXIT_CODE = 255;

export type ExitStatus =
	| { kind: "exited"; code: number }
	| { kind: "signaled"; signal: NodeJS.Signals; code: typeof SIGNAL_EXIT_CODE };

/** The slice of a child process the dispatcher relies on. */
export interface ExtensionProcess {
	once(
		event: "exit",
		listener: (code: number | null, signal: NodeJS.Signals | null) => void,
	): unknown;
	once(event: "error", listener: (err: Error) => void): unknown;
	kill(signal?: NodeJS.Signals): boolean;
}

export interface SpawnOptions {
	cwd: string;
	env: NodeJS.ProcessEnv;
	stdio: "inherit";
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ExtensionProcess;

export interface SignalSource {
	on(signal: NodeJS.Signals, listener: () => void): void;
	off(signal: NodeJS.Signals, listener: () => void): void;
}

export interface DispatchContext {
	/** Working directory for the child and for project detection */
	cwd?: string;
	/** Active project; when omitted it is detected from `cwd`, `null` means none */
	project?: ProjectEntry | null;
	/** Base environment, defaults to the parent's */
	env?: NodeJS.ProcessEnv;
}
