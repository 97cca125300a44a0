import { AppError } from "../errors";

export type TargetTriple =
	| "x86_64-unknown-linux-gnu"
	| "x86_64-apple-darwin"
	| "aarch64-apple-darwin"
	| "x86_64-pc-windows-msvc";

export type ArtifactFormat = "tar.gz" | "zip" | "binary";

/** Exhaustive; anything not listed is unsupported rather than guessed. */
const TARGETS: Readonly<Record<string, TargetTriple>> = {
	"linux/x64": "x86_64-unknown-linux-gnu",
	"darwin/x64": "x86_64-apple-darwin",
	"darwin/arm64": "aarch64-apple-darwin",
	"win32/x64": "x86_64-pc-windows-msvc",
};

export const SUPPORTED_TARGETS: readonly TargetTriple[] = Object.values(TARGETS);

/** Map a Node `process.platform` / `process.arch` pair to its target triple. */
export function resolveTarget(os: string, arch: string): TargetTriple {
	const target = TARGETS[`${os}/${arch}`];
	if (!target) {
		throw new AppError("UNSUPPORTED_PLATFORM", `Unsupported platform: ${os}/${arch}`, {
			context: { os, arch },
		});
	}
	return target;
}

export function currentTarget(): TargetTriple {
	return resolveTarget(process.platform, process.arch);
}

export function isWindowsTarget(target: TargetTriple): boolean {
	return target.endsWith("-windows-msvc");
}

export function defaultFormat(target: TargetTriple): ArtifactFormat {
	return isWindowsTarget(target) ? "zip" : "tar.gz";
}

export function executableSuffix(target: TargetTriple): string {
	return isWindowsTarget(target) ? ".exe" : "";
}

/** `<name>-<target>.tar.gz`, `<name>-<target>.zip`, or the bare binary name. */
export function artifactFilename(
	name: string,
	target: TargetTriple,
	format: ArtifactFormat = defaultFormat(target),
): string {
	switch (format) {
		case "tar.gz":
			return `${name}-${target}.tar.gz`;
		case "zip":
			return `${name}-${target}.zip`;
		case "binary":
			return `${name}-${target}${executableSuffix(target)}`;
	}
}

/** Relative path of the entry point inside an install root. */
export function entryPointPath(name: string, target: TargetTriple): string {
	return `bin/${name}${executableSuffix(target)}`;
}
