/**
 * Resolution of the external executables.
 *
 * Precedence:
 * - explicit command-line path
 * - `TETHERLESS_ADB` / `TETHERLESS_SCRCPY` environment variables
 * - the bare name, looked up on PATH
 */

export interface ToolPaths {
	adb: string;
	scrcpy: string;
}

export const ADB_PATH_ENV = "TETHERLESS_ADB";
export const SCRCPY_PATH_ENV = "TETHERLESS_SCRCPY";

function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
	const value = env[name]?.trim();
	return value ? value : undefined;
}

export function resolveToolPaths(
	overrides: Partial<ToolPaths> = {},
	env: NodeJS.ProcessEnv = process.env,
): ToolPaths {
	return {
		adb: overrides.adb ?? fromEnv(env, ADB_PATH_ENV) ?? "adb",
		scrcpy: overrides.scrcpy ?? fromEnv(env, SCRCPY_PATH_ENV) ?? "scrcpy",
	};
}
