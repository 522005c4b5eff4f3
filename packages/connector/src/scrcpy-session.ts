import { spawn } from "node:child_process";
import { constants } from "node:os";
import { createExecFileRunner } from "@tetherless/bridge-android";
import type { CommandRunner } from "@tetherless/bridge-core";
import { BENIGN_MIRROR_EXIT_CODES, type Logger, TetherlessError, silentLogger } from "@tetherless/core";

/** Runs the mirroring tool in the foreground and resolves with its exit code. */
export type MirrorLauncher = (file: string, args: readonly string[]) => Promise<number>;

export interface MirrorOutcome {
	exitCode: number;
	/** True for any exit code other than normal exit, no device or SIGINT. */
	abnormal: boolean;
}

export interface ScrcpySessionOptions {
	/** Path of the scrcpy executable (default: `scrcpy` from PATH). */
	scrcpyPath?: string;
	launcher?: MirrorLauncher;
	/** Runner for the `--version` probe. */
	runner?: CommandRunner;
	logger?: Logger;
}

/** Options every session is started with. */
export const SESSION_FLAGS = ["--turn-screen-off", "--stay-awake"] as const;

export function isBenignMirrorExit(exitCode: number): boolean {
	return BENIGN_MIRROR_EXIT_CODES.includes(exitCode);
}

/**
 * Exit code as a shell reports it: a child killed by a signal maps to
 * 128 + the signal number.
 */
export function toExitCode(code: number | null, signal: NodeJS.Signals | null): number {
	if (code !== null) return code;
	const signalNumber = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
	return signalNumber === undefined ? 1 : 128 + signalNumber;
}

/** Launch with the terminal attached so scrcpy can read keyboard shortcuts and Ctrl+C. */
export const spawnInherited: MirrorLauncher = (file, args) =>
	new Promise<number>((resolve, reject) => {
		const child = spawn(file, [...args], { stdio: "inherit" });
		child.on("error", (err) => {
			if ("code" in err && err.code === "ENOENT") {
				reject(new TetherlessError("missing-prerequisite", `Cannot run ${file}: ${err.message}`, { file }));
				return;
			}
			reject(err);
		});
		child.on("exit", (code, signal) => resolve(toExitCode(code, signal)));
	});

export class ScrcpySession {
	readonly scrcpyPath: string;
	private readonly launcher: MirrorLauncher;
	private readonly runner: CommandRunner;
	private readonly logger: Logger;

	constructor(options: ScrcpySessionOptions = {}) {
		this.scrcpyPath = options.scrcpyPath ?? "scrcpy";
		this.launcher = options.launcher ?? spawnInherited;
		this.runner = options.runner ?? createExecFileRunner();
		this.logger = options.logger ?? silentLogger;
	}

	/** Check whether the `scrcpy` binary answers `--version`. */
	async isAvailable(): Promise<boolean> {
		try {
			const { exitCode } = await this.runner(this.scrcpyPath, ["--version"]);
			return exitCode === 0;
		} catch {
			return false;
		}
	}

	/**
	 * Mirror `target` until scrcpy exits. An abnormal exit is reported but
	 * not raised.
	 */
	async run(target: string): Promise<MirrorOutcome> {
		const args = ["-s", target, ...SESSION_FLAGS];
		this.logger.step("Starting scrcpy...");
		this.logger.command(this.scrcpyPath, args);

		const exitCode = await this.launcher(this.scrcpyPath, args);
		const abnormal = !isBenignMirrorExit(exitCode);
		if (abnormal) {
			this.logger.error(`scrcpy exited abnormally (exit code ${exitCode})`);
		} else {
			this.logger.step("Mirroring ended");
		}
		return { exitCode, abnormal };
	}
}
