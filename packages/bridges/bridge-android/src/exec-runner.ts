import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";
import type { CommandResult, CommandRunner } from "@tetherless/bridge-core";
import { TetherlessError } from "@tetherless/core";

const execFile = promisify(execFileCb);

/** Maximum buffer size (bytes) for captured output, enough for `dumpsys wifi`. */
const MAX_BUFFER = 16 * 1024 * 1024;

interface ExecFailure {
	code?: number | string | null;
	stdout?: string;
	stderr?: string;
}

function isExecFailure(err: unknown): err is Error & ExecFailure {
	return err instanceof Error && "code" in err;
}

/**
 * A CommandRunner on top of `execFile`. Non-zero exits resolve with their
 * code; an executable that cannot be found rejects with a
 * `missing-prerequisite` error.
 */
export function createExecFileRunner(): CommandRunner {
	return async (file, args): Promise<CommandResult> => {
		try {
			const { stdout, stderr } = await execFile(file, [...args], {
				encoding: "utf8",
				maxBuffer: MAX_BUFFER,
			});
			return { stdout, stderr, exitCode: 0 };
		} catch (err) {
			if (!isExecFailure(err)) throw err;
			if (err.code === "ENOENT" || err.code === "EACCES") {
				throw new TetherlessError("missing-prerequisite", `Cannot run ${file}: ${err.message}`, {
					file,
					code: err.code,
				});
			}
			if (typeof err.code !== "number") throw err;
			return { stdout: err.stdout ?? "", stderr: err.stderr ?? "", exitCode: err.code };
		}
	};
}
