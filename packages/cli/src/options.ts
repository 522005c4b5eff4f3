import type { CommandRunner } from "@tetherless/bridge-core";
import { type OutputStream, TetherlessError } from "@tetherless/core";
import type { z } from "zod";

export const VERSION = "0.1.0";

/** What a command reads from the process, replaceable in tests. */
export interface CommandEnvironment {
	env?: NodeJS.ProcessEnv;
	stdout?: OutputStream;
	stderr?: OutputStream;
	/** Runner for every adb and scrcpy probe invocation. */
	runner?: CommandRunner;
}

/**
 * Validate raw commander values against a schema.
 * @throws TetherlessError of kind `invalid-option` naming the first rejected option.
 */
export function parseOptions<Output, Input>(
	schema: z.ZodType<Output, z.ZodTypeDef, Input>,
	raw: unknown,
): Output {
	const parsed = schema.safeParse(raw);
	if (parsed.success) return parsed.data;

	const [issue] = parsed.error.issues;
	const option = issue.path.join(".");
	throw new TetherlessError("invalid-option", `Invalid value for --${option}: ${issue.message}`, {
		issues: parsed.error.issues,
	});
}
