import { AdbBridge } from "@tetherless/bridge-android";
import {
	type SendTextOptions,
	SendTextOptionsSchema,
	createLogger,
	describeError,
	resolveToolPaths,
} from "@tetherless/core";
import { Command } from "commander";
import { type CommandEnvironment, VERSION, parseOptions } from "./options";
import { runTextSender } from "./text-sender";

export function createSendTextProgram(action: (raw: Record<string, unknown>) => Promise<void>): Command {
	return new Command()
		.name("send-text")
		.description("Type text on the connected Android device through ADBKeyBoard")
		.version(VERSION)
		.argument("<text>", "Text to type")
		.option("-d, --debug", "Print debug output")
		.option("--adb <path>", "adb executable")
		.action(async (text: string, options: Record<string, unknown>) => {
			await action({ ...options, text });
		});
}

export async function runSendText(raw: unknown, io: CommandEnvironment = {}): Promise<number> {
	let options: SendTextOptions;
	try {
		options = parseOptions(SendTextOptionsSchema, raw);
	} catch (err) {
		createLogger({ stdout: io.stdout, stderr: io.stderr }).error(describeError(err));
		return 1;
	}

	const logger = createLogger({ debug: options.debug, stdout: io.stdout, stderr: io.stderr });
	const { adb } = resolveToolPaths({ adb: options.adb }, io.env);
	const bridge = new AdbBridge({ adbPath: adb, runner: io.runner, logger });
	return runTextSender({ bridge, logger, text: options.text });
}
