import {
	type CommandResult,
	type CommandRunner,
	type DeviceEntry,
	type IDeviceBridge,
	type SettingsNamespace,
	parseDevicesOutput,
	parseSettingValue,
	quoteShellArg,
} from "@tetherless/bridge-core";
import { type Logger, silentLogger } from "@tetherless/core";
import { createExecFileRunner } from "./exec-runner";

/**
 * A structured error for an `adb` invocation that exited non-zero.
 */
export class AdbCommandError extends Error {
	readonly args: readonly string[];
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;

	constructor(args: readonly string[], result: CommandResult) {
		const output = (result.stderr || result.stdout).trim();
		super(`adb ${args.join(" ")} failed (exit code ${result.exitCode})${output ? `: ${output}` : ""}`);
		this.name = "AdbCommandError";
		this.args = args;
		this.exitCode = result.exitCode;
		this.stdout = result.stdout;
		this.stderr = result.stderr;
	}
}

export interface AdbBridgeOptions {
	/** Path of the adb executable (default: `adb` from PATH). */
	adbPath?: string;
	runner?: CommandRunner;
	logger?: Logger;
}

export class AdbBridge implements IDeviceBridge {
	readonly adbPath: string;
	private readonly runner: CommandRunner;
	private readonly logger: Logger;

	constructor(options: AdbBridgeOptions = {}) {
		this.adbPath = options.adbPath ?? "adb";
		this.runner = options.runner ?? createExecFileRunner();
		this.logger = options.logger ?? silentLogger;
	}

	/**
	 * Check whether adb is installed and answers `adb version`.
	 */
	async isAvailable(): Promise<boolean> {
		try {
			const { exitCode } = await this.run(["version"]);
			return exitCode === 0;
		} catch {
			return false;
		}
	}

	/** Run adb with the given arguments, whatever the exit code. */
	async run(args: readonly string[]): Promise<CommandResult> {
		this.logger.command(this.adbPath, args);
		return this.runner(this.adbPath, args);
	}

	/** Run adb and return stdout; throws AdbCommandError on a non-zero exit. */
	async exec(args: readonly string[]): Promise<string> {
		const result = await this.run(args);
		if (result.exitCode !== 0) {
			throw new AdbCommandError(args, result);
		}
		return result.stdout;
	}

	async listDevices(): Promise<DeviceEntry[]> {
		return parseDevicesOutput(await this.exec(["devices"]));
	}

	async shell(serial: string, command: string): Promise<string> {
		return this.exec(["-s", serial, "shell", command]);
	}

	async connect(host: string, port: number): Promise<CommandResult> {
		return this.run(["connect", `${host}:${port}`]);
	}

	async tcpip(serial: string, port: number): Promise<CommandResult> {
		return this.run(["-s", serial, "tcpip", String(port)]);
	}

	async killServer(): Promise<void> {
		await this.exec(["kill-server"]);
	}

	async startServer(): Promise<void> {
		await this.exec(["start-server"]);
	}

	async getSetting(
		serial: string,
		namespace: SettingsNamespace,
		key: string,
	): Promise<string | undefined> {
		return parseSettingValue(await this.shell(serial, `settings get ${namespace} ${key}`));
	}

	async putSetting(
		serial: string,
		namespace: SettingsNamespace,
		key: string,
		value: string,
	): Promise<void> {
		await this.shell(serial, `settings put ${namespace} ${key} ${value}`);
	}

	async sendKeyEvent(serial: string, keyCode: string): Promise<void> {
		await this.shell(serial, `input keyevent ${keyCode}`);
	}

	async broadcast(serial: string, action: string, extras: Record<string, string>): Promise<string> {
		const extraArgs = Object.entries(extras).flatMap(([key, value]) => [
			"--es",
			key,
			quoteShellArg(value),
		]);
		return this.exec(["-s", serial, "shell", "am", "broadcast", "-a", action, ...extraArgs]);
	}
}
