export {
	parseDevicesOutput,
	parseNetworkSerial,
	isNetworkSerial,
	parseInetAddress,
	isTcpipSwitchAccepted,
	parseSettingValue,
	quoteShellArg,
} from "./android-utils";
export type { DeviceEntry, NetworkAddress } from "./android-utils";
import type { DeviceEntry } from "./android-utils";

export interface CommandResult {
	stdout: string;
	stderr: string;
	exitCode: number;
}

/**
 * Runs an executable to completion. Resolves for any exit code; rejects only
 * when the process cannot be started.
 */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<CommandResult>;

export type SettingsNamespace = "global" | "secure" | "system";

export interface IDeviceBridge {
	/** Check whether the bridge executable answers `version`. */
	isAvailable(): Promise<boolean>;

	/** Entries of `adb devices`, header skipped. */
	listDevices(): Promise<DeviceEntry[]>;

	/** Run a shell command on the device and return its stdout. Throws on a non-zero exit. */
	shell(serial: string, command: string): Promise<string>;

	/** `adb connect host:port`; the raw result, whatever the exit code. */
	connect(host: string, port: number): Promise<CommandResult>;

	/** `adb -s serial tcpip port`; the raw result, whatever the exit code. */
	tcpip(serial: string, port: number): Promise<CommandResult>;

	killServer(): Promise<void>;
	startServer(): Promise<void>;

	getSetting(serial: string, namespace: SettingsNamespace, key: string): Promise<string | undefined>;
	putSetting(serial: string, namespace: SettingsNamespace, key: string, value: string): Promise<void>;

	sendKeyEvent(serial: string, keyCode: string): Promise<void>;

	/** `am broadcast -a action --es key value ...`; returns the broadcast output. */
	broadcast(serial: string, action: string, extras: Record<string, string>): Promise<string>;
}
