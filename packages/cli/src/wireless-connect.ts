import { AdbBridge } from "@tetherless/bridge-android";
import {
	type ConnectorSettings,
	type MirrorLauncher,
	ScrcpySession,
	type ShutdownCoordinator,
	type Sleep,
	WirelessConnector,
} from "@tetherless/connector";
import {
	DEFAULT_PORT,
	type WirelessConnectOptions,
	WirelessConnectOptionsSchema,
	createLogger,
	createSessionDeviceState,
	describeError,
	resolveToolPaths,
} from "@tetherless/core";
import { Command } from "commander";
import { type CommandEnvironment, VERSION, parseOptions } from "./options";

export function createWirelessConnectProgram(action: (raw: Record<string, unknown>) => Promise<void>): Command {
	return new Command()
		.name("wireless-connect")
		.description("Mirror an Android device over WiFi with scrcpy, restoring its settings afterwards")
		.version(VERSION)
		.option("-i, --ip <address>", "IPv4 address of the device (detected when omitted)")
		.option("-p, --port <port>", "TCP/IP port", String(DEFAULT_PORT))
		.option("-r, --rotation <rotation>", "Screen rotation: 0 portrait, 1 landscape right, 3 landscape left")
		.option("-u, --usb", "Mirror over USB only")
		.option("-d, --debug", "Print debug output")
		.option("--adb <path>", "adb executable")
		.option("--scrcpy <path>", "scrcpy executable")
		.action(async (options: Record<string, unknown>) => {
			await action(options);
		});
}

export interface WirelessConnectEnvironment extends CommandEnvironment {
	launcher?: MirrorLauncher;
	shutdown?: ShutdownCoordinator;
	settings?: Partial<ConnectorSettings>;
	sleep?: Sleep;
}

export async function runWirelessConnect(raw: unknown, io: WirelessConnectEnvironment = {}): Promise<number> {
	let options: WirelessConnectOptions;
	try {
		options = parseOptions(WirelessConnectOptionsSchema, raw);
	} catch (err) {
		createLogger({ stdout: io.stdout, stderr: io.stderr }).error(describeError(err));
		return 1;
	}

	const logger = createLogger({ debug: options.debug, stdout: io.stdout, stderr: io.stderr });
	const paths = resolveToolPaths({ adb: options.adb, scrcpy: options.scrcpy }, io.env);
	const connector = new WirelessConnector({
		bridge: new AdbBridge({ adbPath: paths.adb, runner: io.runner, logger }),
		session: new ScrcpySession({ scrcpyPath: paths.scrcpy, launcher: io.launcher, runner: io.runner, logger }),
		logger,
		state: createSessionDeviceState({
			deviceIp: options.ip,
			port: options.port,
			rotation: options.rotation,
			mode: options.usb ? "usb" : "wireless",
		}),
		shutdown: io.shutdown,
		settings: io.settings,
		sleep: io.sleep,
	});
	return connector.run();
}
