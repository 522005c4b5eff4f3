import type { CommandResult, IDeviceBridge } from "@tetherless/bridge-core";
import { type Logger, type SessionDeviceStateInput, createSessionDeviceState } from "@tetherless/core";
import { type Mock, vi } from "vitest";
import { type ConnectorContext, DEFAULT_CONNECTOR_SETTINGS } from "./context";
import { ConnectorEventBus } from "./event-bus";

export type MockBridge = { [K in keyof IDeviceBridge]: Mock<IDeviceBridge[K]> };

export function result(stdout = "", exitCode = 0, stderr = ""): CommandResult {
	return { stdout, stderr, exitCode };
}

export function createMockBridge(): MockBridge {
	return {
		isAvailable: vi.fn<IDeviceBridge["isAvailable"]>().mockResolvedValue(true),
		listDevices: vi.fn<IDeviceBridge["listDevices"]>().mockResolvedValue([]),
		shell: vi.fn<IDeviceBridge["shell"]>().mockResolvedValue(""),
		connect: vi.fn<IDeviceBridge["connect"]>().mockResolvedValue(result("connected to device\n")),
		tcpip: vi.fn<IDeviceBridge["tcpip"]>().mockResolvedValue(result("restarting in TCP mode port: 5656\n")),
		killServer: vi.fn<IDeviceBridge["killServer"]>().mockResolvedValue(undefined),
		startServer: vi.fn<IDeviceBridge["startServer"]>().mockResolvedValue(undefined),
		getSetting: vi.fn<IDeviceBridge["getSetting"]>().mockResolvedValue(undefined),
		putSetting: vi.fn<IDeviceBridge["putSetting"]>().mockResolvedValue(undefined),
		sendKeyEvent: vi.fn<IDeviceBridge["sendKeyEvent"]>().mockResolvedValue(undefined),
		broadcast: vi.fn<IDeviceBridge["broadcast"]>().mockResolvedValue(""),
	};
}

export interface LogEntry {
	level: "step" | "success" | "warn" | "error" | "debug";
	message: string;
}

export function createRecordingLogger(): Logger & { entries: LogEntry[]; messages(level: LogEntry["level"]): string[] } {
	const entries: LogEntry[] = [];
	const record = (level: LogEntry["level"]) => (message: string) => {
		entries.push({ level, message });
	};
	return {
		entries,
		debugEnabled: true,
		step: record("step"),
		success: record("success"),
		warn: record("warn"),
		error: record("error"),
		debug: record("debug"),
		command: () => {},
		messages(level) {
			return entries.filter((entry) => entry.level === level).map((entry) => entry.message);
		},
	};
}

export function createTestContext(state: SessionDeviceStateInput = {}) {
	const bridge = createMockBridge();
	const logger = createRecordingLogger();
	const sleep = vi.fn(async (_ms: number) => {});
	const ctx: ConnectorContext = {
		bridge,
		logger,
		state: createSessionDeviceState(state),
		settings: { ...DEFAULT_CONNECTOR_SETTINGS },
		events: new ConnectorEventBus(),
		sleep,
	};
	return { ctx, bridge, logger, sleep };
}
