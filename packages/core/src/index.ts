export {
	RotationSchema,
	ConnectionModeSchema,
	ConnectorStateSchema,
	type Rotation,
	type ConnectionMode,
	type ConnectorState,
} from "./schemas/enums";
export {
	PortSchema,
	SessionDeviceStateSchema,
	createSessionDeviceState,
	getTargetSerial,
	hasSettingsSnapshot,
	type SessionDeviceState,
	type SessionDeviceStateInput,
} from "./schemas/device-state";
export {
	WirelessConnectOptionsSchema,
	SendTextOptionsSchema,
	type WirelessConnectOptions,
	type SendTextOptions,
} from "./schemas/options";
export {
	DEFAULT_PORT,
	MAX_CONNECT_ATTEMPTS,
	CONNECT_RETRY_DELAY_MS,
	SERVER_RESET_DELAY_MS,
	TCPIP_SETTLE_DELAY_MS,
	BENIGN_MIRROR_EXIT_CODES,
	TEXT_INPUT_ACTION,
} from "./constants";
export { TetherlessError, isTetherlessError, describeError } from "./errors";
export type { TetherlessErrorKind } from "./errors";
export { createLogger, silentLogger } from "./logger";
export type { Logger, LoggerOptions, OutputStream } from "./logger";
export { resolveToolPaths, ADB_PATH_ENV, SCRCPY_PATH_ENV } from "./config";
export type { ToolPaths } from "./config";
