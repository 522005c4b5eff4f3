export { WirelessConnector } from "./connector";
export type { WirelessConnectorOptions } from "./connector";
export { ConnectorEventBus } from "./event-bus";
export type { BusEvent, ConnectorEvent } from "./event-bus";
export { ConnectionStateMachine, canTransition } from "./state-machine";
export {
	DEFAULT_CONNECTOR_SETTINGS,
	defaultSleep,
	type ConnectorContext,
	type ConnectorSettings,
	type Sleep,
} from "./context";
export { discoverUsbDevice } from "./usb-discovery";
export { checkWifiStatus, discoverDeviceIp } from "./wifi";
export { connectWithRetry, detectWirelessDevice, enableTcpip } from "./transport";
export { DeviceSettingsGuard } from "./device-settings";
export type { DeviceSettingsGuardOptions } from "./device-settings";
export { applyRotation } from "./rotation";
export {
	ScrcpySession,
	SESSION_FLAGS,
	isBenignMirrorExit,
	spawnInherited,
	toExitCode,
} from "./scrcpy-session";
export type { MirrorLauncher, MirrorOutcome, ScrcpySessionOptions } from "./scrcpy-session";
export { ShutdownCoordinator } from "./shutdown";
export type { Finalizer, ShutdownCoordinatorOptions, SignalSource } from "./shutdown";
