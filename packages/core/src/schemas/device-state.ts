import { z } from "zod";
import { DEFAULT_PORT } from "../constants";
import { ConnectionModeSchema, RotationSchema } from "./enums";

export const PortSchema = z.number().int().min(1).max(65535);

export const SessionDeviceStateSchema = z.object({
	/** USB serial of the device, as listed by `adb devices`. */
	deviceId: z.string().default(""),
	deviceIp: z.string().ip({ version: "v4" }).optional(),
	port: PortSchema.default(DEFAULT_PORT),
	rotation: RotationSchema.optional(),
	mode: ConnectionModeSchema.default("wireless"),
	/** Value of `global stay_awake` captured right before it is overridden. */
	previousStayAwake: z.string().optional(),
	/** Value of `secure lockscreen.disabled` captured right before it is overridden. */
	previousLockscreenDisabled: z.string().optional(),
});

export type SessionDeviceState = z.infer<typeof SessionDeviceStateSchema>;
export type SessionDeviceStateInput = z.input<typeof SessionDeviceStateSchema>;

export function createSessionDeviceState(input: SessionDeviceStateInput = {}): SessionDeviceState {
	return SessionDeviceStateSchema.parse(input);
}

/**
 * The serial that addresses the device for the rest of the session:
 * the USB serial in USB mode, `ip:port` otherwise. Null while neither is known.
 */
export function getTargetSerial(state: SessionDeviceState): string | null {
	if (state.mode === "usb") {
		return state.deviceId || null;
	}
	return state.deviceIp ? `${state.deviceIp}:${state.port}` : null;
}

export function hasSettingsSnapshot(state: SessionDeviceState): boolean {
	return state.previousStayAwake !== undefined || state.previousLockscreenDisabled !== undefined;
}
