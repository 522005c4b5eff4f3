import type { DeviceEntry } from "@tetherless/bridge-core";
import { TetherlessError, describeError } from "@tetherless/core";
import type { ConnectorContext } from "./context";

const NO_USB_DEVICE_MESSAGE = [
	"No USB device detected",
	"Make sure that:",
	" 1. the device is connected over USB",
	" 2. USB debugging is enabled on the device",
	" 3. USB debugging has been authorised on the device",
].join("\n");

function notReadyError(entry: DeviceEntry): TetherlessError {
	const details = { serial: entry.serial, state: entry.state };
	switch (entry.state) {
		case "unauthorized":
			return new TetherlessError(
				"missing-prerequisite",
				`Device ${entry.serial} is not authorised, accept the USB debugging prompt on the device`,
				details,
			);
		case "offline":
			return new TetherlessError("unreachable", `Device ${entry.serial} is offline`, details);
		default:
			return new TetherlessError(
				"unreachable",
				`Device ${entry.serial} is in an unexpected state: ${entry.state}`,
				details,
			);
	}
}

/**
 * Restart the adb daemon. Either step may fail (no daemon running yet)
 * without stopping discovery.
 */
async function resetServer(ctx: ConnectorContext): Promise<void> {
	const steps: Array<[string, () => Promise<void>]> = [
		["kill-server", () => ctx.bridge.killServer()],
		["start-server", () => ctx.bridge.startServer()],
	];
	for (const [name, step] of steps) {
		try {
			await step();
		} catch (err) {
			ctx.logger.debug(`adb ${name} failed: ${describeError(err)}`);
		}
		await ctx.sleep(ctx.settings.serverResetDelayMs);
	}
}

/**
 * Find the single USB-attached device that is ready for commands.
 *
 * Network entries are ignored. Zero devices, a device that is not ready and
 * several ready devices are all fatal.
 *
 * @returns The USB serial.
 */
export async function discoverUsbDevice(ctx: ConnectorContext): Promise<string> {
	await resetServer(ctx);
	ctx.logger.step("Detecting USB devices...");

	const usbEntries = (await ctx.bridge.listDevices()).filter((entry) => !entry.isNetwork);
	if (usbEntries.length === 0) {
		throw new TetherlessError("missing-prerequisite", NO_USB_DEVICE_MESSAGE);
	}

	const ready = usbEntries.filter((entry) => entry.state === "device");
	if (ready.length === 0) {
		throw notReadyError(usbEntries[0]);
	}
	if (ready.length > 1) {
		const serials = ready.map((entry) => entry.serial);
		throw new TetherlessError(
			"missing-prerequisite",
			`Several USB devices connected (${serials.join(", ")}), keep only one connected`,
			{ serials },
		);
	}

	const { serial } = ready[0];
	try {
		await ctx.bridge.shell(serial, "echo ok");
	} catch (err) {
		throw new TetherlessError("unreachable", "Device state abnormal, reconnect the device", {
			serial,
			cause: describeError(err),
		});
	}

	ctx.logger.debug(`USB device: ${serial}`);
	return serial;
}
