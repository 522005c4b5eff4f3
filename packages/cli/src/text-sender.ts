import type { DeviceEntry, IDeviceBridge } from "@tetherless/bridge-core";
import { type Logger, TEXT_INPUT_ACTION, TetherlessError, describeError, isTetherlessError } from "@tetherless/core";

export interface TextSenderOptions {
	bridge: IDeviceBridge;
	logger: Logger;
	text: string;
}

async function findSingleDevice(bridge: IDeviceBridge): Promise<string> {
	let entries: DeviceEntry[];
	try {
		entries = await bridge.listDevices();
	} catch (err) {
		throw new TetherlessError("command-failed", `Unable to list devices: ${describeError(err)}`);
	}
	if (entries.length === 0) {
		throw new TetherlessError("missing-prerequisite", "No device connected");
	}
	if (entries.length > 1) {
		throw new TetherlessError("missing-prerequisite", "Several devices connected, keep only one connected", {
			serials: entries.map((entry) => entry.serial),
		});
	}

	const [{ serial, state }] = entries;
	if (state !== "device") {
		throw new TetherlessError("unreachable", `Device ${serial} is not ready (${state})`, { serial, state });
	}
	return serial;
}

/**
 * Type `text` on the only connected device through the ADB keyboard
 * broadcast.
 *
 * @returns The process exit code.
 */
export async function runTextSender({ bridge, logger, text }: TextSenderOptions): Promise<number> {
	try {
		const serial = await findSingleDevice(bridge);
		logger.step(`Sending text: ${text}`);
		const output = await bridge.broadcast(serial, TEXT_INPUT_ACTION, { msg: text });
		logger.debug(output.trim());
		logger.success("Text sent");
		return 0;
	} catch (err) {
		logger.error(isTetherlessError(err) ? err.message : `Unable to send the text: ${describeError(err)}`);
		return 1;
	}
}
