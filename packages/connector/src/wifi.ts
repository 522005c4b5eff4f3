import { parseInetAddress } from "@tetherless/bridge-core";
import { TetherlessError, describeError } from "@tetherless/core";
import type { ConnectorContext } from "./context";

/** Alternative ways of reading the WiFi interface, tried in order. */
const IP_COMMANDS = ["ip addr show wlan0", "ifconfig wlan0"] as const;

async function queryWifi(ctx: ConnectorContext, serial: string, command: string): Promise<string> {
	try {
		return await ctx.bridge.shell(serial, command);
	} catch (err) {
		throw new TetherlessError("command-failed", "Unable to check the WiFi state", {
			serial,
			command,
			cause: describeError(err),
		});
	}
}

/**
 * Fail unless WiFi is powered on and the device reports the adapter enabled.
 */
export async function checkWifiStatus(ctx: ConnectorContext, serial: string): Promise<void> {
	ctx.logger.debug("Checking WiFi state...");

	const wifiOn = await queryWifi(ctx, serial, "settings get global wifi_on");
	if (wifiOn.trim() !== "1") {
		throw new TetherlessError("missing-prerequisite", "WiFi is off, turn on WiFi on the device first");
	}

	const dump = await queryWifi(ctx, serial, "dumpsys wifi");
	if (!dump.includes("Wi-Fi is enabled")) {
		throw new TetherlessError(
			"missing-prerequisite",
			"WiFi is not connected to a network, connect the device to WiFi first",
		);
	}
}

/**
 * Read the IPv4 address of `wlan0`.
 *
 * @returns The address, or null if no command printed one.
 */
export async function discoverDeviceIp(ctx: ConnectorContext, serial: string): Promise<string | null> {
	for (const command of IP_COMMANDS) {
		try {
			const address = parseInetAddress(await ctx.bridge.shell(serial, command));
			if (address) return address;
		} catch (err) {
			ctx.logger.debug(`${command} failed: ${describeError(err)}`);
		}
	}
	return null;
}
