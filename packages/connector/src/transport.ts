import { type NetworkAddress, isTcpipSwitchAccepted, parseNetworkSerial } from "@tetherless/bridge-core";
import { TetherlessError, describeError } from "@tetherless/core";
import type { ConnectorContext } from "./context";

const CONNECTION_LOST_HINT = [
	"Unable to establish a wireless connection",
	"The wireless connection may have been lost because:",
	" 1. the device rebooted",
	" 2. USB debugging was disabled",
	" 3. the WiFi network changed",
	" 4. developer options were reset",
	"If so, reconnect the device over USB and run this command again.",
].join("\n");

/**
 * Switch the adb daemon of a USB device to TCP/IP on `port`.
 *
 * Only the response text decides success; adb's exit code is ignored.
 */
export async function enableTcpip(ctx: ConnectorContext, serial: string, port: number): Promise<void> {
	ctx.logger.step("Enabling TCP/IP mode...");

	const result = await ctx.bridge.tcpip(serial, port);
	const output = `${result.stdout}${result.stderr}`;
	if (!isTcpipSwitchAccepted(output)) {
		throw new TetherlessError("command-failed", `Unable to enable TCP/IP mode (adb exit code ${result.exitCode})`, {
			serial,
			port,
			output: output.trim(),
		});
	}

	ctx.logger.success("TCP/IP mode enabled");
	await ctx.sleep(ctx.settings.tcpipSettleDelayMs);
}

async function logDeviceList(ctx: ConnectorContext): Promise<void> {
	try {
		const entries = await ctx.bridge.listDevices();
		const listing = entries.map((entry) => `${entry.serial} ${entry.state}`).join(", ");
		ctx.logger.debug(`Devices: ${listing || "none"}`);
	} catch (err) {
		ctx.logger.debug(`adb devices failed: ${describeError(err)}`);
	}
}

/**
 * Connect to `host:port` and check the link with a round-trip shell command,
 * retrying a fixed number of times with a fixed delay.
 *
 * @returns true once an attempt is verified, false after the last failure.
 */
export async function connectWithRetry(
	ctx: ConnectorContext,
	host: string,
	port: number,
): Promise<boolean> {
	const target = `${host}:${port}`;
	const { maxConnectAttempts, connectRetryDelayMs } = ctx.settings;

	for (let attempt = 1; attempt <= maxConnectAttempts; attempt++) {
		ctx.logger.step(`Connecting to ${target} (attempt ${attempt}/${maxConnectAttempts})`);

		let success = false;
		try {
			await ctx.bridge.connect(host, port);
			await ctx.bridge.shell(target, "exit");
			success = true;
		} catch (err) {
			ctx.logger.debug(`Connection attempt ${attempt} failed: ${describeError(err)}`);
		}

		ctx.events.publish({ type: "connect.attempt", target, attempt, maxAttempts: maxConnectAttempts, success });
		if (success) {
			ctx.logger.success(`Wireless connection established (attempt ${attempt}/${maxConnectAttempts})`);
			return true;
		}

		await logDeviceList(ctx);
		if (attempt < maxConnectAttempts) {
			ctx.logger.step(`Attempt ${attempt}/${maxConnectAttempts} failed, retrying...`);
			await ctx.sleep(connectRetryDelayMs);
		}
	}

	ctx.logger.error(CONNECTION_LOST_HINT);
	return false;
}

/**
 * First ready device attached over the network as `a.b.c.d:port`, if any.
 * A failing listing counts as none.
 */
export async function detectWirelessDevice(ctx: ConnectorContext): Promise<NetworkAddress | null> {
	try {
		for (const entry of await ctx.bridge.listDevices()) {
			if (entry.state !== "device") continue;
			const address = parseNetworkSerial(entry.serial);
			if (address) return address;
		}
	} catch (err) {
		ctx.logger.debug(`adb devices failed: ${describeError(err)}`);
	}
	return null;
}
