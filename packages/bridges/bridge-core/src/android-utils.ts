/**
 * Parsers for `adb` text output shared by both commands.
 */

export interface DeviceEntry {
	serial: string;
	/** `device`, `offline`, `unauthorized`, ... as printed by `adb devices`. */
	state: string;
	/** True for serials that address the device over the network. */
	isNetwork: boolean;
}

export interface NetworkAddress {
	host: string;
	port: number;
}

const IPV4_SERIAL = /^(\d{1,3}(?:\.\d{1,3}){3}):(\d{1,5})$/;

/** Serials advertised over mDNS by wireless debugging (Android 11+). */
const MDNS_SERIAL_MARKER = "._adb-tls-connect._tcp";

/**
 * Split an `a.b.c.d:port` serial into host and port.
 * Returns null for USB serials and for hostnames.
 */
export function parseNetworkSerial(serial: string): NetworkAddress | null {
	const match = serial.match(IPV4_SERIAL);
	if (!match) return null;
	return { host: match[1], port: Number.parseInt(match[2], 10) };
}

export function isNetworkSerial(serial: string): boolean {
	return serial.includes(":") || serial.includes(MDNS_SERIAL_MARKER);
}

/**
 * Parse `adb devices` output. The first line is the
 * "List of devices attached" header; daemon notices start with `*` and can
 * push the header further down.
 */
export function parseDevicesOutput(stdout: string): DeviceEntry[] {
	const entries: DeviceEntry[] = [];
	for (const line of stdout.split(/\r?\n/).slice(1)) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("*") || trimmed.startsWith("List of devices")) continue;

		const [serial, first, second] = trimmed.split(/\s+/);
		// "no permissions" is the only state printed as two words.
		const state = first === "no" && second === "permissions" ? "no permissions" : first;
		entries.push({ serial, state: state ?? "unknown", isNetwork: isNetworkSerial(serial) });
	}
	return entries;
}

/**
 * First IPv4 address printed by `ip addr show` (`inet a.b.c.d/24`)
 * or `ifconfig` (`inet addr:a.b.c.d`).
 */
export function parseInetAddress(output: string): string | null {
	const match = output.match(/inet (?:addr:)?(\d{1,3}(?:\.\d{1,3}){3})/);
	return match ? match[1] : null;
}

const TCPIP_ACCEPTED = /restarting in (tcpip|TCP) mode|already running as (tcpip|TCP)/i;

/** Whether `adb tcpip <port>` reported that the daemon switched (or had switched) transport. */
export function isTcpipSwitchAccepted(output: string): boolean {
	return TCPIP_ACCEPTED.test(output);
}

/**
 * Value printed by `settings get`. Unset keys print `null`, which is
 * reported as undefined.
 */
export function parseSettingValue(stdout: string): string | undefined {
	const value = stdout.trim();
	if (!value || value === "null") return undefined;
	return value;
}

/**
 * Quote a value for the device's `sh`. adb joins shell arguments with spaces
 * before the device shell parses them again.
 */
export function quoteShellArg(value: string): string {
	return `'${value.replace(/'/g, `'\\''`)}'`;
}
