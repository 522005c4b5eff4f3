import { describe, expect, it } from "vitest";
import { createTestContext, result } from "./test-utils";
import { connectWithRetry, detectWirelessDevice, enableTcpip } from "./transport";

describe("enableTcpip", () => {
	it("waits for the daemon to restart once the switch is accepted", async () => {
		const { ctx, bridge, logger, sleep } = createTestContext();

		await enableTcpip(ctx, "R58M123ABC", 5656);

		expect(bridge.tcpip).toHaveBeenCalledWith("R58M123ABC", 5656);
		expect(logger.messages("success")).toEqual(["TCP/IP mode enabled"]);
		expect(sleep).toHaveBeenCalledWith(2000);
	});

	it("accepts a daemon already in TCP/IP mode whatever the exit code", async () => {
		const { ctx, bridge } = createTestContext();
		bridge.tcpip.mockResolvedValue(result("", 1, "already running as TCP\n"));

		await expect(enableTcpip(ctx, "R58M123ABC", 5656)).resolves.toBeUndefined();
	});

	it("fails on any other response even with a zero exit code", async () => {
		const { ctx, bridge, sleep } = createTestContext();
		bridge.tcpip.mockResolvedValue(result("error: no devices/emulators found\n"));

		await expect(enableTcpip(ctx, "R58M123ABC", 5656)).rejects.toMatchObject({
			kind: "command-failed",
			message: "Unable to enable TCP/IP mode (adb exit code 0)",
			details: { output: "error: no devices/emulators found" },
		});
		expect(sleep).not.toHaveBeenCalled();
	});
});

describe("connectWithRetry", () => {
	it.each([0, 1, 2])("succeeds after %i failed attempts", async (failures) => {
		const { ctx, bridge, sleep } = createTestContext();
		for (let i = 0; i < failures; i++) {
			bridge.shell.mockRejectedValueOnce(new Error("error: device '10.0.0.8:5656' not found"));
		}

		await expect(connectWithRetry(ctx, "10.0.0.8", 5656)).resolves.toBe(true);
		expect(bridge.connect).toHaveBeenCalledTimes(failures + 1);
		expect(bridge.shell).toHaveBeenLastCalledWith("10.0.0.8:5656", "exit");
		expect(sleep).toHaveBeenCalledTimes(failures);
	});

	it.each([3, 5])("gives up after three attempts when %i would fail", async (failures) => {
		const { ctx, bridge, logger, sleep } = createTestContext();
		for (let i = 0; i < failures; i++) {
			bridge.shell.mockRejectedValueOnce(new Error("error: device offline"));
		}

		await expect(connectWithRetry(ctx, "10.0.0.8", 5656)).resolves.toBe(false);
		expect(bridge.connect).toHaveBeenCalledTimes(3);
		expect(bridge.shell).toHaveBeenCalledTimes(3);
		expect(sleep.mock.calls).toEqual([[1000], [1000]]);
		expect(logger.messages("error")[0].split("\n")[0]).toBe("Unable to establish a wireless connection");
	});

	it("publishes every attempt", async () => {
		const { ctx, bridge } = createTestContext();
		bridge.shell.mockRejectedValueOnce(new Error("error: closed"));

		await connectWithRetry(ctx, "10.0.0.8", 5656);

		expect(
			ctx.events.history().map((e) => (e.type === "connect.attempt" ? [e.attempt, e.success] : null)),
		).toEqual([
			[1, false],
			[2, true],
		]);
	});

	it("logs progress the way the user sees it", async () => {
		const { ctx, bridge, logger } = createTestContext();
		bridge.connect.mockRejectedValueOnce(new Error("adb connect failed"));

		await connectWithRetry(ctx, "10.0.0.8", 5656);

		expect(logger.messages("step")).toEqual([
			"Connecting to 10.0.0.8:5656 (attempt 1/3)",
			"Attempt 1/3 failed, retrying...",
			"Connecting to 10.0.0.8:5656 (attempt 2/3)",
		]);
		expect(logger.messages("success")).toEqual(["Wireless connection established (attempt 2/3)"]);
	});

	it("honours a custom attempt budget", async () => {
		const { ctx, bridge } = createTestContext();
		ctx.settings.maxConnectAttempts = 1;
		bridge.shell.mockRejectedValue(new Error("error: closed"));

		await expect(connectWithRetry(ctx, "10.0.0.8", 5656)).resolves.toBe(false);
		expect(bridge.connect).toHaveBeenCalledTimes(1);
	});
});

describe("detectWirelessDevice", () => {
	it("returns the first ready network device", async () => {
		const { ctx, bridge } = createTestContext();
		bridge.listDevices.mockResolvedValue([
			{ serial: "R58M123ABC", state: "device", isNetwork: false },
			{ serial: "192.168.1.41:5555", state: "offline", isNetwork: true },
			{ serial: "192.168.1.40:5656", state: "device", isNetwork: true },
		]);

		await expect(detectWirelessDevice(ctx)).resolves.toEqual({ host: "192.168.1.40", port: 5656 });
	});

	it("ignores mDNS serials", async () => {
		const { ctx, bridge } = createTestContext();
		bridge.listDevices.mockResolvedValue([
			{ serial: "adb-R58M123ABC-Xy12Zq._adb-tls-connect._tcp", state: "device", isNetwork: true },
		]);

		await expect(detectWirelessDevice(ctx)).resolves.toBeNull();
	});

	it("treats a failed listing as no device", async () => {
		const { ctx, bridge } = createTestContext();
		bridge.listDevices.mockRejectedValue(new Error("daemon not running"));

		await expect(detectWirelessDevice(ctx)).resolves.toBeNull();
	});
});
