import type { DeviceEntry } from "@tetherless/bridge-core";
import { describe, expect, it } from "vitest";
import { createTestContext } from "./test-utils";
import { discoverUsbDevice } from "./usb-discovery";

const usb = (serial: string, state = "device"): DeviceEntry => ({ serial, state, isNetwork: false });
const network = (serial: string, state = "device"): DeviceEntry => ({ serial, state, isNetwork: true });

describe("discoverUsbDevice", () => {
	it("returns the only ready USB device after resetting the daemon", async () => {
		const { ctx, bridge, sleep } = createTestContext();
		bridge.listDevices.mockResolvedValue([network("192.168.1.40:5656"), usb("R58M123ABC")]);

		await expect(discoverUsbDevice(ctx)).resolves.toBe("R58M123ABC");
		expect(bridge.killServer).toHaveBeenCalledTimes(1);
		expect(bridge.startServer).toHaveBeenCalledTimes(1);
		expect(sleep.mock.calls).toEqual([[1000], [1000]]);
		expect(bridge.shell).toHaveBeenCalledWith("R58M123ABC", "echo ok");
	});

	it("keeps going when the daemon was not running", async () => {
		const { ctx, bridge, logger } = createTestContext();
		bridge.killServer.mockRejectedValue(new Error("cannot connect to daemon"));
		bridge.listDevices.mockResolvedValue([usb("R58M123ABC")]);

		await expect(discoverUsbDevice(ctx)).resolves.toBe("R58M123ABC");
		expect(logger.messages("debug")).toContain("adb kill-server failed: cannot connect to daemon");
	});

	it("fails with hints when no USB device is listed", async () => {
		const { ctx, bridge } = createTestContext();
		bridge.listDevices.mockResolvedValue([network("192.168.1.40:5656")]);

		await expect(discoverUsbDevice(ctx)).rejects.toMatchObject({
			kind: "missing-prerequisite",
			message:
				"No USB device detected\nMake sure that:\n 1. the device is connected over USB\n 2. USB debugging is enabled on the device\n 3. USB debugging has been authorised on the device",
		});
		expect(bridge.shell).not.toHaveBeenCalled();
	});

	it("asks for authorisation when the device is unauthorized", async () => {
		const { ctx, bridge } = createTestContext();
		bridge.listDevices.mockResolvedValue([usb("R58M123ABC", "unauthorized")]);

		await expect(discoverUsbDevice(ctx)).rejects.toThrow(
			"Device R58M123ABC is not authorised, accept the USB debugging prompt on the device",
		);
	});

	it("reports an offline device", async () => {
		const { ctx, bridge } = createTestContext();
		bridge.listDevices.mockResolvedValue([usb("R58M123ABC", "offline")]);

		await expect(discoverUsbDevice(ctx)).rejects.toMatchObject({
			kind: "unreachable",
			message: "Device R58M123ABC is offline",
		});
	});

	it("refuses to choose between several ready devices", async () => {
		const { ctx, bridge } = createTestContext();
		bridge.listDevices.mockResolvedValue([usb("R58M123ABC"), usb("emulator-5554")]);

		await expect(discoverUsbDevice(ctx)).rejects.toMatchObject({
			kind: "missing-prerequisite",
			message: "Several USB devices connected (R58M123ABC, emulator-5554), keep only one connected",
			details: { serials: ["R58M123ABC", "emulator-5554"] },
		});
	});

	it("ignores devices that are not ready when one is", async () => {
		const { ctx, bridge } = createTestContext();
		bridge.listDevices.mockResolvedValue([usb("emulator-5554", "offline"), usb("R58M123ABC")]);

		await expect(discoverUsbDevice(ctx)).resolves.toBe("R58M123ABC");
	});

	it("fails when the device does not answer", async () => {
		const { ctx, bridge } = createTestContext();
		bridge.listDevices.mockResolvedValue([usb("R58M123ABC")]);
		bridge.shell.mockRejectedValue(new Error("error: closed"));

		await expect(discoverUsbDevice(ctx)).rejects.toMatchObject({
			kind: "unreachable",
			message: "Device state abnormal, reconnect the device",
		});
	});
});
