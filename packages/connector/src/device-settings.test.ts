import { describe, expect, it } from "vitest";
import { DeviceSettingsGuard } from "./device-settings";
import { createTestContext } from "./test-utils";

const TARGET = "10.0.0.8:5656";

function setup(values: Record<string, string> = {}) {
	const { ctx, bridge, logger } = createTestContext();
	bridge.getSetting.mockImplementation(async (_serial, _namespace, key) => values[key]);
	const guard = new DeviceSettingsGuard(ctx);
	return { guard, state: ctx.state, bridge, logger };
}

describe("DeviceSettingsGuard.acquire", () => {
	it("captures each value before overriding it", async () => {
		const { guard, state, bridge } = setup({ "lockscreen.disabled": "0", stay_awake: "2" });

		await guard.acquire(TARGET);

		expect(state.previousLockscreenDisabled).toBe("0");
		expect(state.previousStayAwake).toBe("2");
		expect(bridge.putSetting.mock.calls).toEqual([
			[TARGET, "secure", "lockscreen.disabled", "1"],
			[TARGET, "global", "stay_awake", "1"],
		]);
	});

	it("records 0 for values that cannot be read", async () => {
		const { guard, state, bridge } = setup();
		bridge.getSetting.mockRejectedValueOnce(new Error("settings: not found"));

		await guard.acquire(TARGET);

		expect(state.previousLockscreenDisabled).toBe("0");
		expect(state.previousStayAwake).toBe("0");
	});

	it("fails without touching anything when the device does not answer", async () => {
		const { guard, state, bridge } = setup();
		bridge.shell.mockRejectedValue(new Error("error: closed"));

		await expect(guard.acquire(TARGET)).rejects.toMatchObject({
			kind: "unreachable",
			message: "Device not connected or in an abnormal state",
		});
		expect(bridge.putSetting).not.toHaveBeenCalled();
		expect(state.previousStayAwake).toBeUndefined();
		expect(state.previousLockscreenDisabled).toBeUndefined();
	});
});

describe("DeviceSettingsGuard.restore", () => {
	it("does nothing without a snapshot", async () => {
		const { guard, bridge, logger } = setup();

		await guard.restore();

		expect(bridge.shell).not.toHaveBeenCalled();
		expect(bridge.putSetting).not.toHaveBeenCalled();
		expect(logger.messages("debug")).toEqual(["No device settings to restore"]);
	});

	it("puts the captured values back and turns the screen off", async () => {
		const { guard, bridge, logger } = setup({
			"lockscreen.disabled": "0",
			stay_awake: "2",
			screen_off_timeout: "30000",
		});
		await guard.acquire(TARGET);
		bridge.putSetting.mockClear();

		await guard.restore();

		expect(bridge.putSetting.mock.calls).toEqual([
			[TARGET, "global", "stay_awake", "2"],
			[TARGET, "system", "screen_off_timeout", "60000"],
			[TARGET, "system", "screen_off_timeout", "30000"],
			[TARGET, "secure", "lockscreen.disabled", "0"],
		]);
		expect(bridge.sendKeyEvent.mock.calls).toEqual([[TARGET, "KEYCODE_SLEEP"]]);
		expect(logger.messages("success")).toEqual(["Device settings restored"]);
	});

	it("falls back to the power key when sleep is not supported", async () => {
		const { guard, bridge } = setup();
		await guard.acquire(TARGET);
		bridge.sendKeyEvent.mockRejectedValueOnce(new Error("Unknown keycode"));

		await guard.restore();

		expect(bridge.sendKeyEvent.mock.calls).toEqual([
			[TARGET, "KEYCODE_SLEEP"],
			[TARGET, "KEYCODE_POWER"],
		]);
	});

	it("keeps restoring when the screen cannot be turned off", async () => {
		const { guard, bridge, logger } = setup();
		await guard.acquire(TARGET);
		bridge.putSetting.mockClear();
		bridge.sendKeyEvent.mockRejectedValue(new Error("Unknown keycode"));

		await guard.restore();

		expect(logger.messages("error")).toEqual(["Failed to lock the screen"]);
		expect(bridge.putSetting).toHaveBeenLastCalledWith(TARGET, "secure", "lockscreen.disabled", "0");
	});

	it("skips the timeout nudge when the timeout cannot be read", async () => {
		const { guard, bridge } = setup({ "lockscreen.disabled": "1", stay_awake: "0" });
		await guard.acquire(TARGET);
		bridge.putSetting.mockClear();

		await guard.restore();

		expect(bridge.putSetting.mock.calls).toEqual([
			[TARGET, "global", "stay_awake", "0"],
			[TARGET, "secure", "lockscreen.disabled", "1"],
		]);
	});

	it("reports a failed write and moves on", async () => {
		const { guard, bridge, logger } = setup();
		await guard.acquire(TARGET);
		bridge.putSetting.mockRejectedValueOnce(new Error("Permission denial"));

		await guard.restore();

		expect(logger.messages("error")).toEqual(["Failed to restore stay_awake: Permission denial"]);
		expect(bridge.putSetting).toHaveBeenLastCalledWith(TARGET, "secure", "lockscreen.disabled", "0");
		expect(logger.messages("success")).toEqual(["Device settings restored"]);
	});

	it("only restores settings that were captured", async () => {
		const { guard, state, bridge } = setup({ "lockscreen.disabled": "0" });
		bridge.putSetting.mockRejectedValueOnce(new Error("Permission denial"));
		await expect(guard.acquire(TARGET)).rejects.toThrow("Permission denial");
		expect(state.previousStayAwake).toBeUndefined();
		bridge.putSetting.mockClear();

		await guard.restore();

		expect(bridge.putSetting.mock.calls).toEqual([[TARGET, "secure", "lockscreen.disabled", "0"]]);
	});

	it("waits for a save in flight and skips the writes it had not made yet", async () => {
		const { guard, state, bridge } = setup();
		let restoring: Promise<void> | undefined;
		bridge.getSetting.mockImplementation(async (_serial, _namespace, key) => {
			if (key === "stay_awake") restoring = guard.restore();
			return undefined;
		});

		await guard.acquire(TARGET);
		await restoring;

		expect(state.previousStayAwake).toBeUndefined();
		expect(bridge.putSetting.mock.calls).toEqual([
			[TARGET, "secure", "lockscreen.disabled", "1"],
			[TARGET, "secure", "lockscreen.disabled", "0"],
		]);
	});

	it("waits for a failing save before restoring", async () => {
		const { guard, bridge, logger } = setup();
		let restoring: Promise<void> | undefined;
		bridge.putSetting.mockImplementationOnce(async () => {
			restoring = guard.restore();
			throw new Error("Permission denial");
		});

		await expect(guard.acquire(TARGET)).rejects.toThrow("Permission denial");
		await restoring;

		expect(logger.messages("debug")).toContain("Saving device settings did not finish: Permission denial");
		expect(bridge.putSetting).toHaveBeenLastCalledWith(TARGET, "secure", "lockscreen.disabled", "0");
	});

	it("does not start saving after a restore", async () => {
		const { guard, bridge } = setup();
		await guard.restore();

		await guard.acquire(TARGET);

		expect(bridge.shell).not.toHaveBeenCalled();
		expect(bridge.putSetting).not.toHaveBeenCalled();
	});

	it("leaves the device alone once it is gone", async () => {
		const { guard, bridge, logger } = setup();
		await guard.acquire(TARGET);
		bridge.putSetting.mockClear();
		bridge.shell.mockRejectedValue(new Error("error: device offline"));

		await guard.restore();

		expect(logger.messages("error")).toEqual(["Device disconnected, settings not restored"]);
		expect(bridge.putSetting).not.toHaveBeenCalled();
		expect(bridge.sendKeyEvent).not.toHaveBeenCalled();
	});
});
