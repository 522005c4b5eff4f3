import type { IDeviceBridge, SettingsNamespace } from "@tetherless/bridge-core";
import {
	type Logger,
	type SessionDeviceState,
	TetherlessError,
	describeError,
	hasSettingsSnapshot,
} from "@tetherless/core";

/** Value assumed for a setting that cannot be read. */
const FALLBACK_SETTING_VALUE = "0";

/** Temporary screen-off timeout set and reverted so that some ROMs re-arm the lockscreen. */
const TIMEOUT_NUDGE_MS = "60000";

export interface DeviceSettingsGuardOptions {
	bridge: IDeviceBridge;
	logger: Logger;
	state: SessionDeviceState;
}

/**
 * Overrides "stay awake" and "lockscreen disabled" for a mirroring session
 * and puts them back afterwards.
 *
 * Each previous value is written to the session state immediately before the
 * setting changes; `restore` only touches settings whose value was captured,
 * and first waits for an `acquire` still in flight.
 */
export class DeviceSettingsGuard {
	private readonly bridge: IDeviceBridge;
	private readonly logger: Logger;
	private readonly state: SessionDeviceState;
	private target: string | null = null;
	private pending: Promise<void> | null = null;
	private stopping = false;

	constructor(options: DeviceSettingsGuardOptions) {
		this.bridge = options.bridge;
		this.logger = options.logger;
		this.state = options.state;
	}

	/**
	 * Snapshot and override the settings. Stops before the next write once
	 * `restore` has been called.
	 */
	async acquire(target: string): Promise<void> {
		this.pending = this.override(target);
		await this.pending;
	}

	private async override(target: string): Promise<void> {
		if (this.stopping) return;
		try {
			await this.bridge.shell(target, "echo ok");
		} catch (err) {
			throw new TetherlessError("unreachable", "Device not connected or in an abnormal state", {
				target,
				cause: describeError(err),
			});
		}

		this.logger.step("Saving device settings...");
		this.target = target;

		const lockscreenDisabled = await this.readSetting(target, "secure", "lockscreen.disabled");
		if (this.stopping) return;
		this.state.previousLockscreenDisabled = lockscreenDisabled;
		await this.bridge.putSetting(target, "secure", "lockscreen.disabled", "1");

		const stayAwake = await this.readSetting(target, "global", "stay_awake");
		if (this.stopping) return;
		this.state.previousStayAwake = stayAwake;
		await this.bridge.putSetting(target, "global", "stay_awake", "1");
	}

	/**
	 * Put the captured settings back and turn the screen off. Failures are
	 * logged, never thrown.
	 */
	async restore(): Promise<void> {
		this.stopping = true;
		if (this.pending) {
			try {
				await this.pending;
			} catch (err) {
				this.logger.debug(`Saving device settings did not finish: ${describeError(err)}`);
			}
		}

		const target = this.target;
		if (!target || !hasSettingsSnapshot(this.state)) {
			this.logger.debug("No device settings to restore");
			return;
		}

		this.logger.step("Restoring device settings...");
		try {
			await this.bridge.shell(target, "exit");
		} catch (err) {
			this.logger.error("Device disconnected, settings not restored");
			this.logger.debug(describeError(err));
			return;
		}

		const { previousStayAwake, previousLockscreenDisabled } = this.state;
		if (previousStayAwake !== undefined) {
			await this.attempt("restore stay_awake", () =>
				this.bridge.putSetting(target, "global", "stay_awake", previousStayAwake),
			);
		}

		await this.sleepScreen(target);
		await this.nudgeScreenOffTimeout(target);

		if (previousLockscreenDisabled !== undefined) {
			await this.attempt("restore lockscreen.disabled", () =>
				this.bridge.putSetting(target, "secure", "lockscreen.disabled", previousLockscreenDisabled),
			);
		}

		this.logger.success("Device settings restored");
	}

	private async readSetting(
		target: string,
		namespace: SettingsNamespace,
		key: string,
	): Promise<string> {
		try {
			return (await this.bridge.getSetting(target, namespace, key)) ?? FALLBACK_SETTING_VALUE;
		} catch (err) {
			this.logger.debug(`Reading ${namespace} ${key} failed: ${describeError(err)}`);
			return FALLBACK_SETTING_VALUE;
		}
	}

	private async sleepScreen(target: string): Promise<void> {
		for (const keyCode of ["KEYCODE_SLEEP", "KEYCODE_POWER"]) {
			try {
				await this.bridge.sendKeyEvent(target, keyCode);
				this.logger.debug(`Screen turned off with ${keyCode}`);
				return;
			} catch (err) {
				this.logger.debug(`${keyCode} failed: ${describeError(err)}`);
			}
		}
		this.logger.error("Failed to lock the screen");
	}

	private async nudgeScreenOffTimeout(target: string): Promise<void> {
		let timeout: string | undefined;
		try {
			timeout = await this.bridge.getSetting(target, "system", "screen_off_timeout");
		} catch (err) {
			this.logger.debug(`Reading screen_off_timeout failed: ${describeError(err)}`);
		}
		if (timeout === undefined) return;

		const original = timeout;
		await this.attempt("toggle screen_off_timeout", async () => {
			await this.bridge.putSetting(target, "system", "screen_off_timeout", TIMEOUT_NUDGE_MS);
			await this.bridge.putSetting(target, "system", "screen_off_timeout", original);
		});
	}

	private async attempt(label: string, action: () => Promise<void>): Promise<void> {
		try {
			await action();
		} catch (err) {
			this.logger.error(`Failed to ${label}: ${describeError(err)}`);
		}
	}
}
