import type { IDeviceBridge } from "@tetherless/bridge-core";
import {
	type ConnectorState,
	type Logger,
	type SessionDeviceState,
	TetherlessError,
	describeError,
	getTargetSerial,
	isTetherlessError,
} from "@tetherless/core";
import {
	type ConnectorContext,
	type ConnectorSettings,
	DEFAULT_CONNECTOR_SETTINGS,
	type Sleep,
	defaultSleep,
} from "./context";
import { DeviceSettingsGuard } from "./device-settings";
import { ConnectorEventBus } from "./event-bus";
import { applyRotation } from "./rotation";
import type { ScrcpySession } from "./scrcpy-session";
import { ShutdownCoordinator } from "./shutdown";
import { ConnectionStateMachine } from "./state-machine";
import { connectWithRetry, detectWirelessDevice, enableTcpip } from "./transport";
import { discoverUsbDevice } from "./usb-discovery";
import { checkWifiStatus, discoverDeviceIp } from "./wifi";

class SessionInterruptedError extends Error {
	constructor() {
		super("Session interrupted by shutdown");
		this.name = "SessionInterruptedError";
	}
}

export interface WirelessConnectorOptions {
	bridge: IDeviceBridge;
	session: Pick<ScrcpySession, "isAvailable" | "run">;
	logger: Logger;
	state: SessionDeviceState;
	shutdown?: ShutdownCoordinator;
	settings?: Partial<ConnectorSettings>;
	events?: ConnectorEventBus;
	sleep?: Sleep;
}

/**
 * Resolves a device target (existing wireless link, explicit IP, or USB
 * device switched to TCP/IP), mirrors it, and restores the device settings
 * on every way out.
 */
export class WirelessConnector {
	readonly events: ConnectorEventBus;
	readonly machine: ConnectionStateMachine;
	private readonly ctx: ConnectorContext;
	private readonly session: Pick<ScrcpySession, "isAvailable" | "run">;
	private readonly shutdown: ShutdownCoordinator;
	private readonly guard: DeviceSettingsGuard;

	constructor(options: WirelessConnectorOptions) {
		this.events = options.events ?? new ConnectorEventBus();
		this.machine = new ConnectionStateMachine(this.events);
		this.session = options.session;
		this.shutdown = options.shutdown ?? new ShutdownCoordinator({ logger: options.logger });
		this.ctx = {
			bridge: options.bridge,
			logger: options.logger,
			state: options.state,
			settings: { ...DEFAULT_CONNECTOR_SETTINGS, ...options.settings },
			events: this.events,
			sleep: options.sleep ?? defaultSleep,
		};
		this.guard = new DeviceSettingsGuard(this.ctx);

		this.events.onEvent((event) => {
			if (event.type === "state.changed") {
				options.logger.debug(`State: ${event.from} -> ${event.to}`);
			}
		});
	}

	get state(): SessionDeviceState {
		return this.ctx.state;
	}

	/**
	 * Run the whole session.
	 *
	 * @returns The process exit code: 0 on success, 1 on any fatal failure.
	 */
	async run(): Promise<number> {
		const { logger, state } = this.ctx;
		this.shutdown.register(() => this.teardown());
		this.shutdown.listen();

		let exitCode = 0;
		try {
			logger.debug(
				`Options: ip=${state.deviceIp ?? "auto"} port=${state.port} rotation=${state.rotation ?? "unset"} mode=${state.mode}`,
			);
			await this.checkEnvironment();
			await this.resolveTarget();
			const target = getTargetSerial(state);
			if (!target) {
				throw new TetherlessError("unreachable", "No device to mirror");
			}
			this.transition("connected");
			await this.mirror(target);
		} catch (err) {
			if (this.shutdown.finalized) {
				// Interrupted by a signal; the session is already being torn down.
				logger.debug(`Stopped after shutdown: ${describeError(err)}`);
			} else {
				logger.error(isTetherlessError(err) ? err.message : `Unexpected error: ${describeError(err)}`);
				exitCode = 1;
			}
		} finally {
			await this.shutdown.finalize();
			this.shutdown.dispose();
		}
		return exitCode;
	}

	private async checkEnvironment(): Promise<void> {
		const missing: string[] = [];
		if (!(await this.ctx.bridge.isAvailable())) missing.push("adb");
		if (!(await this.session.isAvailable())) missing.push("scrcpy");
		if (missing.length > 0) {
			throw new TetherlessError(
				"missing-prerequisite",
				`Required programs not found: ${missing.join(", ")}\nInstall them, or point --adb/--scrcpy (or TETHERLESS_ADB/TETHERLESS_SCRCPY) at them`,
				{ missing },
			);
		}
	}

	/**
	 * Fill in the session state until a target is known: the USB serial in
	 * USB mode, otherwise the wireless address.
	 */
	private async resolveTarget(): Promise<void> {
		const { ctx } = this;
		const { state, logger } = ctx;

		if (state.mode === "usb") {
			logger.step("Mirroring over USB only");
			this.transition("usb-detect");
			state.deviceId = await discoverUsbDevice(ctx);
			return;
		}

		const requestedIp = state.deviceIp;
		const wireless = await detectWirelessDevice(ctx);
		if (wireless) {
			logger.step(`Found connected wireless device: ${wireless.host}:${wireless.port}`);
			if (requestedIp && requestedIp !== wireless.host) {
				this.transition("wireless-connect-retry");
				if (!(await connectWithRetry(ctx, requestedIp, state.port))) {
					throw new TetherlessError("unreachable", `Unable to connect to ${requestedIp}:${state.port}`);
				}
				return;
			}
			state.deviceIp = wireless.host;
			state.port = wireless.port;
			return;
		}

		if (requestedIp) {
			this.transition("wireless-connect-retry");
			if (await connectWithRetry(ctx, requestedIp, state.port)) return;
			logger.step("Falling back to USB...");
		}

		this.transition("usb-detect");
		state.deviceId = await discoverUsbDevice(ctx);

		this.transition("wifi-check");
		await checkWifiStatus(ctx, state.deviceId);

		this.transition("ip-discovery");
		const ip = await discoverDeviceIp(ctx, state.deviceId);
		if (!ip) {
			throw new TetherlessError("unreachable", "Unable to obtain the device IP address, check the WiFi connection");
		}
		state.deviceIp = ip;
		logger.success(`Device IP: ${ip}`);

		this.transition("tcpip-enable");
		await enableTcpip(ctx, state.deviceId, state.port);

		this.transition("wireless-connect-retry");
		if (!(await connectWithRetry(ctx, ip, state.port))) {
			throw new TetherlessError("unreachable", "Unable to establish a wireless connection");
		}
	}

	private async mirror(target: string): Promise<void> {
		this.transition("mirroring");
		this.ctx.logger.debug(`Target: ${target}`);

		await this.guard.acquire(target);
		this.checkpoint();
		await applyRotation(this.ctx, target);

		this.checkpoint();
		const outcome = await this.session.run(target);
		this.events.publish({ type: "mirror.exited", target, ...outcome });
	}

	private transition(to: ConnectorState): void {
		this.checkpoint();
		this.machine.transition(to);
	}

	/** Stop the main flow once a signal has started the shutdown. */
	private checkpoint(): void {
		if (this.shutdown.finalized) {
			throw new SessionInterruptedError();
		}
	}

	private async teardown(): Promise<void> {
		this.machine.transition("restoring");
		await this.guard.restore();
		this.machine.transition("terminated");
	}
}
