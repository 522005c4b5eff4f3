import { setTimeout as delay } from "node:timers/promises";
import type { IDeviceBridge } from "@tetherless/bridge-core";
import {
	CONNECT_RETRY_DELAY_MS,
	type Logger,
	MAX_CONNECT_ATTEMPTS,
	SERVER_RESET_DELAY_MS,
	type SessionDeviceState,
	TCPIP_SETTLE_DELAY_MS,
} from "@tetherless/core";
import type { ConnectorEventBus } from "./event-bus";

export type Sleep = (ms: number) => Promise<void>;

export interface ConnectorSettings {
	maxConnectAttempts: number;
	connectRetryDelayMs: number;
	serverResetDelayMs: number;
	tcpipSettleDelayMs: number;
}

export const DEFAULT_CONNECTOR_SETTINGS: ConnectorSettings = {
	maxConnectAttempts: MAX_CONNECT_ATTEMPTS,
	connectRetryDelayMs: CONNECT_RETRY_DELAY_MS,
	serverResetDelayMs: SERVER_RESET_DELAY_MS,
	tcpipSettleDelayMs: TCPIP_SETTLE_DELAY_MS,
};

/**
 * Everything a connector operation reads or mutates, passed explicitly.
 */
export interface ConnectorContext {
	bridge: IDeviceBridge;
	logger: Logger;
	state: SessionDeviceState;
	settings: ConnectorSettings;
	events: ConnectorEventBus;
	sleep: Sleep;
}

export const defaultSleep: Sleep = async (ms) => {
	await delay(ms);
};
