import type { ConnectorState } from "@tetherless/core";
import type { ConnectorEventBus } from "./event-bus";

/** Every state except the last two may abort into `restoring`. */
const TRANSITIONS: Record<ConnectorState, readonly ConnectorState[]> = {
	init: ["usb-detect", "wireless-connect-retry", "connected", "restoring"],
	"usb-detect": ["wifi-check", "connected", "restoring"],
	"wifi-check": ["ip-discovery", "restoring"],
	"ip-discovery": ["tcpip-enable", "restoring"],
	"tcpip-enable": ["wireless-connect-retry", "restoring"],
	"wireless-connect-retry": ["connected", "usb-detect", "restoring"],
	connected: ["mirroring", "restoring"],
	mirroring: ["restoring"],
	restoring: ["terminated"],
	terminated: [],
};

export function canTransition(from: ConnectorState, to: ConnectorState): boolean {
	return TRANSITIONS[from].includes(to);
}

export class ConnectionStateMachine {
	private state: ConnectorState = "init";
	private readonly events: ConnectorEventBus;

	constructor(events: ConnectorEventBus) {
		this.events = events;
	}

	get current(): ConnectorState {
		return this.state;
	}

	/**
	 * Move to `to` and publish a `state.changed` event.
	 * @throws Error if the transition is not allowed from the current state.
	 */
	transition(to: ConnectorState): void {
		const from = this.state;
		if (!canTransition(from, to)) {
			throw new Error(`Illegal connector transition: ${from} -> ${to}`);
		}
		this.state = to;
		this.events.publish({ type: "state.changed", from, to });
	}
}
