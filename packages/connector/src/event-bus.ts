import { EventEmitter } from "node:events";
import type { ConnectorState } from "@tetherless/core";

export type ConnectorEvent =
	| { type: "state.changed"; from: ConnectorState; to: ConnectorState }
	| {
			type: "connect.attempt";
			target: string;
			attempt: number;
			maxAttempts: number;
			success: boolean;
	  }
	| { type: "mirror.exited"; target: string; exitCode: number; abnormal: boolean };

export type BusEvent = ConnectorEvent & {
	timestamp: string;
	sequence: number;
};

/** Maximum number of events to retain for inspection. */
const DEFAULT_MAX_EVENTS = 200;

export class ConnectorEventBus extends EventEmitter {
	private sequenceCounter = 0;
	private readonly eventLog: BusEvent[] = [];
	private readonly maxEvents: number;

	constructor(options?: { maxEvents?: number }) {
		super();
		this.maxEvents = options?.maxEvents ?? DEFAULT_MAX_EVENTS;
	}

	publish(event: ConnectorEvent): void {
		const busEvent: BusEvent = {
			...event,
			timestamp: new Date().toISOString(),
			sequence: ++this.sequenceCounter,
		};

		this.eventLog.push(busEvent);
		if (this.eventLog.length > this.maxEvents) {
			this.eventLog.shift();
		}

		this.emit("event", busEvent);
	}

	onEvent(handler: (event: BusEvent) => void): void {
		this.on("event", handler);
	}

	/** Retained events, oldest first. */
	history(): readonly BusEvent[] {
		return this.eventLog;
	}
}
