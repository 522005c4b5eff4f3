import { type Logger, describeError, silentLogger } from "@tetherless/core";

export type Finalizer = () => Promise<void>;

/** The part of `process` the coordinator listens on. */
export interface SignalSource {
	on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
	off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface ShutdownCoordinatorOptions {
	signals?: SignalSource;
	/** Called with the exit code once a signal-triggered shutdown has finished. */
	exit?: (code: number) => void;
	logger?: Logger;
	/** Defaults to SIGINT and SIGTERM. */
	handledSignals?: readonly NodeJS.Signals[];
}

/**
 * Runs the registered finalizers at most once, whichever of normal
 * completion, a fatal error or a termination signal asks first. Later
 * callers await the same run.
 */
export class ShutdownCoordinator {
	private readonly finalizers: Finalizer[] = [];
	private readonly signals: SignalSource;
	private readonly exit: (code: number) => void;
	private readonly logger: Logger;
	private readonly handledSignals: readonly NodeJS.Signals[];
	private pending: Promise<void> | null = null;
	private listening = false;

	constructor(options: ShutdownCoordinatorOptions = {}) {
		this.signals = options.signals ?? process;
		this.exit = options.exit ?? ((code) => process.exit(code));
		this.logger = options.logger ?? silentLogger;
		this.handledSignals = options.handledSignals ?? ["SIGINT", "SIGTERM"];
	}

	get finalized(): boolean {
		return this.pending !== null;
	}

	register(finalizer: Finalizer): void {
		this.finalizers.push(finalizer);
	}

	listen(): void {
		if (this.listening) return;
		this.listening = true;
		for (const signal of this.handledSignals) {
			this.signals.on(signal, this.handleSignal);
		}
	}

	dispose(): void {
		if (!this.listening) return;
		this.listening = false;
		for (const signal of this.handledSignals) {
			this.signals.off(signal, this.handleSignal);
		}
	}

	finalize(): Promise<void> {
		if (!this.pending) {
			this.pending = this.runFinalizers();
		}
		return this.pending;
	}

	private readonly handleSignal = (signal: NodeJS.Signals): void => {
		this.logger.debug(`Received ${signal}, shutting down...`);
		void this.finalize().then(() => this.exit(0));
	};

	private async runFinalizers(): Promise<void> {
		for (const finalizer of this.finalizers) {
			try {
				await finalizer();
			} catch (err) {
				this.logger.error(`Cleanup failed: ${describeError(err)}`);
			}
		}
	}
}
