/**
 * Terminal output for the operator commands.
 *
 * Progress goes to stdout, errors and debug traces to stderr. ANSI colour is
 * used only when the stream is a terminal.
 */

const ANSI = {
	reset: "\x1b[0m",
	blue: "\x1b[1;34m",
	green: "\x1b[1;32m",
	yellow: "\x1b[1;33m",
	red: "\x1b[1;31m",
	gray: "\x1b[90m",
} as const;

export interface OutputStream {
	write(chunk: string): unknown;
	isTTY?: boolean;
}

export interface Logger {
	readonly debugEnabled: boolean;
	step(message: string): void;
	success(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	debug(message: string): void;
	/** Echo an external command line (debug only). */
	command(file: string, args: readonly string[]): void;
}

export interface LoggerOptions {
	debug?: boolean;
	stdout?: OutputStream;
	stderr?: OutputStream;
	/** Force colour on or off; defaults to each stream's `isTTY`. */
	color?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const stdout = options.stdout ?? process.stdout;
	const stderr = options.stderr ?? process.stderr;
	const debugEnabled = options.debug ?? false;

	const paint = (stream: OutputStream, color: string, text: string): string => {
		const useColor = options.color ?? stream.isTTY === true;
		return useColor ? `${color}${text}${ANSI.reset}` : text;
	};

	const writeLine = (stream: OutputStream, color: string, text: string) => {
		stream.write(`${paint(stream, color, text)}\n`);
	};

	return {
		debugEnabled,
		step(message) {
			writeLine(stdout, ANSI.blue, `==> ${message}`);
		},
		success(message) {
			writeLine(stdout, ANSI.green, `[SUCCESS] ${message}`);
		},
		warn(message) {
			writeLine(stderr, ANSI.yellow, `[WARN] ${message}`);
		},
		error(message) {
			writeLine(stderr, ANSI.red, `[ERROR] ${message}`);
		},
		debug(message) {
			if (!debugEnabled) return;
			writeLine(stderr, ANSI.gray, `[DEBUG] ${message}`);
		},
		command(file, args) {
			if (!debugEnabled) return;
			writeLine(stderr, ANSI.gray, `$ ${[file, ...args].join(" ")}`);
		},
	};
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
	debugEnabled: false,
	step: () => {},
	success: () => {},
	warn: () => {},
	error: () => {},
	debug: () => {},
	command: () => {},
};
