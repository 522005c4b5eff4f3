/**
 * Failure categories shared by both commands. Every kind is fatal for the
 * command that raises it; tolerated failures never become a TetherlessError.
 */
export type TetherlessErrorKind =
	| "missing-prerequisite"
	| "command-failed"
	| "unreachable"
	| "invalid-option";

export class TetherlessError extends Error {
	readonly kind: TetherlessErrorKind;
	readonly details: Record<string, unknown>;

	constructor(kind: TetherlessErrorKind, message: string, details: Record<string, unknown> = {}) {
		super(message);
		this.name = "TetherlessError";
		this.kind = kind;
		this.details = details;
	}
}

export function isTetherlessError(err: unknown): err is TetherlessError {
	return err instanceof TetherlessError;
}

/** Message of any thrown value, for log lines. */
export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
