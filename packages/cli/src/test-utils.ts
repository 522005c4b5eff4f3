import type { CommandResult } from "@tetherless/bridge-core";
import type { OutputStream } from "@tetherless/core";

export function captureStream(): OutputStream & { text(): string } {
	const chunks: string[] = [];
	return {
		write(chunk: string) {
			chunks.push(chunk);
		},
		text: () => chunks.join(""),
	};
}

export function ok(stdout = ""): CommandResult {
	return { stdout, stderr: "", exitCode: 0 };
}

export function devicesOutput(...lines: string[]): CommandResult {
	return ok(["List of devices attached", ...lines, ""].join("\n"));
}
