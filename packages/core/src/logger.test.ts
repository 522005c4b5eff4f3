import { describe, expect, it } from "vitest";
import { type OutputStream, createLogger } from "./logger";

function captureStream(isTTY = false): OutputStream & { lines: string[] } {
	const lines: string[] = [];
	return {
		lines,
		isTTY,
		write(chunk: string) {
			lines.push(chunk);
		},
	};
}

describe("createLogger", () => {
	it("writes progress to stdout and errors to stderr", () => {
		const stdout = captureStream();
		const stderr = captureStream();
		const logger = createLogger({ stdout, stderr });

		logger.step("Enabling TCP/IP mode...");
		logger.success("Connected");
		logger.warn("Rotation failed");
		logger.error("No device");

		expect(stdout.lines).toEqual(["==> Enabling TCP/IP mode...\n", "[SUCCESS] Connected\n"]);
		expect(stderr.lines).toEqual(["[WARN] Rotation failed\n", "[ERROR] No device\n"]);
	});

	it("drops debug output unless debug is enabled", () => {
		const stderr = captureStream();
		const quiet = createLogger({ stdout: captureStream(), stderr });
		quiet.debug("hidden");
		quiet.command("adb", ["devices"]);
		expect(stderr.lines).toEqual([]);

		const verbose = createLogger({ stdout: captureStream(), stderr, debug: true });
		verbose.debug("shown");
		verbose.command("adb", ["-s", "R58M123ABC", "shell", "echo ok"]);
		expect(stderr.lines).toEqual(["[DEBUG] shown\n", "$ adb -s R58M123ABC shell echo ok\n"]);
		expect(verbose.debugEnabled).toBe(true);
	});

	it("colours output only on a terminal", () => {
		const stdout = captureStream(true);
		createLogger({ stdout, stderr: captureStream() }).step("hi");
		expect(stdout.lines).toEqual(["\x1b[1;34m==> hi\x1b[0m\n"]);
	});

	it("lets the caller force colour off", () => {
		const stdout = captureStream(true);
		createLogger({ stdout, stderr: captureStream(), color: false }).success("done");
		expect(stdout.lines).toEqual(["[SUCCESS] done\n"]);
	});
});
