export { AdbBridge, AdbCommandError } from "./android-bridge";
export type { AdbBridgeOptions } from "./android-bridge";
export { createExecFileRunner } from "./exec-runner";
