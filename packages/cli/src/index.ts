export { createSendTextProgram, runSendText } from "./send-text";
export { createWirelessConnectProgram, runWirelessConnect } from "./wireless-connect";
export type { WirelessConnectEnvironment } from "./wireless-connect";
export { runTextSender } from "./text-sender";
export type { TextSenderOptions } from "./text-sender";
export { parseOptions, VERSION } from "./options";
export type { CommandEnvironment } from "./options";
