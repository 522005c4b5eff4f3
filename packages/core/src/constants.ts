/** Port `adb tcpip` is switched to when none is given. */
export const DEFAULT_PORT = 5656;

/** Attempts made by connect-with-retry before giving up. */
export const MAX_CONNECT_ATTEMPTS = 3;

/** Pause between two connection attempts. */
export const CONNECT_RETRY_DELAY_MS = 1_000;

/** Pause after `kill-server` and after `start-server`. */
export const SERVER_RESET_DELAY_MS = 1_000;

/** Time the adb daemon on the device needs to restart in TCP/IP mode. */
export const TCPIP_SETTLE_DELAY_MS = 2_000;

/** scrcpy exit codes that end a session without an error: normal exit, no device, SIGINT. */
export const BENIGN_MIRROR_EXIT_CODES: readonly number[] = [0, 2, 130];

/** Broadcast action understood by the on-device ADB keyboard IME. */
export const TEXT_INPUT_ACTION = "ADB_INPUT_TEXT";
