import { z } from "zod";

export const RotationSchema = z.union([z.literal(0), z.literal(1), z.literal(3)]);
export type Rotation = z.infer<typeof RotationSchema>;

export const ConnectionModeSchema = z.enum(["usb", "wireless"]);
export type ConnectionMode = z.infer<typeof ConnectionModeSchema>;

export const ConnectorStateSchema = z.enum([
	"init",
	"usb-detect",
	"wifi-check",
	"ip-discovery",
	"tcpip-enable",
	"wireless-connect-retry",
	"connected",
	"mirroring",
	"restoring",
	"terminated",
]);
export type ConnectorState = z.infer<typeof ConnectorStateSchema>;
