import { z } from "zod";
import { DEFAULT_PORT } from "../constants";
import { PortSchema } from "./device-state";
import { RotationSchema } from "./enums";

const ToolPathSchema = z.string().trim().min(1);

/** Raw commander values for `wireless-connect`; every value arrives as a string. */
export const WirelessConnectOptionsSchema = z.object({
	ip: z.string().trim().ip({ version: "v4", message: "Expected an IPv4 address" }).optional(),
	port: z.coerce.number().pipe(PortSchema).default(DEFAULT_PORT),
	rotation: z
		.enum(["0", "1", "3"], {
			errorMap: () => ({
				message: "Rotation must be 0 (portrait), 1 (landscape right) or 3 (landscape left)",
			}),
		})
		.transform(Number)
		.pipe(RotationSchema)
		.optional(),
	usb: z.boolean().default(false),
	debug: z.boolean().default(false),
	adb: ToolPathSchema.optional(),
	scrcpy: ToolPathSchema.optional(),
});

export type WirelessConnectOptions = z.infer<typeof WirelessConnectOptionsSchema>;

export const SendTextOptionsSchema = z.object({
	text: z.string(),
	debug: z.boolean().default(false),
	adb: ToolPathSchema.optional(),
});

export type SendTextOptions = z.infer<typeof SendTextOptionsSchema>;
