import { describeError } from "@tetherless/core";
import type { ConnectorContext } from "./context";

/**
 * Lock the screen to the requested rotation. A failure only costs the
 * rotation: it is reported as a warning.
 *
 * @returns false if a requested rotation could not be applied.
 */
export async function applyRotation(ctx: ConnectorContext, target: string): Promise<boolean> {
	const { rotation } = ctx.state;
	if (rotation === undefined) return true;

	ctx.logger.step(`Setting screen rotation: ${rotation}`);
	try {
		await ctx.bridge.putSetting(target, "system", "accelerometer_rotation", "0");
		await ctx.bridge.putSetting(target, "system", "user_rotation", String(rotation));
	} catch (err) {
		ctx.logger.warn(`Unable to set the screen rotation, using the default orientation (${describeError(err)})`);
		return false;
	}

	ctx.logger.success("Screen rotation set");
	return true;
}
