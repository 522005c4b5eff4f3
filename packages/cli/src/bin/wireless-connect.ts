#!/usr/bin/env tsx
import { createWirelessConnectProgram, runWirelessConnect } from "../wireless-connect";

const program = createWirelessConnectProgram(async (options) => {
	process.exit(await runWirelessConnect(options));
});

await program.parseAsync(process.argv);
