#!/usr/bin/env tsx
import { createSendTextProgram, runSendText } from "../send-text";

const program = createSendTextProgram(async (options) => {
	process.exit(await runSendText(options));
});

await program.parseAsync(process.argv);
