#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerRelayCommand } from "./commands/relay.js";
import { registerSendCommand } from "./commands/send.js";
import { registerStatusCommand } from "./commands/status.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { closeLogger, getLogger } from "./logging.js";

const program = createProgram();

registerRelayCommand(program);
registerSendCommand(program);
registerStatusCommand(program);

// --config and --verbose must be applied before any command loads config
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts();
	if (typeof opts.config === "string") {
		setConfigPath(opts.config);
	}
	if (opts.verbose) {
		setVerbose(true);
	}
	getLogger();
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// pino's file destination keeps a handle open
		closeLogger();
	});
