#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerAuthorizeCommands } from "./commands/authorize.js";
import { registerRefreshCommand } from "./commands/refresh.js";
import { registerServeCommand } from "./commands/serve.js";
import { registerStatusCommand } from "./commands/status.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { closeLogger, getLogger } from "./logging.js";

const program = createProgram();

registerServeCommand(program);
registerRefreshCommand(program);
registerStatusCommand(program);
registerAuthorizeCommands(program);

// --config and --verbose must be applied before any command loads config
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts();
	if (typeof opts.config === "string") {
		setConfigPath(opts.config);
	}
	if (opts.verbose === true) {
		setVerbose(true);
	}
	getLogger();
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		// Commander prints some errors itself; keep this minimal.
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// pino destination keeps a handle open
		closeLogger();
	});
