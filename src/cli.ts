#!/usr/bin/env node
import { runCli } from "./command.js";
import { createLineReader } from "./util/prompt.js";

async function main(): Promise<void> {
	const reader = createLineReader(process.stdin, process.stdout);
	try {
		process.exitCode = await runCli(process.argv.slice(2), {
			out: (line) => console.log(line),
			err: (line) => console.error(line),
			ask: reader.ask,
		});
	} finally {
		reader.close();
	}
}

main().catch((error: unknown) => {
	console.error(error);
	process.exit(1);
});
