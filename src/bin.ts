#!/usr/bin/env node
import { main } from "./cli";

main(process.argv).catch((error: unknown) => {
	console.error(error);
	process.exitCode = 1;
});
