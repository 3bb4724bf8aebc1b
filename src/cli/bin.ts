#!/usr/bin/env node
import { runCli } from './main.js';

runCli(process.argv.slice(2), {
	env: process.env,
	stdin: process.stdin,
	stdout: process.stdout,
	stderr: process.stderr,
})
	.then((code) => {
		process.exitCode = code;
	})
	.catch((err: unknown) => {
		console.error('Fatal error:', err);
		process.exitCode = 1;
	});
