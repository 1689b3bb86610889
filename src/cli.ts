/**
 * html-search — process entry point
 */

import chalk, { chalkStderr } from 'chalk';
import { main } from './app.ts';
import { nodeContentSource } from './files.ts';

const PROG_NAME = 'html-search';

process.exitCode = await main(PROG_NAME, process.argv.slice(2), {
	source: nodeContentSource,
	stdout: process.stdout,
	stderr: process.stderr,
	env: process.env,
	colors: { stdout: chalk, stderr: chalkStderr },
});
