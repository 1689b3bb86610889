/**
 * html-search — Command-line arguments
 *
 *   html-search <query> [files...] [--max-results <n>] [--verbose] [-h|--help]
 *
 * Options may appear in any position. With no files the input is read from
 * standard input. `-h` / `--help` anywhere short-circuits to the usage text.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { SearchedFiles } from './files.ts';
import { failure, success } from './result.ts';
import type { Result } from './result.ts';

/** A search to run. The query is still unparsed text. */
export interface SearchArgs {
	readonly kind: 'search';
	readonly query: string;
	readonly files: SearchedFiles;
	/** Limit on the combined number of printed matches. */
	readonly maxResults?: number;
	readonly verbose: boolean;
}

/** `-h` / `--help` was given. */
export interface HelpArgs {
	readonly kind: 'help';
	readonly usage: string;
}

export type Args = SearchArgs | HelpArgs;

/** Arguments commander rejected; `code` is commander's error code. */
export class ArgsError extends Error {
	readonly code: string;

	constructor(message: string, code: string) {
		super(message);
		this.name = 'ArgsError';
		this.code = code;
	}
}

type ProgramOptions = {
	maxResults?: number;
	verbose?: boolean;
};

function parseMaxResults(value: string): number {
	if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Expected a non-negative integer.');
	return Number(value);
}

function createProgram(progName: string): Command {
	return new Command()
		.name(progName)
		.usage('query [files...]')
		.description('Print the fragments of HTML documents that match a selector query.')
		.argument('<query>', 'selector query, e.g. "div > h1.title"')
		.argument('[files...]', 'HTML files to search (standard input when omitted)')
		.option('--max-results <n>', 'print at most n matches across all files', parseMaxResults)
		.option('--verbose', 'log diagnostics to stderr')
		.helpOption('-h, --help', 'display this usage message')
		.exitOverride()
		.configureOutput({
			writeOut: () => undefined,
			writeErr: () => undefined,
		});
}

/** The usage text printed for `--help`. */
export function usage(progName: string): string {
	return createProgram(progName).helpInformation();
}

/**
 * Parses `argv` (without the node and script entries).
 *
 * @param progName name shown in the usage text
 */
export function parseArgs(progName: string, argv: ReadonlyArray<string>): Result<Args, ArgsError> {
	if (argv.includes('-h') || argv.includes('--help')) {
		const help: HelpArgs = { kind: 'help', usage: usage(progName) };
		return success(help);
	}

	const program = createProgram(progName);
	try {
		program.parse([...argv], { from: 'user' });
	} catch (err) {
		if (err instanceof CommanderError) return failure(new ArgsError(err.message, err.code));
		throw err;
	}

	const [query, ...files] = program.args;
	if (query === undefined) return failure(new ArgsError("error: missing required argument 'query'", 'commander.missingArgument'));

	const { maxResults, verbose } = program.opts<ProgramOptions>();
	const args: SearchArgs = {
		kind: 'search',
		query,
		files: files.length > 0 ? files : 'stdin',
		maxResults,
		verbose: verbose ?? false,
	};
	return success(args);
}
