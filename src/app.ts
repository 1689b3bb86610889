/**
 * html-search — Application pipeline
 *
 *   argv → parseArgs → parseQuery → loadDocuments → searchFiles → limitResults → stdout
 *
 * Each stage stops the run on its first failure: the error goes to stderr,
 * nothing is written to stdout and the exit code is 1. The host (streams,
 * file access, environment) is injected so the whole pipeline runs in
 * process under test.
 */

import type { ChalkInstance } from 'chalk';
import { parseArgs } from './args.ts';
import { loadDocuments } from './files.ts';
import type { ContentSource } from './files.ts';
import { createLogger, resolveLogLevel } from './logger.ts';
import type { Logger } from './logger.ts';
import { formatQuery, parseQuery } from './query.ts';
import { limitResults, searchFiles } from './search.ts';
import type { FileMatch } from './search.ts';
import { serialize } from './serialize.ts';

export interface Output {
	write(chunk: string): unknown;
}

export interface Host {
	readonly source: ContentSource;
	readonly stdout: Output;
	readonly stderr: Output;
	readonly env: NodeJS.ProcessEnv;
	/** Colour support of each stream. */
	readonly colors: { readonly stdout: ChalkInstance; readonly stderr: ChalkInstance };
	/** Replaces the logger built from `--verbose` and the environment. */
	readonly logger?: Logger;
}

/** One printed match: the path, the matched HTML, then a blank line. */
export function formatMatch({ path, node }: FileMatch, paint: ChalkInstance): string {
	return `${paint.cyan(path)}\n${serialize(node)}\n\n`;
}

/**
 * Runs one invocation and resolves to the process exit code.
 *
 * @param progName name shown in the usage text
 * @param argv arguments after the script name
 */
export async function main(progName: string, argv: ReadonlyArray<string>, host: Host): Promise<number> {
	const fail = (message: string): number => {
		host.stderr.write(`${host.colors.stderr.red(message)}\n`);
		return 1;
	};

	const args = parseArgs(progName, argv);
	if (!args.ok) return fail(`${args.error.message}\nRun "${progName} --help" for usage.`);
	if (args.value.kind === 'help') {
		host.stdout.write(args.value.usage);
		return 0;
	}

	const { query: queryText, files, maxResults, verbose } = args.value;
	const logger = host.logger ?? createLogger({ level: resolveLogLevel(verbose, host.env) });

	const query = parseQuery(queryText);
	if (!query.ok) return fail(`Invalid query ${JSON.stringify(queryText)}: ${query.error.message}`);
	logger.debug('parsed query', { query: formatQuery(query.value) });

	const documents = await loadDocuments(files, host.source, logger);
	if (!documents.ok) return fail(documents.error.message);

	const matches = searchFiles(query.value, documents.value);
	const shown = limitResults(matches, maxResults);
	logger.debug('search complete', { files: documents.value.length, matches: matches.length, shown: shown.length });

	for (const match of shown) {
		host.stdout.write(formatMatch(match, host.colors.stdout));
	}
	return 0;
}
