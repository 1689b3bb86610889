/**
 * html-search — Loading inputs
 *
 * Reads the searched sources and parses them, stopping at the first failure
 * in input order. Nothing after a missing or malformed file is read or
 * parsed, and no partial list is returned.
 */

import { readFile, stat } from 'node:fs/promises';
import { DocumentParseError, FileNotFoundError } from './errors.ts';
import type { SearchError } from './errors.ts';
import type { Logger } from './logger.ts';
import { parseHtml } from './parser.ts';
import { failure, success } from './result.ts';
import type { Result } from './result.ts';
import type { ParsedFile } from './search.ts';

/** Where the inputs come from: a list of paths, or standard input. */
export type SearchedFiles = 'stdin' | ReadonlyArray<string>;

/** Path reported for matches read from standard input. */
export const STDIN_PATH = 'stdin';

export interface FileContent {
	readonly path: string;
	readonly content: string;
}

/** Access to file contents. Production uses {@link nodeContentSource}. */
export interface ContentSource {
	exists(path: string): Promise<boolean>;
	readFile(path: string): Promise<string>;
	readStdin(): Promise<string>;
}

export const nodeContentSource: ContentSource = {
	async exists(path) {
		try {
			return (await stat(path)).isFile();
		} catch (err) {
			if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return false;
			throw err;
		}
	},
	readFile(path) {
		return readFile(path, 'utf8');
	},
	async readStdin() {
		const chunks: Buffer[] = [];
		for await (const chunk of process.stdin) {
			chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
		}
		return Buffer.concat(chunks).toString('utf8');
	},
};

/**
 * Reads every searched source in order. The first path that does not exist
 * ends the read with a {@link FileNotFoundError}.
 */
export async function readContents(files: SearchedFiles, source: ContentSource, logger?: Logger): Promise<Result<FileContent[], FileNotFoundError>> {
	if (files === 'stdin') {
		logger?.debug('reading standard input');
		return success([{ path: STDIN_PATH, content: await source.readStdin() }]);
	}

	const contents: FileContent[] = [];
	for (const path of files) {
		if (!(await source.exists(path))) return failure(new FileNotFoundError(path));
		const content = await source.readFile(path);
		logger?.debug('read file', { path, length: content.length });
		contents.push({ path, content });
	}
	return success(contents);
}

/**
 * Parses each source in order. The first one that is not valid HTML ends
 * parsing with a {@link DocumentParseError} naming its path.
 */
export function parseContents(contents: ReadonlyArray<FileContent>): Result<ParsedFile[], DocumentParseError> {
	const parsed: ParsedFile[] = [];
	for (const { path, content } of contents) {
		const result = parseHtml(content);
		if (!result.ok) return failure(new DocumentParseError(path, result.error));
		parsed.push({ path, document: result.value });
	}
	return success(parsed);
}

/** {@link readContents} followed by {@link parseContents}. */
export async function loadDocuments(files: SearchedFiles, source: ContentSource, logger?: Logger): Promise<Result<ParsedFile[], SearchError>> {
	const contents = await readContents(files, source, logger);
	if (!contents.ok) return contents;
	return parseContents(contents.value);
}
