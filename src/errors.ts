/**
 * html-search — Error types
 *
 * All of these are returned inside a `Result` failure; none is thrown out of
 * the public API.
 */

/**
 * Input text (HTML or a query) that could not be parsed.
 *
 * `position` is the offset into the source where the problem was detected;
 * `line` and `column` are 1-based.
 */
export class ParseError extends Error {
	readonly position: number;
	readonly line: number;
	readonly column: number;
	/** What the parser was looking for at `position`. */
	readonly expected: string;
	/** Up to 20 characters of the input starting at `position`. */
	readonly found: string;

	constructor(expected: string, found: string, position: number, line: number, column: number) {
		super(`Expected ${expected} but found ${found.length > 0 ? JSON.stringify(found) : 'end of input'} (line ${line}, col ${column})`);
		this.name = 'ParseError';
		this.expected = expected;
		this.found = found;
		this.position = position;
		this.line = line;
		this.column = column;
	}

	/** Builds an error for `src` at `pos`, computing line and column. */
	static at(src: string, pos: number, expected: string): ParseError {
		let line = 1;
		let col = 1;
		for (let i = 0; i < pos && i < src.length; i++) {
			if (src.charCodeAt(i) === 0x0a) {
				line++;
				col = 1;
			} else {
				col++;
			}
		}
		return new ParseError(expected, src.slice(pos, pos + 20), pos, line, col);
	}
}

/** A file named on the command line does not exist. */
export class FileNotFoundError extends Error {
	readonly path: string;

	constructor(path: string) {
		super(`File not found: ${path}`);
		this.name = 'FileNotFoundError';
		this.path = path;
	}
}

/** A file was read but its contents are not valid HTML. */
export class DocumentParseError extends Error {
	readonly path: string;
	override readonly cause: ParseError;

	constructor(path: string, cause: ParseError) {
		super(`Failed to parse ${path}: ${cause.message}`);
		this.name = 'DocumentParseError';
		this.path = path;
		this.cause = cause;
	}
}

/** Anything that stops a search before the engine runs. */
export type SearchError = FileNotFoundError | DocumentParseError;
