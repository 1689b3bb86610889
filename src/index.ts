/**
 * html-search
 *
 * Searches HTML documents for the fragments matching a CSS-like selector
 * query: `div > h1.title`, `#main a[rel=next]`, `header, footer`.
 *
 * Quick start
 * ───────────
 * ```ts
 * import { parseHtml, parseQuery, search, serialize } from 'html-search';
 *
 * const doc = parseHtml('<div><h1 class="title">Hi</h1></div>');
 * const query = parseQuery('div > h1.title');
 * if (doc.ok && query.ok) {
 *   search(query.value, doc.value).map(serialize);
 *   // ['<h1 class="title">Hi</h1>']
 * }
 * ```
 */

// Tree and query types, constructors and guards
export type {
	NodeType,
	Attribute,
	Text,
	Element,
	HtmlNode,
	Document,
	QuerySelector,
	SelectorQuery,
	DescendantQuery,
	ChildQuery,
	UnionQuery,
	Query,
} from './types.ts';

export { isElement, isText, selector, descendant, child, union, requiredAttributes } from './types.ts';

// Results and errors
export type { Result, Success, Failure } from './result.ts';
export { success, failure } from './result.ts';
export type { SearchError } from './errors.ts';
export { ParseError, FileNotFoundError, DocumentParseError } from './errors.ts';

// Parsers and serializer
export { parseHtml, isVoidElement, isRawTextElement } from './parser.ts';
export { parseQuery, formatQuery } from './query.ts';
export { serialize } from './serialize.ts';

// Match engine
export type { FileMatch, ParsedFile } from './search.ts';
export { matches, search, searchNode, searchNodes, searchFiles, limitResults } from './search.ts';

// Inputs and command line
export type { SearchedFiles, FileContent, ContentSource } from './files.ts';
export { readContents, parseContents, loadDocuments, nodeContentSource, STDIN_PATH } from './files.ts';
export type { Args, SearchArgs, HelpArgs } from './args.ts';
export { parseArgs, usage, ArgsError } from './args.ts';
export type { Host, Output } from './app.ts';
export { main, formatMatch } from './app.ts';
export type { Logger, LoggerOptions } from './logger.ts';
export { createLogger, resolveLogLevel, LOG_LEVEL_ENV } from './logger.ts';
