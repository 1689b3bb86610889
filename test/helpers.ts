/**
 * Test helpers — strict wrappers that throw instead of returning a failure
 * (tests always expect valid input), plus in-process stand-ins for the
 * file system, output streams and logger.
 */
import { Chalk } from 'chalk';
import { parseHtml } from '../src/parser.ts';
import { parseQuery } from '../src/query.ts';
import { createLogger } from '../src/logger.ts';
import type { ContentSource } from '../src/files.ts';
import type { Host } from '../src/app.ts';
import type { Document, Element, HtmlNode, Query } from '../src/types.ts';

/** Parses HTML, throwing if it is invalid. */
export function html(source: string): Document {
	const result = parseHtml(source);
	if (!result.ok) throw result.error;
	return result.value;
}

/** Parses a query, throwing if it is invalid. */
export function query(source: string): Query {
	const result = parseQuery(source);
	if (!result.ok) throw result.error;
	return result.value;
}

/** The first top-level element of `doc`. */
export function firstElement(doc: Document): Element {
	const el = doc.children.find((n): n is Element => n.type === 'element');
	if (el === undefined) throw new Error('Document has no element');
	return el;
}

/** Concatenated text of a node and its descendants. */
export function textContent(node: HtmlNode): string {
	return node.type === 'text' ? node.value : node.children.map(textContent).join('');
}

/** A `ContentSource` over a fixed map of files; records every read. */
export class MemorySource implements ContentSource {
	readonly reads: string[] = [];
	private readonly files: ReadonlyMap<string, string>;
	private readonly stdin: string;

	constructor(files: Record<string, string>, stdin = '') {
		this.files = new Map(Object.entries(files));
		this.stdin = stdin;
	}

	async exists(path: string): Promise<boolean> {
		return this.files.has(path);
	}

	async readFile(path: string): Promise<string> {
		const content = this.files.get(path);
		if (content === undefined) throw new Error(`no such file: ${path}`);
		this.reads.push(path);
		return content;
	}

	async readStdin(): Promise<string> {
		this.reads.push('<stdin>');
		return this.stdin;
	}
}

/** Collects everything written to it. */
export class StringOutput {
	text = '';

	write(chunk: string): boolean {
		this.text += chunk;
		return true;
	}
}

export const silentLogger = createLogger({ silent: true });

/** A host with colourless output, a silent logger and the given files. */
export function memoryHost(files: Record<string, string>, stdin = ''): Host & { stdout: StringOutput; stderr: StringOutput; source: MemorySource } {
	const plain = new Chalk({ level: 0 });
	return {
		source: new MemorySource(files, stdin),
		stdout: new StringOutput(),
		stderr: new StringOutput(),
		env: {},
		colors: { stdout: plain, stderr: plain },
		logger: silentLogger,
	};
}
