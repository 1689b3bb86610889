/**
 * html-search — Query language
 *
 * Parses selector text into the `Query` AST and renders it back.
 *
 * Grammar
 * ───────
 *   list      := complex ( ',' complex )*
 *   complex   := compound ( ( '>' | whitespace ) compound )*
 *   compound  := ( '*' | ident )? ( '#' ident | '.' ident | '[' ident '=' value ']' )*
 *   value     := ident | '"' … '"' | "'" … "'"
 *
 * `,` binds loosest, then `>` and whitespace; both are left-associative, so
 * `a b > c` is `child(descendant(a, b), c)`. A compound may not be empty;
 * `*` on its own is the selector that matches every element.
 */

import { isIdentChar, isWhitespace } from './chars.ts';
import { ParseError } from './errors.ts';
import { failure, success } from './result.ts';
import type { Result } from './result.ts';
import { child, descendant, union } from './types.ts';
import type { Attribute, Query, QuerySelector } from './types.ts';

class QueryParser {
	private readonly src: string;
	private pos = 0;

	constructor(src: string) {
		this.src = src;
	}

	parse(): Query {
		this.skipWhitespace();
		let query = this.parseComplex();

		while (this.current() === ',') {
			this.advance();
			this.skipWhitespace();
			query = union(query, this.parseComplex());
		}

		if (this.pos < this.src.length) throw this.error('",", ">" or a selector');
		return query;
	}

	// -------------------------------------------------------------------------
	// Combinators
	// -------------------------------------------------------------------------

	/** Parses compounds joined by `>` or whitespace; leaves trailing space consumed. */
	private parseComplex(): Query {
		let query: Query = this.parseCompound();

		for (;;) {
			const spaced = this.skipWhitespace();
			if (this.current() === '>') {
				this.advance();
				this.skipWhitespace();
				query = child(query, this.parseCompound());
			} else if (spaced && this.atCompoundStart()) {
				query = descendant(query, this.parseCompound());
			} else {
				return query;
			}
		}
	}

	// -------------------------------------------------------------------------
	// Compound selector
	// -------------------------------------------------------------------------

	private parseCompound(): Query {
		const start = this.pos;
		let tag: string | null = null;
		const ids: string[] = [];
		const classes: string[] = [];
		const attributes: Attribute[] = [];

		if (this.current() === '*') {
			this.advance();
		} else if (isIdentChar(this.src.charCodeAt(this.pos))) {
			tag = this.parseIdent('a tag name');
		}

		for (;;) {
			const ch = this.current();
			if (ch === '#') {
				this.advance();
				ids.push(this.parseIdent('an id after "#"'));
			} else if (ch === '.') {
				this.advance();
				classes.push(this.parseIdent('a class name after "."'));
			} else if (ch === '[') {
				attributes.push(this.parseAttribute());
			} else {
				break;
			}
		}

		if (this.pos === start) throw this.error('a selector');
		const sel: QuerySelector = { tag, ids, classes, attributes };
		return { type: 'selector', selector: sel };
	}

	/** `[name=value]`; presence-only `[name]` is not part of the language. */
	private parseAttribute(): Attribute {
		this.advance(); // [
		this.skipWhitespace();
		const name = this.parseIdent('an attribute name');
		this.skipWhitespace();
		if (this.current() !== '=') throw this.error('"=" in attribute selector');
		this.advance();
		this.skipWhitespace();

		const quote = this.current();
		let value: string;
		if (quote === '"' || quote === "'") {
			const end = this.src.indexOf(quote, this.pos + 1);
			if (end === -1) throw this.error(`closing ${quote}`);
			value = this.src.slice(this.pos + 1, end);
			this.pos = end + 1;
		} else {
			value = this.parseIdent('an attribute value');
		}

		this.skipWhitespace();
		if (this.current() !== ']') throw this.error('"]"');
		this.advance();
		return { name, value };
	}

	// -------------------------------------------------------------------------
	// Low-level helpers
	// -------------------------------------------------------------------------

	private parseIdent(expected: string): string {
		const start = this.pos;
		while (this.pos < this.src.length && isIdentChar(this.src.charCodeAt(this.pos))) {
			this.pos++;
		}
		if (this.pos === start) throw this.error(expected);
		return this.src.slice(start, this.pos);
	}

	private atCompoundStart(): boolean {
		const ch = this.current();
		return ch === '*' || ch === '#' || ch === '.' || ch === '[' || isIdentChar(this.src.charCodeAt(this.pos));
	}

	private current(): string {
		return this.src[this.pos] ?? '';
	}

	private advance(): void {
		this.pos++;
	}

	/** Returns whether any whitespace was skipped. */
	private skipWhitespace(): boolean {
		const start = this.pos;
		while (this.pos < this.src.length && isWhitespace(this.src.charCodeAt(this.pos))) {
			this.pos++;
		}
		return this.pos > start;
	}

	private error(expected: string): ParseError {
		return ParseError.at(this.src, this.pos, expected);
	}
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Parses selector text such as `div > h1.title, #main a[rel=next]`. */
export function parseQuery(text: string): Result<Query, ParseError> {
	try {
		return success(new QueryParser(text).parse());
	} catch (err) {
		if (err instanceof ParseError) return failure(err);
		throw err;
	}
}

function formatSelector(sel: QuerySelector): string {
	const parts = [
		...sel.ids.map((id) => `#${id}`),
		...sel.classes.map((cls) => `.${cls}`),
		...sel.attributes.map(({ name, value }) => (value.includes('"') ? `[${name}='${value}']` : `[${name}="${value}"]`)),
	].join('');
	if (sel.tag !== null) return sel.tag + parts;
	return parts.length > 0 ? parts : '*';
}

/**
 * Renders a query as selector text. Output of {@link parseQuery} renders to
 * text that parses back to an equal query.
 */
export function formatQuery(query: Query): string {
	switch (query.type) {
		case 'selector':
			return formatSelector(query.selector);
		case 'descendant':
			return `${formatQuery(query.left)} ${formatQuery(query.right)}`;
		case 'child':
			return `${formatQuery(query.left)} > ${formatQuery(query.right)}`;
		case 'union':
			return `${formatQuery(query.left)}, ${formatQuery(query.right)}`;
	}
}
