/**
 * html-search — Recursive-descent HTML parser
 *
 * Design goals
 * ─────────────
 * • Produce the read-only `Document` forest consumed by the search engine.
 * • Strict on structure: a close tag that does not match the open element,
 *   or an element still open at end of input, is a `ParseError`.
 * • Lenient on lexical detail: unquoted and valueless attributes, void
 *   elements written without `/>`, unknown character references and stray
 *   `<` characters in text are all accepted.
 * • No streaming: the whole source is held in memory.
 *
 * What is dropped
 * ────────────────
 * • Comments (`<!-- … -->`) and declarations (`<!DOCTYPE html>`) are consumed
 *   and produce no node.
 * • A leading BOM (U+FEFF) is skipped.
 */

import type { Attribute, Document, Element, HtmlNode, Text } from './types.ts';
import { isAttrNameChar, isDecimalDigit, isHexDigit, isNameChar, isTagNameStartChar, isWhitespace } from './chars.ts';
import { ParseError } from './errors.ts';
import { failure, success } from './result.ts';
import type { Result } from './result.ts';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Named references decoded in text and attribute values. */
const NAMED_REFERENCES: Readonly<Record<string, string>> = {
	amp: '&',
	lt: '<',
	gt: '>',
	quot: '"',
	apos: "'",
	nbsp: '\u00a0',
};

/** Elements that never have content. Compared in lower case. */
const VOID_ELEMENTS: ReadonlySet<string> = new Set(['area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input', 'link', 'meta', 'param', 'source', 'track', 'wbr']);

/** Elements whose content is taken verbatim up to the matching end tag. */
const RAW_TEXT_ELEMENTS: ReadonlySet<string> = new Set(['script', 'style']);

/** Whether `tag` names an element that never has content (`<br>`, `<img>` …). */
export function isVoidElement(tag: string): boolean {
	return VOID_ELEMENTS.has(tag.toLowerCase());
}

/** Whether `tag` names an element whose text is not entity-encoded. */
export function isRawTextElement(tag: string): boolean {
	return RAW_TEXT_ELEMENTS.has(tag.toLowerCase());
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

class HtmlParser {
	private readonly src: string;
	private pos = 0;
	/** Lower-cased copy of `src`, built on first use by raw-text scanning. */
	private lowerSrc: string | null = null;

	constructor(src: string) {
		this.src = src;
	}

	// -------------------------------------------------------------------------
	// Public entry point
	// -------------------------------------------------------------------------

	parse(): Document {
		if (this.src.charCodeAt(0) === 0xfeff) this.pos = 1;
		return { type: 'document', children: this.parseContent(null) };
	}

	// -------------------------------------------------------------------------
	// Content
	// -------------------------------------------------------------------------

	/**
	 * Parses nodes until the end tag of `parent` (which is consumed) or, at the
	 * top level (`parent === null`), until end of input.
	 */
	private parseContent(parent: string | null): HtmlNode[] {
		const nodes: HtmlNode[] = [];

		while (this.pos < this.src.length) {
			if (this.startsWith('</')) {
				if (parent === null) throw this.error('text or an opening tag');
				this.parseEndTag(parent);
				return nodes;
			}

			if (this.startsWith('<!--')) {
				this.skipComment();
			} else if (this.startsWith('<!')) {
				this.skipDeclaration();
			} else if (this.current() === '<' && isTagNameStartChar(this.src.charCodeAt(this.pos + 1))) {
				nodes.push(this.parseElement());
			} else {
				nodes.push(this.parseText());
			}
		}

		if (parent !== null) throw this.error(`</${parent}>`);
		return nodes;
	}

	// -------------------------------------------------------------------------
	// Element
	// -------------------------------------------------------------------------

	private parseElement(): Element {
		this.expect('<');
		const tag = this.parseTagName();
		const attributes: Attribute[] = [];

		for (;;) {
			this.skipWhitespace();
			if (this.startsWith('/>')) {
				this.advanceBy(2);
				return { type: 'element', tag, attributes, children: [] };
			}
			if (this.current() === '>') {
				this.advance();
				break;
			}
			if (!isAttrNameChar(this.src.charCodeAt(this.pos))) {
				throw this.error(`an attribute name or ">" to close <${tag}>`);
			}
			attributes.push(this.parseAttribute());
		}

		if (isVoidElement(tag)) {
			return { type: 'element', tag, attributes, children: [] };
		}
		if (isRawTextElement(tag)) {
			return { type: 'element', tag, attributes, children: this.parseRawText(tag) };
		}
		return { type: 'element', tag, attributes, children: this.parseContent(tag) };
	}

	/** Consumes `</name>` and checks it closes `parent` (case-insensitively). */
	private parseEndTag(parent: string): void {
		const start = this.pos;
		this.expect('</');
		const name = this.tryParseTagName();
		this.skipWhitespace();
		if (name === null || name.toLowerCase() !== parent.toLowerCase() || this.current() !== '>') {
			throw ParseError.at(this.src, start, `</${parent}>`);
		}
		this.advance();
	}

	/** Content of `<script>` / `<style>`: one verbatim text node, or none. */
	private parseRawText(tag: string): Text[] {
		this.lowerSrc ??= this.src.toLowerCase();
		const end = this.lowerSrc.indexOf(`</${tag.toLowerCase()}`, this.pos);
		if (end === -1) {
			this.pos = this.src.length;
			throw this.error(`</${tag}>`);
		}
		const value = this.src.slice(this.pos, end);
		this.pos = end;
		this.parseEndTag(tag);
		return value.length > 0 ? [{ type: 'text', value }] : [];
	}

	// -------------------------------------------------------------------------
	// Attributes
	// -------------------------------------------------------------------------

	private parseAttribute(): Attribute {
		const start = this.pos;
		while (isAttrNameChar(this.src.charCodeAt(this.pos))) this.pos++;
		const name = this.src.slice(start, this.pos);

		this.skipWhitespace();
		if (this.current() !== '=') return { name, value: '' };
		this.advance();
		this.skipWhitespace();

		const quote = this.current();
		if (quote === '"' || quote === "'") return { name, value: this.parseQuotedValue(quote) };
		return { name, value: this.parseBareValue() };
	}

	private parseQuotedValue(quote: string): string {
		const start = this.pos;
		this.advance();
		const parts: string[] = [];

		while (this.current() !== quote) {
			if (this.pos >= this.src.length) {
				throw ParseError.at(this.src, start, `closing ${quote} of the attribute value`);
			}
			if (this.current() === '&') {
				parts.push(this.parseReference());
			} else {
				const next = this.nextOf(quote, '&');
				parts.push(this.src.slice(this.pos, next));
				this.pos = next;
			}
		}

		this.advance();
		return parts.join('');
	}

	/** An unquoted value runs to whitespace, `>` or `/>`; it may not be empty. */
	private parseBareValue(): string {
		const parts: string[] = [];
		const start = this.pos;

		while (this.pos < this.src.length && !isWhitespace(this.src.charCodeAt(this.pos)) && this.current() !== '>' && !this.startsWith('/>')) {
			if (this.current() === '&') {
				parts.push(this.parseReference());
			} else {
				parts.push(this.current());
				this.advance();
			}
		}

		if (this.pos === start) throw this.error('an attribute value');
		return parts.join('');
	}

	// -------------------------------------------------------------------------
	// Leaf content
	// -------------------------------------------------------------------------

	/**
	 * A run of text up to the next tag, comment or declaration. A `<` that
	 * starts none of those is kept as text.
	 */
	private parseText(): Text {
		const parts: string[] = [];

		while (this.pos < this.src.length && !this.atMarkup()) {
			if (this.current() === '&') {
				parts.push(this.parseReference());
			} else if (this.current() === '<') {
				parts.push('<');
				this.advance();
			} else {
				const next = this.nextOf('<', '&');
				parts.push(this.src.slice(this.pos, next));
				this.pos = next;
			}
		}

		return { type: 'text', value: parts.join('') };
	}

	/** True when the cursor sits on `<` followed by a letter, `/` or `!`. */
	private atMarkup(): boolean {
		if (this.current() !== '<') return false;
		const next = this.src.charCodeAt(this.pos + 1);
		return isTagNameStartChar(next) || next === 0x2f || next === 0x21;
	}

	private skipComment(): void {
		const end = this.src.indexOf('-->', this.pos + 4);
		if (end === -1) throw this.error('"-->" to close the comment');
		this.pos = end + 3;
	}

	private skipDeclaration(): void {
		const end = this.src.indexOf('>', this.pos);
		if (end === -1) throw this.error('">" to close the declaration');
		this.pos = end + 1;
	}

	// -------------------------------------------------------------------------
	// Character references
	// -------------------------------------------------------------------------

	private parseReference(): string {
		const start = this.pos;
		this.advance(); // skip &

		if (this.current() === '#') {
			this.advance();
			return this.parseNumericReference(start);
		}

		while (this.pos < this.src.length && isNameChar(this.src.charCodeAt(this.pos)) && this.current() !== ':') {
			this.pos++;
		}
		const name = this.src.slice(start + 1, this.pos);
		if (name.length === 0) return '&';

		const resolved = NAMED_REFERENCES[name];
		if (resolved !== undefined && this.current() === ';') {
			this.advance();
			return resolved;
		}
		// Unknown, or missing its semicolon: keep the source text.
		return this.src.slice(start, this.pos);
	}

	private parseNumericReference(start: number): string {
		const hex = this.current() === 'x' || this.current() === 'X';
		if (hex) this.advance();

		const digitsStart = this.pos;
		const isDigit = hex ? isHexDigit : isDecimalDigit;
		while (this.pos < this.src.length && isDigit(this.src.charCodeAt(this.pos))) this.pos++;
		const digits = this.src.slice(digitsStart, this.pos);
		if (digits.length === 0) return this.src.slice(start, this.pos);

		if (this.current() === ';') this.advance();

		const codePoint = parseInt(digits, hex ? 16 : 10);
		if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff) || codePoint === 0) {
			return '\ufffd';
		}
		return String.fromCodePoint(codePoint);
	}

	// -------------------------------------------------------------------------
	// Names
	// -------------------------------------------------------------------------

	private parseTagName(): string {
		const name = this.tryParseTagName();
		if (name === null) throw this.error('a tag name');
		return name;
	}

	/** Like `parseTagName` but returns `null` instead of throwing. */
	private tryParseTagName(): string | null {
		if (!isTagNameStartChar(this.src.charCodeAt(this.pos))) return null;
		const start = this.pos;
		this.pos++;
		while (this.pos < this.src.length && isNameChar(this.src.charCodeAt(this.pos))) {
			this.pos++;
		}
		return this.src.slice(start, this.pos);
	}

	// -------------------------------------------------------------------------
	// Low-level cursor helpers
	// -------------------------------------------------------------------------

	private current(): string {
		return this.src[this.pos] ?? '';
	}

	private advance(): void {
		this.pos++;
	}

	private advanceBy(n: number): void {
		this.pos += n;
	}

	private startsWith(str: string): boolean {
		return this.src.startsWith(str, this.pos);
	}

	private expect(str: string): void {
		if (!this.startsWith(str)) throw this.error(JSON.stringify(str));
		this.pos += str.length;
	}

	private skipWhitespace(): void {
		while (this.pos < this.src.length && isWhitespace(this.src.charCodeAt(this.pos))) {
			this.pos++;
		}
	}

	/** Position of the first of `a` or `b` at or after the cursor, or the end. */
	private nextOf(a: string, b: string): number {
		const i = this.src.indexOf(a, this.pos);
		const j = this.src.indexOf(b, this.pos);
		if (i === -1 && j === -1) return this.src.length;
		if (i === -1) return j;
		if (j === -1) return i;
		return Math.min(i, j);
	}

	private error(expected: string): ParseError {
		return ParseError.at(this.src, this.pos, expected);
	}
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parses HTML text into a `Document` forest.
 *
 * Returns a failure carrying a {@link ParseError} for structural problems:
 * mismatched, stray or missing end tags, malformed start tags, and
 * unterminated comments or attribute values.
 */
export function parseHtml(html: string): Result<Document, ParseError> {
	try {
		return success(new HtmlParser(html).parse());
	} catch (err) {
		if (err instanceof ParseError) return failure(err);
		throw err;
	}
}
