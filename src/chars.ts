/**
 * html-search — Character classification
 *
 * All functions operate on numeric UTF-16 code units (from `charCodeAt`).
 * The HTML parser and the query parser share these so that a tag or
 * attribute name accepted in a document is also accepted in a query.
 */

/** HTML whitespace: space, tab, newline, form-feed, carriage-return. */
export function isWhitespace(code: number): boolean {
	return code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0c || code === 0x0d;
}

/** ASCII letter [A-Za-z]. */
export function isAsciiAlpha(code: number): boolean {
	return (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a);
}

/** ASCII decimal digit [0-9]. */
export function isDecimalDigit(code: number): boolean {
	return code >= 0x30 && code <= 0x39;
}

/** ASCII hex digit [0-9A-Fa-f]. */
export function isHexDigit(code: number): boolean {
	return isDecimalDigit(code) || (code >= 0x41 && code <= 0x46) || (code >= 0x61 && code <= 0x66);
}

/** First character of a tag name: an ASCII letter. */
export function isTagNameStartChar(code: number): boolean {
	return isAsciiAlpha(code);
}

/** Letters, digits, `-`, `_`, `:` and `.`. Used for the rest of tag names. */
export function isNameChar(code: number): boolean {
	return isAsciiAlpha(code) || isDecimalDigit(code) || code === 0x2d || code === 0x5f || code === 0x3a || code === 0x2e || code >= 0x80;
}

/**
 * Attribute names are anything up to whitespace, `/`, `>`, `=` or a quote.
 * NaN (reading past the end) is never a name character.
 */
export function isAttrNameChar(code: number): boolean {
	if (Number.isNaN(code) || isWhitespace(code)) return false;
	return code !== 0x2f && code !== 0x3e && code !== 0x3d && code !== 0x22 && code !== 0x27 && code !== 0x3c;
}

/**
 * Characters allowed in a query identifier (tag, id, class or attribute
 * name): letters, digits, `-`, `_` and anything outside ASCII. `.` and `:`
 * are excluded since they are selector syntax.
 */
export function isIdentChar(code: number): boolean {
	return isAsciiAlpha(code) || isDecimalDigit(code) || code === 0x2d || code === 0x5f || code >= 0x80;
}
