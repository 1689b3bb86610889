/**
 * Tests for the character classes shared by both parsers.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isAttrNameChar, isIdentChar, isNameChar, isTagNameStartChar, isWhitespace } from '../src/chars.ts';

const code = (ch: string) => ch.charCodeAt(0);

describe('character classes', () => {
	it('HTML whitespace includes form feed', () => {
		assert.deepEqual([' ', '\t', '\n', '\f', '\r', 'x'].map((c) => isWhitespace(code(c))), [true, true, true, true, true, false]);
	});

	it('tag names start with a letter', () => {
		assert.deepEqual(['a', 'Z', '1', '-', '!'].map((c) => isTagNameStartChar(code(c))), [true, true, false, false, false]);
		assert.equal(isNameChar(code('-')), true);
	});

	it('attribute names stop at syntax characters', () => {
		assert.deepEqual(['a', '@', '=', '>', '/', '"', ' '].map((c) => isAttrNameChar(code(c))), [true, true, false, false, false, false, false]);
		assert.equal(isAttrNameChar(''.charCodeAt(0)), false);
	});

	it('query identifiers exclude selector syntax', () => {
		assert.deepEqual(['a', '9', '-', '_', 'é', '.', '#', ':', '>'].map((c) => isIdentChar(code(c))), [true, true, true, true, true, false, false, false, false]);
	});
});
