/**
 * Tests for parseQuery() and formatQuery().
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseQuery, formatQuery, selector, child, descendant, union } from '../src/index.ts';
import { query } from './helpers.ts';

function queryError(source: string) {
	const result = parseQuery(source);
	if (result.ok) throw new Error(`Expected ${JSON.stringify(source)} to fail`);
	return result.error;
}

const div = selector({ tag: 'div' });
const h1 = selector({ tag: 'h1' });

// ---------------------------------------------------------------------------
// Selectors
// ---------------------------------------------------------------------------

describe('parseQuery — selectors', () => {
	it('a tag', () => assert.deepEqual(query('div'), div));
	it('an id', () => assert.deepEqual(query('#main'), selector({ ids: ['main'] })));
	it('several classes', () => assert.deepEqual(query('.a.b'), selector({ classes: ['a', 'b'] })));
	it('the universal selector', () => assert.deepEqual(query('*'), selector()));
	it('the universal selector with a class', () => assert.deepEqual(query('*.x'), selector({ classes: ['x'] })));

	it('tag, id, class and attributes together', () => {
		assert.deepEqual(
			query(`a#home.nav[rel=next][data-label="two words"][title='say "hi"']`),
			selector({
				tag: 'a',
				ids: ['home'],
				classes: ['nav'],
				attributes: [
					{ name: 'rel', value: 'next' },
					{ name: 'data-label', value: 'two words' },
					{ name: 'title', value: 'say "hi"' },
				],
			}),
		);
	});

	it('whitespace inside attribute brackets', () => {
		assert.deepEqual(query('[ rel = next ]'), selector({ attributes: [{ name: 'rel', value: 'next' }] }));
	});
});

// ---------------------------------------------------------------------------
// Combinators
// ---------------------------------------------------------------------------

describe('parseQuery — combinators', () => {
	it('whitespace is the descendant combinator', () => {
		assert.deepEqual(query('div h1'), descendant(div, h1));
	});

	it('">" is the child combinator, spaced or not', () => {
		assert.deepEqual(query('div > h1.title'), child(div, selector({ tag: 'h1', classes: ['title'] })));
		assert.deepEqual(query('div>h1'), child(div, h1));
		assert.deepEqual(query('  div  >  h1  '), child(div, h1));
	});

	it('combinators associate to the left', () => {
		const p = selector({ tag: 'p' });
		assert.deepEqual(query('div h1 > p'), child(descendant(div, h1), p));
		assert.deepEqual(query('div > h1 p'), descendant(child(div, h1), p));
	});

	it('"," builds a left-associative union below the other combinators', () => {
		const h2 = selector({ tag: 'h2' });
		const h3 = selector({ tag: 'h3' });
		assert.deepEqual(query('h1, h2 , h3'), union(union(h1, h2), h3));
		assert.deepEqual(query('div h1,h2'), union(descendant(div, h1), h2));
	});
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe('parseQuery — errors', () => {
	it('an empty query', () => {
		const err = queryError('');
		assert.equal(err.expected, 'a selector');
		assert.equal(err.position, 0);
	});

	it('a dangling child combinator', () => {
		const err = queryError('div >');
		assert.equal(err.expected, 'a selector');
		assert.equal(err.position, 5);
		assert.equal(err.message, 'Expected a selector but found end of input (line 1, col 6)');
	});

	it('a dangling comma', () => {
		assert.equal(queryError('div,').position, 4);
	});

	it('an attribute presence test', () => {
		const err = queryError('[href]');
		assert.equal(err.expected, '"=" in attribute selector');
		assert.equal(err.position, 5);
	});

	it('an unsupported character', () => {
		const err = queryError('div!');
		assert.equal(err.expected, '",", ">" or a selector');
		assert.equal(err.found, '!');
		assert.equal(err.position, 3);
	});

	it('a class without a name', () => {
		assert.equal(queryError('.').expected, 'a class name after "."');
	});

	it('an unterminated quoted value', () => {
		assert.equal(queryError('[a="x]').expected, 'closing "');
	});
});

// ---------------------------------------------------------------------------
// formatQuery
// ---------------------------------------------------------------------------

describe('formatQuery', () => {
	it('renders combinators and selector parts', () => {
		assert.equal(formatQuery(query('div>h1.title,#x a[rel=next]')), 'div > h1.title, #x a[rel="next"]');
	});

	it('renders an empty selector as "*"', () => {
		assert.equal(formatQuery(selector()), '*');
	});

	it('single-quotes values that contain a double quote', () => {
		assert.equal(formatQuery(query(`[title='say "hi"']`)), `[title='say "hi"']`);
	});

	it('parses back to the same query', () => {
		const q = query('ul#menu > li.item a[href="/"], footer *');
		assert.deepEqual(query(formatQuery(q)), q);
	});
});
