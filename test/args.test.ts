/**
 * Tests for parseArgs().
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseArgs, ArgsError } from '../src/index.ts';
import type { SearchArgs } from '../src/index.ts';

const PROG = 'html-search';

function searchArgs(argv: string[]): SearchArgs {
	const result = parseArgs(PROG, argv);
	if (!result.ok) return assert.fail(result.error.message);
	if (result.value.kind !== 'search') return assert.fail('expected search arguments');
	return result.value;
}

function argsError(argv: string[]): ArgsError {
	const result = parseArgs(PROG, argv);
	if (result.ok) return assert.fail(`expected ${JSON.stringify(argv)} to be rejected`);
	return result.error;
}

describe('parseArgs — help', () => {
	for (const argv of [['-h'], ['--help'], ['div', 'a.html', '--help'], ['div', '-h', '--max-results', 'x']]) {
		it(`returns the usage for ${argv.join(' ')}`, () => {
			const result = parseArgs(PROG, argv);
			if (!result.ok) return assert.fail(result.error.message);
			assert.equal(result.value.kind, 'help');
			if (result.value.kind !== 'help') return;
			assert.ok(result.value.usage.startsWith('Usage: html-search query [files...]\n'));
		});
	}
});

describe('parseArgs — search', () => {
	it('a query and a file', () => {
		const args = searchArgs(['div > h1.title', 'file.html']);
		assert.equal(args.query, 'div > h1.title');
		assert.deepEqual(args.files, ['file.html']);
		assert.equal(args.maxResults, undefined);
		assert.equal(args.verbose, false);
	});

	it('no files means standard input', () => {
		assert.equal(searchArgs(['div > h1']).files, 'stdin');
	});

	it('several files keep their order', () => {
		assert.deepEqual(searchArgs(['div h1', 'file1.html', 'file2.html']).files, ['file1.html', 'file2.html']);
	});

	it('--max-results after the files', () => {
		const args = searchArgs(['div > h1', 'file.html', '--max-results', '1']);
		assert.equal(args.maxResults, 1);
		assert.deepEqual(args.files, ['file.html']);
	});

	it('--max-results between the query and the files', () => {
		const args = searchArgs(['div > h1', '--max-results', '1', 'file.html']);
		assert.equal(args.maxResults, 1);
		assert.deepEqual(args.files, ['file.html']);
	});

	it('--max-results before the query', () => {
		const args = searchArgs(['--max-results', '2', 'p']);
		assert.equal(args.query, 'p');
		assert.equal(args.maxResults, 2);
		assert.equal(args.files, 'stdin');
	});

	it('--max-results=n', () => {
		assert.equal(searchArgs(['p', '--max-results=0']).maxResults, 0);
	});

	it('--verbose', () => {
		assert.equal(searchArgs(['p', '--verbose']).verbose, true);
	});
});

describe('parseArgs — errors', () => {
	it('no query', () => {
		const err = argsError([]);
		assert.ok(err instanceof ArgsError);
		assert.equal(err.code, 'commander.missingArgument');
		assert.equal(err.message, "error: missing required argument 'query'");
	});

	it('a flag without its value', () => {
		assert.equal(argsError(['p', '--max-results']).code, 'commander.optionMissingArgument');
	});

	it('a limit that is not a non-negative integer', () => {
		for (const value of ['x', '-1', '1.5']) {
			assert.equal(argsError(['p', '--max-results', value]).code, 'commander.invalidArgument');
		}
	});

	it('an unknown option', () => {
		assert.equal(argsError(['p', '--bogus']).code, 'commander.unknownOption');
	});
});
