/**
 * html-search — Match engine
 *
 * Evaluates a `Query` against document trees. Every function here is pure
 * and total: no input makes it throw, and results come back in document
 * order as produced by the combinator rules, never re-sorted or
 * de-duplicated.
 *
 * Scope flag
 * ──────────
 * `recursive` is threaded explicitly through each call. `true` means "if
 * this node does not match, keep looking inside it"; `false` means "test
 * only the nodes at this level". It belongs to the call, not to the query:
 * the right side of a descendant combinator always searches with `true`,
 * the right side of a child combinator always with `false`.
 */

import { isElement, requiredAttributes } from './types.ts';
import type { Document, Element, HtmlNode, Query, QuerySelector } from './types.ts';

/** One match, tagged with the path of the document it was found in. */
export interface FileMatch {
	readonly path: string;
	readonly node: Element;
}

/** A parsed document together with the path it was read from. */
export interface ParsedFile {
	readonly path: string;
	readonly document: Document;
}

/**
 * Whether `el` satisfies `sel`: the tag is equal (when the selector names
 * one) and each required pair is present among the element's attributes.
 *
 * Class and id constraints compare whole attribute values, so `.title` does
 * not match `class="title main"`.
 */
export function matches(sel: QuerySelector, el: Element): boolean {
	if (sel.tag !== null && sel.tag !== el.tag) return false;
	return requiredAttributes(sel).every((req) => el.attributes.some((a) => a.name === req.name && a.value === req.value));
}

/** Runs {@link searchNode} over each element of `nodes`; text is skipped. */
export function searchNodes(recursive: boolean, query: Query, nodes: ReadonlyArray<HtmlNode>): Element[] {
	const results: Element[] = [];
	for (const node of nodes) {
		if (isElement(node)) results.push(...searchNode(recursive, query, node));
	}
	return results;
}

/** Evaluates `query` at `el`. */
export function searchNode(recursive: boolean, query: Query, el: Element): Element[] {
	switch (query.type) {
		case 'selector':
			if (matches(query.selector, el)) return [el];
			return recursive ? searchNodes(true, query, el.children) : [];

		case 'descendant':
			return searchNodes(true, query.right, childrenOfMatches(recursive, query.left, el));

		case 'child':
			return searchNodes(false, query.right, childrenOfMatches(recursive, query.left, el));

		case 'union':
			return [...searchNode(recursive, query.left, el), ...searchNode(recursive, query.right, el)];
	}
}

/** The direct children of every match of `query` at `el`, in order. */
function childrenOfMatches(recursive: boolean, query: Query, el: Element): HtmlNode[] {
	return searchNode(recursive, query, el).flatMap((match) => match.children);
}

/** All matches of `query` in `doc`, searched at unrestricted depth. */
export function search(query: Query, doc: Document): Element[] {
	return searchNodes(true, query, doc.children);
}

/**
 * Searches each file in turn and tags its matches with the file's path.
 * Files keep their input order; a file with no matches contributes nothing.
 */
export function searchFiles(query: Query, files: ReadonlyArray<ParsedFile>): FileMatch[] {
	return files.flatMap(({ path, document }) => search(query, document).map((node) => ({ path, node })));
}

/** The first `maxResults` entries of `matches`, or all of them when unset. */
export function limitResults<T>(matches: ReadonlyArray<T>, maxResults?: number): T[] {
	return maxResults === undefined ? [...matches] : matches.slice(0, maxResults);
}
