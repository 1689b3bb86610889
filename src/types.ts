/**
 * html-search — Type definitions
 *
 * Two families of plain, read-only objects live here:
 *
 *   HtmlNode                 Query
 *   ├── Element              ├── selector   (QuerySelector)
 *   └── Text                 ├── descendant (left, right)
 *                            ├── child      (left, right)
 *                            └── union      (left, right)
 *
 * A `Document` is a forest: an ordered list of top-level nodes, not a single
 * root element. Nothing in the library mutates these objects after parsing.
 */

// ---------------------------------------------------------------------------
// Document tree
// ---------------------------------------------------------------------------

/** All legal values of `node.type` in a document tree. */
export type NodeType = 'document' | 'element' | 'text';

/**
 * A single `name="value"` pair on an element, or a required pair on a
 * selector. Attributes without a value (`<input disabled>`) carry `""`.
 */
export interface Attribute {
	readonly name: string;
	readonly value: string;
}

/** A run of character data between tags, with references decoded. */
export interface Text {
	readonly type: 'text';
	readonly value: string;
}

/**
 * An HTML element: `<tag attr="val">…</tag>`.
 *
 * The tag is kept exactly as written in the source (no case folding).
 */
export interface Element {
	readonly type: 'element';
	readonly tag: string;
	/**
	 * All attributes in source order. Duplicate names are preserved as-is;
	 * nothing enforces uniqueness.
	 */
	readonly attributes: ReadonlyArray<Attribute>;
	/** Child nodes in document order. */
	readonly children: ReadonlyArray<HtmlNode>;
}

/** Any node that may appear inside a document or an element. */
export type HtmlNode = Element | Text;

/** The parsed form of one HTML source: its top-level nodes in order. */
export interface Document {
	readonly type: 'document';
	readonly children: ReadonlyArray<HtmlNode>;
}

// ---------------------------------------------------------------------------
// Query AST
// ---------------------------------------------------------------------------

/**
 * A flat matcher tested against one element.
 *
 * `ids`, `classes` and `attributes` all collapse into a single list of
 * required pairs (see {@link requiredAttributes}).
 */
export interface QuerySelector {
	/** Required tag, or `null` to accept any tag. */
	readonly tag: string | null;
	readonly ids: ReadonlyArray<string>;
	readonly classes: ReadonlyArray<string>;
	/** Explicit `[name=value]` constraints. */
	readonly attributes: ReadonlyArray<Attribute>;
}

export interface SelectorQuery {
	readonly type: 'selector';
	readonly selector: QuerySelector;
}

/** `left right` — `right` anywhere inside a `left` match. */
export interface DescendantQuery {
	readonly type: 'descendant';
	readonly left: Query;
	readonly right: Query;
}

/** `left > right` — `right` among the direct children of a `left` match. */
export interface ChildQuery {
	readonly type: 'child';
	readonly left: Query;
	readonly right: Query;
}

/** `left, right` — both evaluated independently, results concatenated. */
export interface UnionQuery {
	readonly type: 'union';
	readonly left: Query;
	readonly right: Query;
}

export type Query = SelectorQuery | DescendantQuery | ChildQuery | UnionQuery;

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

/** Builds a selector; every omitted field is left unconstrained. */
export function selector(fields: Partial<QuerySelector> = {}): SelectorQuery {
	return {
		type: 'selector',
		selector: {
			tag: fields.tag ?? null,
			ids: fields.ids ?? [],
			classes: fields.classes ?? [],
			attributes: fields.attributes ?? [],
		},
	};
}

export function descendant(left: Query, right: Query): DescendantQuery {
	return { type: 'descendant', left, right };
}

export function child(left: Query, right: Query): ChildQuery {
	return { type: 'child', left, right };
}

export function union(left: Query, right: Query): UnionQuery {
	return { type: 'union', left, right };
}

/**
 * The merged constraint list of a selector: ids as `("id", v)`, classes as
 * `("class", v)`, then the explicit attribute pairs.
 */
export function requiredAttributes(sel: QuerySelector): Attribute[] {
	return [...sel.ids.map((value) => ({ name: 'id', value })), ...sel.classes.map((value) => ({ name: 'class', value })), ...sel.attributes];
}

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

export function isElement(node: HtmlNode): node is Element {
	return node.type === 'element';
}

export function isText(node: HtmlNode): node is Text {
	return node.type === 'text';
}
