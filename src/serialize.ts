/**
 * html-search — HTML serializer
 *
 * Renders a parsed node (or a whole document) back to HTML text. Output
 * parses back to an equal tree with `parseHtml`:
 *
 * • Void elements render as `<br>`, other childless elements as `<p></p>`.
 * • Attributes with an empty value render bare (`<input disabled>`).
 * • Text inside `<script>` / `<style>` is written verbatim; all other text and
 *   every attribute value is escaped.
 */

import { isRawTextElement, isVoidElement } from './parser.ts';
import type { Attribute, Document, Element, HtmlNode } from './types.ts';

// ---------------------------------------------------------------------------
// Escaping helpers
// ---------------------------------------------------------------------------

/** Escape characters that are special in text content. */
function escapeText(s: string): string {
	return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Escape characters that are special inside a double-quoted attribute value. */
function escapeAttr(s: string): string {
	return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/"/g, '&quot;');
}

// ---------------------------------------------------------------------------
// Recursive workers
// ---------------------------------------------------------------------------

function serializeAttr({ name, value }: Attribute): string {
	return value.length > 0 ? `${name}="${escapeAttr(value)}"` : name;
}

function serializeElement(el: Element): string {
	const attrs = el.attributes.map(serializeAttr);
	const open = attrs.length > 0 ? `<${el.tag} ${attrs.join(' ')}>` : `<${el.tag}>`;
	if (isVoidElement(el.tag)) return open;

	const raw = isRawTextElement(el.tag);
	const content = el.children.map((c) => (raw && c.type === 'text' ? c.value : serializeNode(c))).join('');
	return `${open}${content}</${el.tag}>`;
}

function serializeNode(node: HtmlNode): string {
	switch (node.type) {
		case 'text':
			return escapeText(node.value);
		case 'element':
			return serializeElement(node);
	}
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Serialize a node, or every top-level node of a document, to HTML.
 * `null` / `undefined` input returns `""`.
 */
export function serialize(node: HtmlNode | Document | null | undefined): string {
	if (node == null) return '';
	if (node.type === 'document') return node.children.map(serializeNode).join('');
	return serializeNode(node);
}
