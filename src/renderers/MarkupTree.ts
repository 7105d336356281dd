/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import type { Element, ElementContent, Root, RootContent } from "hast";
import { fromHtml } from "hast-util-from-html";
import { toHtml } from "hast-util-to-html";
import { toString } from "hast-util-to-string";

/**
 * Replaces an element's (trimmed) text content with Markdown.
 */
export type MarkupTemplate = (content: string) => string;

/**
 * Parses HTML-like text into a {@link https://github.com/syntax-tree/hast | hast} fragment.
 *
 * @remarks Parsing is permissive: malformed markup is repaired the way a browser would repair it.
 *
 * @throws If elements are nested deeper than `maxDepth`.
 */
export function parseMarkup(html: string, maxDepth: number): Root {
	const root = fromHtml(html, { fragment: true });
	checkDepth(root.children, 1, maxDepth);
	return root;
}

/**
 * Rewrites the tree bottom-up: each element's children are rewritten (left to right) before the element itself.
 * Elements with a template are replaced by a text node containing the template applied to their trimmed text
 * content.
 *
 * @remarks Returns a new tree; the input is not modified. Comments and doctypes are dropped.
 */
export function rewriteMarkup(root: Root, templates: ReadonlyMap<string, MarkupTemplate>): Root {
	return { type: "root", children: rewriteNodes(root.children, templates) };
}

/**
 * Writes the tree back out as HTML.
 */
export function serializeMarkup(root: Root): string {
	return toHtml(root);
}

/**
 * Names of all elements in the tree.
 */
export function getElementTagNames(root: Root): Set<string> {
	const tagNames = new Set<string>();
	const visit = (nodes: readonly RootContent[]): void => {
		for (const node of nodes) {
			if (node.type === "element") {
				tagNames.add(node.tagName);
				visit(node.children);
			}
		}
	};
	visit(root.children);
	return tagNames;
}

function checkDepth(nodes: readonly RootContent[], depth: number, maxDepth: number): void {
	for (const node of nodes) {
		if (node.type !== "element") {
			continue;
		}
		if (depth > maxDepth) {
			throw new Error(`Markup is nested deeper than ${maxDepth} levels.`);
		}
		checkDepth(node.children, depth + 1, maxDepth);
	}
}

function rewriteNodes(
	nodes: readonly RootContent[],
	templates: ReadonlyMap<string, MarkupTemplate>,
): ElementContent[] {
	const result: ElementContent[] = [];
	for (const node of nodes) {
		if (node.type === "element") {
			result.push(rewriteElement(node, templates));
		} else if (node.type === "text") {
			result.push(node);
		}
	}
	return result;
}

function rewriteElement(
	element: Element,
	templates: ReadonlyMap<string, MarkupTemplate>,
): ElementContent {
	const children = rewriteNodes(element.children, templates);
	const template = templates.get(element.tagName);
	if (template === undefined) {
		return { ...element, children };
	}
	const content = toString({ type: "root", children });
	return { type: "text", value: template(content.trim()) };
}
