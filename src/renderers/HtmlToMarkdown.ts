/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { htmlVoidElements } from "html-void-elements";

import type { RenderConfiguration } from "../Configuration.js";
import { escapeUnknownEntities } from "./Entities.js";
import { resolveInlineTags } from "./InlineTagParser.js";
import {
	type MarkupTemplate,
	getElementTagNames,
	parseMarkup,
	rewriteMarkup,
	serializeMarkup,
} from "./MarkupTree.js";

/**
 * Markdown replacements for the supported HTML elements.
 * Anchors are unwrapped; their targets are not rendered.
 */
const markdownTemplates: ReadonlyMap<string, MarkupTemplate> = new Map<string, MarkupTemplate>([
	["i", (content) => `*${content}*`],
	["b", (content) => `**${content}**`],
	["pre", (content) => `\`${content}\``],
	["code", (content) => `\`${content}\``],
	["a", (content) => content],
]);

/**
 * Determines whether `text` appears to contain HTML.
 *
 * @remarks
 * Heuristic: true if there is some opening tag `<name ...>` followed, anywhere later in the text, by `</name>`.
 * Proper nesting is not checked.
 *
 * @public
 */
export function isHtmlLike(text: string): boolean {
	const openingTagPattern = /<(\w+)[^>]*>/g;
	let match: RegExpExecArray | null;
	while ((match = openingTagPattern.exec(text)) !== null) {
		const closingTag = `</${match[1]}>`;
		if (text.includes(closingTag, match.index + match[0].length)) {
			return true;
		}
	}
	return false;
}

/**
 * Converts HTML-like comment text to Markdown.
 *
 * @remarks
 * Inline tags are resolved first. The result is parsed permissively, the supported elements (`i`, `b`, `pre`,
 * `code` and `a`) are replaced by their Markdown equivalents, innermost first, and everything else is written back
 * out as HTML.
 *
 * Character references are left for {@link decodeEntities}: only `lt`, `gt`, `amp` and `quot` are decoded by the
 * parser (and re-escaped on output), `nbsp` becomes a space, and other names are kept as `&name;`.
 *
 * Angle-bracketed text that is not meant as markup (e.g. `List<T>`) is still parsed as an element, and its text
 * may be lost. Elements without a closing tag in the input are reported through the logger's `verbose` channel.
 *
 * @throws If the text is nested deeper than {@link RenderConfiguration.maxMarkupDepth}.
 *
 * @public
 */
export function convertHtmlToMarkdown(html: string, config: Required<RenderConfiguration>): string {
	const text = escapeUnknownEntities(resolveInlineTags(html, config));
	const tree = parseMarkup(text, config.maxMarkupDepth);
	reportUnclosedElements(getElementTagNames(tree), text, config);
	return serializeMarkup(rewriteMarkup(tree, markdownTemplates));
}

function reportUnclosedElements(
	tagNames: ReadonlySet<string>,
	html: string,
	config: Required<RenderConfiguration>,
): void {
	const lowerCaseHtml = html.toLowerCase();
	for (const tagName of tagNames) {
		if (!htmlVoidElements.includes(tagName) && !lowerCaseHtml.includes(`</${tagName}`)) {
			config.logger.verbose(`Element <${tagName}> is not closed in the comment text.`);
		}
	}
}
