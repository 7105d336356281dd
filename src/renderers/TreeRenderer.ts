/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import type { RenderConfiguration } from "../Configuration.js";
import type {
	DocTreeNode,
	LinkNode,
	MarkupEndNode,
	MarkupStartNode,
	TextNode,
} from "../documentation-domain/index.js";
import { decodeEntity } from "./Entities.js";
import { normalizeMarkdown } from "./Normalization.js";

/**
 * Markdown emitted when an element opens.
 */
const openingTokens: ReadonlyMap<string, string> = new Map([
	["p", "\n\n"],
	["br", "\n"],
	["pre", "\n\n```\n"],
	["code", "`"],
	["b", "**"],
	["strong", "**"],
	["i", "*"],
	["em", "*"],
]);

/**
 * Markdown emitted when an element closes.
 */
const closingTokens: ReadonlyMap<string, string> = new Map([
	["p", "\n\n"],
	["pre", "\n```\n"],
	["code", "`"],
	["b", "**"],
	["strong", "**"],
	["i", "*"],
	["em", "*"],
]);

/**
 * Elements whose text content is written verbatim.
 */
const verbatimElements: ReadonlySet<string> = new Set(["code", "pre"]);

/**
 * State for a single {@link renderDocTree} call.
 */
interface RenderContext {
	readonly output: string[];

	/**
	 * Names of the elements currently open, most recently opened last.
	 */
	readonly openElements: string[];

	readonly config: Required<RenderConfiguration>;
}

/**
 * Renders a sequence of documentation nodes as Markdown.
 *
 * @remarks The result is trimmed and normalized (see {@link normalizeMarkdown}).
 *
 * @public
 */
export function renderDocTree(
	nodes: readonly DocTreeNode[],
	config: Required<RenderConfiguration>,
): string {
	const context: RenderContext = { output: [], openElements: [], config };
	for (const node of nodes) {
		renderNode(node, context);
	}
	return normalizeMarkdown(context.output.join(""), config);
}

function renderNode(node: DocTreeNode, context: RenderContext): void {
	switch (node.type) {
		case "text": {
			renderText(node, context);
			break;
		}
		case "literal": {
			context.output.push(`\`${node.body}\``);
			break;
		}
		case "link": {
			renderLink(node, context);
			break;
		}
		case "seeReference": {
			context.output.push(renderDocTree(node.reference, context.config));
			break;
		}
		case "markupStart": {
			renderMarkupStart(node, context);
			break;
		}
		case "markupEnd": {
			renderMarkupEnd(node, context);
			break;
		}
		case "entity": {
			context.output.push(decodeEntity(node.name));
			break;
		}
		case "erroneous": {
			context.output.push(node.body);
			break;
		}
		case "unknownTag": {
			context.output.push(node.rawText);
			break;
		}
		default: {
			const unexpectedNode: never = node;
			throw new Error(`Unrecognized documentation node: ${JSON.stringify(unexpectedNode)}`);
		}
	}
}

function renderText(node: TextNode, context: RenderContext): void {
	if (isWithinVerbatimElement(context)) {
		context.output.push(node.body);
		return;
	}
	context.output.push(node.body.replace(/\s*\n\s*/g, " ").replace(/ {2,}/g, " "));
}

function renderLink(node: LinkNode, context: RenderContext): void {
	const label = renderDocTree(node.label, context.config);
	if (label.trim().length > 0) {
		context.output.push(label);
		return;
	}
	if (node.reference.trim().length > 0) {
		context.output.push(`\`${node.reference}\``);
	}
}

function renderMarkupStart(node: MarkupStartNode, context: RenderContext): void {
	const name = node.name.toLowerCase();
	context.output.push(openingTokens.get(name) ?? "");
	if (!node.selfClosing) {
		context.openElements.push(name);
	}
}

function renderMarkupEnd(node: MarkupEndNode, context: RenderContext): void {
	const name = node.name.toLowerCase();
	context.output.push(closingTokens.get(name) ?? "");
	const index = context.openElements.lastIndexOf(name);
	if (index !== -1) {
		context.openElements.splice(index, 1);
	}
}

function isWithinVerbatimElement(context: RenderContext): boolean {
	return context.openElements.some((name) => verbatimElements.has(name));
}
