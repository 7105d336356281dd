/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import {
	type DocBlock,
	DocCodeSpan,
	type DocComment as TsdocComment,
	DocErrorText,
	DocEscapedText,
	DocFencedCode,
	DocHtmlEndTag,
	DocHtmlStartTag,
	DocInheritDocTag,
	DocInlineTag,
	DocLinkTag,
	type DocNode,
	DocParagraph,
	DocPlainText,
	type DocSection,
	DocSoftBreak,
	StandardTags,
} from "@microsoft/tsdoc";

import { type RenderConfiguration, getRenderConfigurationWithDefaults } from "../Configuration.js";
import {
	AuthorBlockTag,
	type BlockTag,
	DeprecatedBlockTag,
	type DocComment,
	type DocTreeNode,
	ErroneousNode,
	LinkNode,
	LiteralNode,
	MarkupEndNode,
	MarkupStartNode,
	ParamBlockTag,
	ReturnBlockTag,
	SeeBlockTag,
	SeeReferenceNode,
	SinceBlockTag,
	TextNode,
	ThrowsBlockTag,
	UnknownBlockTag,
	UnknownTagNode,
} from "../documentation-domain/index.js";
import { renderDocTree } from "../renderers/index.js";

/**
 * Non-standard TSDoc block tags with a dedicated {@link BlockTag} kind.
 * These must be defined in the parser's `TSDocConfiguration` to be recognized.
 */
const authorTagName = "@AUTHOR";
const sinceTagName = "@SINCE";

/**
 * Converts a comment parsed by `@microsoft/tsdoc` into a {@link DocComment}.
 *
 * @remarks
 * The summary section becomes {@link DocComment.firstSentence} and the `@remarks` block becomes
 * {@link DocComment.body}.
 *
 * Block tags are ordered: type parameters, parameters, `@returns`, custom blocks (in source order), `@see` blocks,
 * then `@deprecated`. Modifier tags, `@privateRemarks` and `@inheritDoc` are not represented.
 *
 * @param docComment - The parsed TSDoc comment.
 * @param partialConfig - See {@link RenderConfiguration}.
 *
 * @public
 */
export function convertTsdocComment(
	docComment: TsdocComment,
	partialConfig?: RenderConfiguration,
): DocComment {
	const config = getRenderConfigurationWithDefaults(partialConfig);

	const blockTags: BlockTag[] = [];
	for (const typeParam of docComment.typeParams.blocks) {
		blockTags.push(
			new ParamBlockTag(typeParam.parameterName, convertSection(typeParam.content, config), true),
		);
	}
	for (const param of docComment.params.blocks) {
		blockTags.push(new ParamBlockTag(param.parameterName, convertSection(param.content, config)));
	}
	if (docComment.returnsBlock !== undefined) {
		blockTags.push(new ReturnBlockTag(convertSection(docComment.returnsBlock.content, config)));
	}
	for (const customBlock of docComment.customBlocks) {
		blockTags.push(convertCustomBlock(customBlock, config));
	}
	for (const seeBlock of docComment.seeBlocks) {
		blockTags.push(
			new SeeBlockTag([new SeeReferenceNode(convertSection(seeBlock.content, config))]),
		);
	}
	if (docComment.deprecatedBlock !== undefined) {
		blockTags.push(
			new DeprecatedBlockTag(convertSection(docComment.deprecatedBlock.content, config)),
		);
	}

	return {
		firstSentence: convertSection(docComment.summarySection, config),
		body:
			docComment.remarksBlock === undefined
				? []
				: convertSection(docComment.remarksBlock.content, config),
		blockTags,
	};
}

function convertCustomBlock(block: DocBlock, config: Required<RenderConfiguration>): BlockTag {
	switch (block.blockTag.tagNameWithUpperCase) {
		case StandardTags.throws.tagNameWithUpperCase: {
			const { exceptionName, description } = splitExceptionName(block.content, config);
			return new ThrowsBlockTag(exceptionName, description);
		}
		case authorTagName: {
			return new AuthorBlockTag(convertSection(block.content, config));
		}
		case sinceTagName: {
			return new SinceBlockTag(convertSection(block.content, config));
		}
		default: {
			const tagName = block.blockTag.tagName;
			const content = renderDocTree(convertSection(block.content, config), config);
			if (content.length === 0) {
				return new UnknownBlockTag(tagName);
			}
			// Multi-line content (e.g. a code fence) must start on its own line.
			const separator = content.includes("\n") ? "\n" : " ";
			return new UnknownBlockTag(`${tagName}${separator}${content}`);
		}
	}
}

/**
 * Separates a leading `{@link Type}` or code span from the rest of a `@throws` block.
 */
function splitExceptionName(
	section: DocSection,
	config: Required<RenderConfiguration>,
): { exceptionName: string; description: DocTreeNode[] } {
	const [firstNode, ...remainingNodes] = section.nodes;
	if (firstNode instanceof DocParagraph) {
		const leadIndex = firstNode.nodes.findIndex((node) => !isWhitespace(node));
		const lead = leadIndex === -1 ? undefined : firstNode.nodes[leadIndex];
		const exceptionName = lead === undefined ? undefined : getExceptionName(lead);
		if (exceptionName !== undefined) {
			return {
				exceptionName,
				description: [
					...convertInlineNodes(firstNode.nodes.slice(leadIndex + 1), config),
					...convertSectionNodes(remainingNodes, 1, config),
				],
			};
		}
	}
	return { exceptionName: "", description: convertSection(section, config) };
}

function getExceptionName(node: DocNode): string | undefined {
	if (node instanceof DocLinkTag) {
		return node.linkText ?? getLinkReference(node);
	}
	if (node instanceof DocCodeSpan) {
		return node.code;
	}
	return undefined;
}

function convertSection(section: DocSection, config: Required<RenderConfiguration>): DocTreeNode[] {
	return convertSectionNodes(section.nodes, 0, config);
}

/**
 * Converts the block-level contents of a section.
 * Every paragraph after the first is preceded by a (self-closing) `p` marker.
 */
function convertSectionNodes(
	nodes: readonly DocNode[],
	precedingParagraphCount: number,
	config: Required<RenderConfiguration>,
): DocTreeNode[] {
	const result: DocTreeNode[] = [];
	let paragraphCount = precedingParagraphCount;
	for (const node of nodes) {
		if (node instanceof DocParagraph) {
			if (paragraphCount > 0) {
				result.push(new MarkupStartNode("p", true));
			}
			paragraphCount++;
			result.push(...convertInlineNodes(node.nodes, config));
		} else if (node instanceof DocFencedCode) {
			result.push(
				new MarkupStartNode("pre"),
				new TextNode(node.code.replace(/\n$/, "")),
				new MarkupEndNode("pre"),
			);
		} else {
			result.push(...convertInlineNodes([node], config));
		}
	}
	return result;
}

/**
 * Converts inline content. Adjacent plain text and soft breaks are merged into a single {@link TextNode}, so that
 * whitespace around line breaks collapses as a whole.
 */
function convertInlineNodes(
	nodes: readonly DocNode[],
	config: Required<RenderConfiguration>,
): DocTreeNode[] {
	const result: DocTreeNode[] = [];
	let pendingText = "";

	const flushText = (): void => {
		if (pendingText.length > 0) {
			result.push(new TextNode(pendingText));
			pendingText = "";
		}
	};

	for (const node of nodes) {
		if (node instanceof DocPlainText) {
			pendingText += node.text;
		} else if (node instanceof DocSoftBreak) {
			pendingText += "\n";
		} else if (node instanceof DocEscapedText) {
			pendingText += node.decodedText;
		} else {
			flushText();
			const converted = convertInlineNode(node, config);
			if (converted !== undefined) {
				result.push(converted);
			}
		}
	}
	flushText();

	return result;
}

function convertInlineNode(
	node: DocNode,
	config: Required<RenderConfiguration>,
): DocTreeNode | undefined {
	if (node instanceof DocCodeSpan) {
		return new LiteralNode(node.code);
	}
	if (node instanceof DocLinkTag) {
		return new LinkNode(
			getLinkReference(node),
			node.linkText === undefined ? [] : [new TextNode(node.linkText)],
		);
	}
	if (node instanceof DocHtmlStartTag) {
		return new MarkupStartNode(node.name, node.selfClosingTag);
	}
	if (node instanceof DocHtmlEndTag) {
		return new MarkupEndNode(node.name);
	}
	if (node instanceof DocErrorText) {
		return new ErroneousNode(node.text);
	}
	if (node instanceof DocInheritDocTag) {
		const reference = node.declarationReference?.emitAsTsdoc();
		return new UnknownTagNode(
			reference === undefined ? `{${node.tagName}}` : `{${node.tagName} ${reference}}`,
		);
	}
	if (node instanceof DocInlineTag) {
		return new UnknownTagNode(
			node.tagContent.length === 0
				? `{${node.tagName}}`
				: `{${node.tagName} ${node.tagContent}}`,
		);
	}

	config.logger.verbose(`Skipping unsupported TSDoc node of kind "${node.kind}".`);
	return undefined;
}

function getLinkReference(linkTag: DocLinkTag): string {
	return linkTag.codeDestination?.emitAsTsdoc() ?? linkTag.urlDestination ?? "";
}

function isWhitespace(node: DocNode): boolean {
	return node instanceof DocSoftBreak || (node instanceof DocPlainText && node.text.trim().length === 0);
}
