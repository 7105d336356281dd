/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { Text } from "@rushstack/node-core-library";
import { type MarkupContent, MarkupKind } from "vscode-languageserver-types";

import {
	type RenderConfiguration,
	getRenderConfigurationWithDefaults,
} from "../Configuration.js";
import type { DocComment } from "../documentation-domain/index.js";
import { renderBlockTags } from "./BlockTagRenderer.js";
import { decodeEntities } from "./Entities.js";
import { convertHtmlToMarkdown, isHtmlLike } from "./HtmlToMarkdown.js";
import { resolveInlineTags } from "./InlineTagParser.js";
import { renderDocTree } from "./TreeRenderer.js";

/**
 * Renders a documentation comment as Markdown.
 *
 * @remarks
 * The summary, the body, and the block tags are rendered as separate sections, separated by a blank line.
 * Sections that render blank are omitted.
 *
 * @param comment - The comment to render.
 * @param partialConfig - See {@link RenderConfiguration}.
 *
 * @public
 */
export function renderDocCommentAsMarkdown(
	comment: DocComment,
	partialConfig?: RenderConfiguration,
): string {
	const config = getRenderConfigurationWithDefaults(partialConfig);

	const sections = [
		renderDocTree(comment.firstSentence, config),
		renderDocTree(comment.body, config),
		renderBlockTags(comment.blockTags, config),
	].filter((section) => section.trim().length > 0);

	return Text.convertTo(sections.join("\n\n"), config.newlineKind);
}

/**
 * Renders a documentation comment as Markdown {@link vscode-languageserver-types#MarkupContent}.
 *
 * @public
 */
export function renderDocCommentAsMarkupContent(
	comment: DocComment,
	partialConfig?: RenderConfiguration,
): MarkupContent {
	return {
		kind: MarkupKind.Markdown,
		value: renderDocCommentAsMarkdown(comment, partialConfig),
	};
}

/**
 * Renders unparsed comment text as Markdown.
 *
 * @remarks
 * Text that looks like HTML (see {@link isHtmlLike}) is converted to Markdown. If the conversion fails, a
 * warning is logged and the text is used as-is.
 *
 * Inline tags are then resolved, and (for converted HTML) character references are decoded.
 *
 * @param text - The comment text, without comment delimiters.
 * @param partialConfig - See {@link RenderConfiguration}.
 *
 * @public
 */
export function renderCommentTextAsMarkdown(
	text: string,
	partialConfig?: RenderConfiguration,
): string {
	const config = getRenderConfigurationWithDefaults(partialConfig);

	let markdown = Text.convertToLf(text);
	if (isHtmlLike(markdown)) {
		try {
			markdown = decodeEntities(
				resolveInlineTags(convertHtmlToMarkdown(markdown, config), config),
			);
		} catch (error: unknown) {
			config.logger.warning(
				`Failed to convert comment HTML, falling back to plain text: ${errorMessage(error)}`,
			);
			markdown = resolveInlineTags(markdown, config);
		}
	} else {
		markdown = resolveInlineTags(markdown, config);
	}

	return Text.convertTo(markdown, config.newlineKind);
}

/**
 * Renders unparsed comment text as Markdown {@link vscode-languageserver-types#MarkupContent}.
 *
 * @public
 */
export function renderCommentTextAsMarkupContent(
	text: string,
	partialConfig?: RenderConfiguration,
): MarkupContent {
	return {
		kind: MarkupKind.Markdown,
		value: renderCommentTextAsMarkdown(text, partialConfig),
	};
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
