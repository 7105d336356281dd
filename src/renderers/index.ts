/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

export { renderBlockTag, renderBlockTags } from "./BlockTagRenderer.js";
export {
	renderCommentTextAsMarkdown,
	renderCommentTextAsMarkupContent,
	renderDocCommentAsMarkdown,
	renderDocCommentAsMarkupContent,
} from "./DocCommentRenderer.js";
export { decodeEntities, decodeEntity } from "./Entities.js";
export { convertHtmlToMarkdown, isHtmlLike } from "./HtmlToMarkdown.js";
export { InlineTagParseError } from "./InlineTagParseError.js";
export { parseInlineTags, resolveInlineTags } from "./InlineTagParser.js";
export { normalizeMarkdown } from "./Normalization.js";
export { renderDocTree } from "./TreeRenderer.js";
