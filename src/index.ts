/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Renders documentation comments as Markdown, for display in editor hovers and completion items.
 *
 * @packageDocumentation
 */

export {
	type RenderConfiguration,
	defaultRenderConfiguration,
	getRenderConfigurationWithDefaults,
} from "./Configuration.js";
export {
	AuthorBlockTag,
	type BlockTag,
	DeprecatedBlockTag,
	type DocComment,
	type DocTreeNode,
	type DocTreeNodeBase,
	type DocTreeNodeType,
	EntityNode,
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
} from "./documentation-domain/index.js";
export {
	type HoverSource,
	type SymbolDocumentation,
	createCompletionDocumentation,
	createHover,
} from "./Hover.js";
export {
	type Logger,
	type LoggingFunction,
	defaultConsoleLogger,
	noopLogger,
	verboseConsoleLogger,
} from "./Logging.js";
export type { LoggingConfiguration } from "./LoggingConfiguration.js";
export {
	InlineTagParseError,
	convertHtmlToMarkdown,
	decodeEntities,
	decodeEntity,
	isHtmlLike,
	normalizeMarkdown,
	parseInlineTags,
	renderBlockTag,
	renderBlockTags,
	renderCommentTextAsMarkdown,
	renderCommentTextAsMarkupContent,
	renderDocCommentAsMarkdown,
	renderDocCommentAsMarkupContent,
	renderDocTree,
	resolveInlineTags,
} from "./renderers/index.js";
export { convertTsdocComment } from "./tsdoc/index.js";
