/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

export {
	AuthorBlockTag,
	type BlockTag,
	DeprecatedBlockTag,
	ParamBlockTag,
	ReturnBlockTag,
	SeeBlockTag,
	SinceBlockTag,
	ThrowsBlockTag,
	UnknownBlockTag,
} from "./BlockTag.js";
export type { DocComment } from "./DocComment.js";
export {
	type DocTreeNode,
	type DocTreeNodeBase,
	type DocTreeNodeType,
	EntityNode,
	ErroneousNode,
	LinkNode,
	LiteralNode,
	MarkupEndNode,
	MarkupStartNode,
	SeeReferenceNode,
	TextNode,
	UnknownTagNode,
} from "./DocTreeNode.js";
