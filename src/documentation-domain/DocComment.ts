/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import type { BlockTag } from "./BlockTag.js";
import type { DocTreeNode } from "./DocTreeNode.js";

/**
 * A parsed documentation comment attached to a declaration.
 *
 * @remarks Produced by an external parser (see {@link convertTsdocComment} for TSDoc input).
 * The renderer only reads it.
 *
 * @public
 */
export interface DocComment {
	/**
	 * The summary sentence.
	 */
	readonly firstSentence: readonly DocTreeNode[];

	/**
	 * The remainder of the comment body, following the summary.
	 */
	readonly body: readonly DocTreeNode[];

	/**
	 * Block tags, in source order.
	 */
	readonly blockTags: readonly BlockTag[];
}
