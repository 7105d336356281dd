/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import type { DocTreeNode } from "./DocTreeNode.js";

/**
 * `@author` tag.
 *
 * @public
 */
export class AuthorBlockTag {
	public readonly kind = "author";

	public constructor(public readonly name: readonly DocTreeNode[]) {}
}

/**
 * `@since` tag.
 *
 * @public
 */
export class SinceBlockTag {
	public readonly kind = "since";

	public constructor(public readonly body: readonly DocTreeNode[]) {}
}

/**
 * `@see` tag.
 *
 * @public
 */
export class SeeBlockTag {
	public readonly kind = "see";

	public constructor(public readonly reference: readonly DocTreeNode[]) {}
}

/**
 * `@param` tag, or a type parameter tag when {@link ParamBlockTag.isTypeParameter} is set.
 *
 * @public
 */
export class ParamBlockTag {
	public readonly kind = "param";

	public constructor(
		public readonly name: string,
		public readonly description: readonly DocTreeNode[],
		public readonly isTypeParameter: boolean = false,
	) {}
}

/**
 * `@return` / `@returns` tag.
 *
 * @public
 */
export class ReturnBlockTag {
	public readonly kind = "return";

	public constructor(public readonly description: readonly DocTreeNode[]) {}
}

/**
 * `@throws` / `@exception` tag.
 *
 * @public
 */
export class ThrowsBlockTag {
	public readonly kind = "throws";

	public constructor(
		/**
		 * Name of the thrown type. May be empty if the comment only describes the condition.
		 */
		public readonly exceptionName: string,
		public readonly description: readonly DocTreeNode[],
	) {}
}

/**
 * `@deprecated` tag.
 *
 * @public
 */
export class DeprecatedBlockTag {
	public readonly kind = "deprecated";

	public constructor(public readonly body: readonly DocTreeNode[]) {}
}

/**
 * A block tag outside of the supported set. Rendered as its raw text.
 *
 * @public
 */
export class UnknownBlockTag {
	public readonly kind = "unknown";

	public constructor(public readonly rawText: string) {}
}

/**
 * The closed set of block tags.
 *
 * @public
 */
export type BlockTag =
	| AuthorBlockTag
	| SinceBlockTag
	| SeeBlockTag
	| ParamBlockTag
	| ReturnBlockTag
	| ThrowsBlockTag
	| DeprecatedBlockTag
	| UnknownBlockTag;
