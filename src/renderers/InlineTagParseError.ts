/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Thrown when brace-delimited inline tags in comment text cannot be parsed (unbalanced braces, or nesting
 * beyond {@link RenderConfiguration.maxNestingDepth}).
 *
 * @public
 */
export class InlineTagParseError extends Error {
	public constructor(
		message: string,

		/**
		 * Offset into the input at which the problem was detected.
		 */
		public readonly position: number,
	) {
		super(`${message} (at offset ${position})`);
		this.name = "InlineTagParseError";
	}
}
