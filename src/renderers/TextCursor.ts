/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { InlineTagParseError } from "./InlineTagParseError.js";

/**
 * Single-pass cursor over a string.
 */
export class TextCursor {
	private index = 0;

	public constructor(private readonly contents: string) {}

	/**
	 * Current offset into the text.
	 */
	public get position(): number {
		return this.index;
	}

	public get hasCharacters(): boolean {
		return this.index < this.contents.length;
	}

	/**
	 * Returns the next character without consuming it, or `undefined` at the end of input.
	 */
	public peek(): string | undefined {
		return this.contents[this.index];
	}

	/**
	 * Returns the next character and advances past it.
	 */
	public consumeChar(): string {
		const char = this.contents[this.index];
		if (char === undefined) {
			throw new InlineTagParseError("Unexpected end of input", this.index);
		}
		this.index += 1;
		return char;
	}

	/**
	 * Consumes the next character, which must be `expected`.
	 */
	public expect(expected: string): void {
		const position = this.index;
		const actual = this.consumeChar();
		if (actual !== expected) {
			throw new InlineTagParseError(`Expected "${expected}" but found "${actual}"`, position);
		}
	}
}
