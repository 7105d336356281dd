/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import type { RenderConfiguration } from "../Configuration.js";
import { InlineTagParseError } from "./InlineTagParseError.js";
import { TextCursor } from "./TextCursor.js";

/**
 * Inline tags whose content is rendered as a code span.
 */
const codeSpanTagNames: ReadonlySet<string> = new Set(["code", "link", "linkplain"]);

const alphabeticPattern = /\p{Alphabetic}/u;

/**
 * Resolves brace-delimited inline tags (`{@code ...}`, `{@link ...}`, etc.) in the provided text.
 *
 * @remarks
 * `code`, `link` and `linkplain` tags become code spans, `literal` tags are replaced by their content.
 * Unrecognized tags are logged and replaced by their content.
 * Braces that do not introduce a tag are preserved.
 *
 * @throws {@link InlineTagParseError} if the text contains a `{` without a matching `}`, or if tags are nested
 * deeper than {@link RenderConfiguration.maxNestingDepth}.
 *
 * @public
 */
export function parseInlineTags(text: string, config: Required<RenderConfiguration>): string {
	const cursor = new TextCursor(text);
	const output: string[] = [];
	while (cursor.hasCharacters) {
		parseContent(cursor, output, 0, config);
		// Stopped on a `}` with no matching `{`: not part of any tag.
		if (cursor.hasCharacters) {
			output.push(cursor.consumeChar());
		}
	}
	return output.join("");
}

/**
 * Best-effort variant of {@link parseInlineTags}.
 * If the text cannot be parsed, a warning is logged and the text is returned unmodified.
 *
 * @public
 */
export function resolveInlineTags(text: string, config: Required<RenderConfiguration>): string {
	if (!text.includes("{")) {
		return text;
	}

	try {
		return parseInlineTags(text, config);
	} catch (error: unknown) {
		if (error instanceof InlineTagParseError) {
			config.logger.warning(
				`Could not parse inline tags, rendering the text as-is: ${error.message}`,
			);
			return text;
		}
		throw error;
	}
}

/**
 * Copies text to `output` until the end of input or an unmatched `}`, which is left unconsumed.
 */
function parseContent(
	cursor: TextCursor,
	output: string[],
	depth: number,
	config: Required<RenderConfiguration>,
): void {
	while (cursor.hasCharacters) {
		switch (cursor.peek()) {
			case "{": {
				parseBraces(cursor, output, depth, config);
				break;
			}
			case "}": {
				return;
			}
			default: {
				output.push(cursor.consumeChar());
				break;
			}
		}
	}
}

function parseBraces(
	cursor: TextCursor,
	output: string[],
	depth: number,
	config: Required<RenderConfiguration>,
): void {
	if (depth >= config.maxNestingDepth) {
		throw new InlineTagParseError(
			`Braces nested deeper than ${config.maxNestingDepth} levels`,
			cursor.position,
		);
	}

	cursor.expect("{");

	if (cursor.peek() !== "@") {
		output.push("{");
		parseContent(cursor, output, depth + 1, config);
		cursor.expect("}");
		output.push("}");
		return;
	}

	const tagName = parseTagName(cursor);
	if (cursor.peek() === " ") {
		cursor.consumeChar();
	}

	const content: string[] = [];
	parseContent(cursor, content, depth + 1, config);
	cursor.expect("}");

	const innerText = content.join("");
	if (codeSpanTagNames.has(tagName)) {
		output.push(`\`${innerText}\``);
	} else if (tagName === "literal") {
		output.push(innerText);
	} else {
		config.logger.warning(`Unknown inline tag "@${tagName}". Rendering its content as plain text.`);
		output.push(innerText);
	}
}

function parseTagName(cursor: TextCursor): string {
	cursor.expect("@");
	let tagName = "";
	let char = cursor.peek();
	while (char !== undefined && alphabeticPattern.test(char)) {
		tagName += cursor.consumeChar();
		char = cursor.peek();
	}
	return tagName;
}
