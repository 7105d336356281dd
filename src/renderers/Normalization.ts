/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import type { RenderConfiguration } from "../Configuration.js";
import { resolveInlineTags } from "./InlineTagParser.js";

/**
 * Final clean-up pass applied to rendered Markdown.
 *
 * @remarks
 * Trims the text, drops trailing spaces and tabs at the ends of lines, limits runs of blank lines to one, and
 * resolves any inline tags that survived rendering.
 */
export function normalizeMarkdown(text: string, config: Required<RenderConfiguration>): string {
	const normalized = text
		.trim()
		.replace(/[\t ]+\n/g, "\n")
		.replace(/\n{3,}/g, "\n\n");
	return resolveInlineTags(normalized, config);
}
