/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import type { RenderConfiguration } from "../Configuration.js";
import type { BlockTag } from "../documentation-domain/index.js";
import { normalizeMarkdown } from "./Normalization.js";
import { renderDocTree } from "./TreeRenderer.js";

/**
 * Renders block tags as Markdown, one tag per line.
 *
 * @example
 * ```md
 * @param value - The value to format.
 * @return The formatted value.
 * ```
 *
 * @public
 */
export function renderBlockTags(
	blockTags: readonly BlockTag[],
	config: Required<RenderConfiguration>,
): string {
	const lines = blockTags.map((blockTag) => renderBlockTag(blockTag, config));
	return normalizeMarkdown(lines.join("\n"), config);
}

/**
 * Renders a single block tag as a line of Markdown.
 *
 * @public
 */
export function renderBlockTag(blockTag: BlockTag, config: Required<RenderConfiguration>): string {
	switch (blockTag.kind) {
		case "author": {
			return formatBlockTag("@author", renderDocTree(blockTag.name, config));
		}
		case "since": {
			return formatBlockTag("@since", renderDocTree(blockTag.body, config));
		}
		case "see": {
			return formatBlockTag("@see", renderDocTree(blockTag.reference, config));
		}
		case "param": {
			return formatParamBlockTag(
				blockTag.name,
				renderDocTree(blockTag.description, config),
				blockTag.isTypeParameter,
			);
		}
		case "return": {
			return formatBlockTag("@return", renderDocTree(blockTag.description, config));
		}
		case "throws": {
			return formatThrowsBlockTag(
				blockTag.exceptionName,
				renderDocTree(blockTag.description, config),
			);
		}
		case "deprecated": {
			return formatBlockTag("@deprecated", renderDocTree(blockTag.body, config));
		}
		case "unknown": {
			config.logger.verbose(`Rendering unrecognized block tag as raw text: ${blockTag.rawText}`);
			return blockTag.rawText;
		}
		default: {
			const unexpectedTag: never = blockTag;
			throw new Error(`Unrecognized block tag: ${JSON.stringify(unexpectedTag)}`);
		}
	}
}

/**
 * `label body`, or just `label` if the body is blank.
 */
function formatBlockTag(label: string, body: string): string {
	return isBlank(body) ? label : `${label} ${body}`;
}

function formatParamBlockTag(name: string, description: string, isTypeParameter: boolean): string {
	const label = `${isTypeParameter ? "@typeparam" : "@param"} ${name}`;
	return isBlank(description) ? label : `${label} - ${description}`;
}

function formatThrowsBlockTag(exceptionName: string, description: string): string {
	if (isBlank(exceptionName)) {
		return formatBlockTag("@throws", description);
	}
	const label = `@throws ${exceptionName}`;
	return isBlank(description) ? label : `${label} - ${description}`;
}

function isBlank(text: string): boolean {
	return text.trim().length === 0;
}
