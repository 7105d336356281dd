/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { Text } from "@rushstack/node-core-library";
import { type Hover, type MarkupContent, MarkupKind, type Range } from "vscode-languageserver-types";

import { type RenderConfiguration, getRenderConfigurationWithDefaults } from "./Configuration.js";
import type { DocComment } from "./documentation-domain/index.js";
import { renderCommentTextAsMarkdown, renderDocCommentAsMarkdown } from "./renderers/index.js";

/**
 * Documentation attached to a symbol: either a parsed comment, or unparsed comment text.
 *
 * @public
 */
export type SymbolDocumentation = DocComment | string;

/**
 * Input to {@link createHover}.
 *
 * @remarks Symbol lookup and signature formatting are the caller's responsibility.
 *
 * @public
 */
export interface HoverSource {
	/**
	 * Pre-formatted declaration signature. Rendered as a fenced code block.
	 * Ignored if {@link HoverSource.header} is provided.
	 */
	readonly signature?: string;

	/**
	 * Language identifier for the signature's code fence (e.g. `"typescript"`).
	 *
	 * @defaultValue No language is specified.
	 */
	readonly language?: string;

	/**
	 * Pre-rendered Markdown to display in place of the signature block (e.g. a type's package and heritage).
	 */
	readonly header?: string;

	/**
	 * Documentation to display below the signature.
	 */
	readonly documentation?: SymbolDocumentation;

	/**
	 * Range of the hovered symbol.
	 */
	readonly range?: Range;
}

/**
 * Separator between the signature and the documentation of a hover.
 */
const hoverSectionSeparator = "\n\n---\n\n";

/**
 * Creates the hover for a symbol: its signature, followed by its documentation.
 *
 * @returns The hover, or `undefined` if there is nothing to display.
 *
 * @public
 */
export function createHover(
	source: HoverSource,
	partialConfig?: RenderConfiguration,
): Hover | undefined {
	const config = getRenderConfigurationWithDefaults(partialConfig);

	const sections: string[] = [];
	if (source.header !== undefined && source.header.trim().length > 0) {
		sections.push(source.header.trim());
	} else if (source.signature !== undefined && source.signature.trim().length > 0) {
		sections.push(`\`\`\`${source.language ?? ""}\n${source.signature.trim()}\n\`\`\``);
	}

	const documentation =
		source.documentation === undefined
			? ""
			: renderDocumentationAsMarkdown(source.documentation, config);
	if (documentation.length > 0) {
		sections.push(documentation);
	}

	if (sections.length === 0) {
		return undefined;
	}

	const contents: MarkupContent = {
		kind: MarkupKind.Markdown,
		value: Text.convertTo(sections.join(hoverSectionSeparator), config.newlineKind),
	};
	return source.range === undefined ? { contents } : { contents, range: source.range };
}

/**
 * Creates the documentation of a completion item.
 *
 * @returns The rendered documentation, or `undefined` if it renders blank.
 *
 * @public
 */
export function createCompletionDocumentation(
	documentation: SymbolDocumentation,
	partialConfig?: RenderConfiguration,
): MarkupContent | undefined {
	const config = getRenderConfigurationWithDefaults(partialConfig);
	const value = renderDocumentationAsMarkdown(documentation, config);
	return value.length === 0 ? undefined : { kind: MarkupKind.Markdown, value };
}

function renderDocumentationAsMarkdown(
	documentation: SymbolDocumentation,
	config: Required<RenderConfiguration>,
): string {
	const markdown =
		typeof documentation === "string"
			? renderCommentTextAsMarkdown(documentation, config)
			: renderDocCommentAsMarkdown(documentation, config);
	return markdown.trim();
}
