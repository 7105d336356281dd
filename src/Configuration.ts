/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { NewlineKind } from "@rushstack/node-core-library";

import { defaultConsoleLogger } from "./Logging.js";
import type { LoggingConfiguration } from "./LoggingConfiguration.js";

/**
 * Configuration options for rendering documentation comments as Markdown.
 *
 * @public
 */
export interface RenderConfiguration extends LoggingConfiguration {
	/**
	 * Specifies what type of newlines should be used in the rendered Markdown.
	 *
	 * @remarks Input is always normalized to `\n` before rendering; this only affects the output.
	 *
	 * @defaultValue {@link @rushstack/node-core-library#NewlineKind.Lf}
	 */
	readonly newlineKind?: NewlineKind;

	/**
	 * Maximum nesting depth of brace-delimited inline tags (e.g. `{@code {@link Foo}}`).
	 * Deeper input is treated as malformed, and the affected text is rendered as-is.
	 *
	 * @defaultValue 64
	 */
	readonly maxNestingDepth?: number;

	/**
	 * Maximum element depth accepted when converting HTML-like comment text.
	 * Deeper input is treated as malformed, and the text is rendered without conversion.
	 *
	 * @defaultValue 64
	 */
	readonly maxMarkupDepth?: number;
}

/**
 * {@link RenderConfiguration} defaults.
 *
 * @public
 */
export const defaultRenderConfiguration: Required<RenderConfiguration> = {
	logger: defaultConsoleLogger,
	newlineKind: NewlineKind.Lf,
	maxNestingDepth: 64,
	maxMarkupDepth: 64,
};

/**
 * Creates a complete configuration by filling in any optional properties with defaults.
 *
 * @param partialConfig - Configuration with optional properties. Any missing properties will be filled in with
 * default values. Any specified properties will take precedence over defaults.
 *
 * @public
 */
export function getRenderConfigurationWithDefaults(
	partialConfig?: RenderConfiguration,
): Required<RenderConfiguration> {
	return {
		...defaultRenderConfiguration,
		...partialConfig,
	};
}
