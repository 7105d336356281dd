/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Named character references understood by the renderer.
 *
 * @remarks `nbsp` maps to a regular space so that Markdown renderers treat it like any other space.
 */
const entityValues: ReadonlyMap<string, string> = new Map([
	["lt", "<"],
	["gt", ">"],
	["amp", "&"],
	["nbsp", " "],
	["quot", '"'],
]);

const entityReferencePattern = /&(\w+);/g;

/**
 * Gets the text for the named character reference `name` (e.g. `"lt"`).
 * Unrecognized names are returned in reference form (`&name;`).
 *
 * @public
 */
export function decodeEntity(name: string): string {
	return entityValues.get(name) ?? `&${name};`;
}

/**
 * Replaces every named character reference in `text`, in a single pass.
 *
 * @example
 * `"&amp;amp;"` becomes `"&amp;"`.
 *
 * @public
 */
export function decodeEntities(text: string): string {
	return text.replace(entityReferencePattern, (_match, name: string) => decodeEntity(name));
}

/**
 * Rewrites named character references so that an HTML parser decodes them the way {@link decodeEntities} would.
 *
 * @remarks
 * `&nbsp;` becomes a regular space. References to names outside the renderer's table (e.g. `&copy;`) are escaped,
 * so they survive parsing as `&name;` text rather than being decoded to their HTML5 characters.
 */
export function escapeUnknownEntities(text: string): string {
	return text.replace(entityReferencePattern, (reference, name: string) => {
		if (name === "nbsp") {
			return " ";
		}
		return entityValues.has(name) ? reference : `&amp;${name};`;
	});
}
