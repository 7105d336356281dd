/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { NewlineKind } from "@rushstack/node-core-library";
import { expect } from "chai";
import type { Range } from "vscode-languageserver-types";

import { type DocComment, ParamBlockTag, TextNode } from "../documentation-domain/index.js";
import { createCompletionDocumentation, createHover } from "../Hover.js";
import { createTestConfig, createTestLogger } from "./utilities/TestUtilities.js";

const comment: DocComment = {
	firstSentence: [new TextNode("Adds two numbers.")],
	body: [],
	blockTags: [new ParamBlockTag("a", [new TextNode("first")])],
};

describe("Hover", () => {
	describe("createHover", () => {
		it("Renders the signature followed by the documentation", () => {
			const hover = createHover(
				{
					signature: "add(a: number, b: number): number",
					language: "typescript",
					documentation: comment,
				},
				createTestConfig(),
			);
			expect(hover).to.deep.equal({
				contents: {
					kind: "markdown",
					value:
						"```typescript\nadd(a: number, b: number): number\n```\n\n---\n\nAdds two numbers.\n\n@param a - first",
				},
			});
		});

		it("Renders a header in place of the signature", () => {
			const hover = createHover(
				{
					header: " **pkg**\nclass Foo ",
					signature: "class Foo",
					documentation: "<b>Foo</b> docs",
				},
				createTestConfig(),
			);
			expect(hover?.contents).to.deep.equal({
				kind: "markdown",
				value: "**pkg**\nclass Foo\n\n---\n\n**Foo** docs",
			});
		});

		it("Renders just the signature when there is no documentation", () => {
			const config = createTestConfig();
			const expected = { contents: { kind: "markdown", value: "```\nx: number\n```" } };
			expect(createHover({ signature: "x: number" }, config)).to.deep.equal(expected);
			expect(createHover({ signature: "x: number", documentation: "  " }, config)).to.deep.equal(
				expected,
			);
		});

		it("Renders just the documentation when there is no signature", () => {
			expect(
				createHover({ documentation: "{@code x}" }, createTestConfig())?.contents,
			).to.deep.equal({ kind: "markdown", value: "`x`" });
		});

		it("Returns undefined when there is nothing to display", () => {
			const config = createTestConfig();
			expect(createHover({}, config)).to.be.undefined;
			expect(createHover({ signature: " ", documentation: "" }, config)).to.be.undefined;
		});

		it("Includes the range", () => {
			const range: Range = {
				start: { line: 1, character: 2 },
				end: { line: 1, character: 5 },
			};
			expect(createHover({ signature: "foo", range }, createTestConfig())?.range).to.deep.equal(
				range,
			);
		});

		it("Uses the configured newline kind", () => {
			const config = createTestConfig(createTestLogger(), { newlineKind: NewlineKind.CrLf });
			expect(
				createHover({ signature: "foo", documentation: "Bar." }, config)?.contents,
			).to.deep.equal({
				kind: "markdown",
				value: "```\r\nfoo\r\n```\r\n\r\n---\r\n\r\nBar.",
			});
		});
	});

	describe("createCompletionDocumentation", () => {
		it("Renders documentation as Markdown content", () => {
			expect(createCompletionDocumentation("{@code x}", createTestConfig())).to.deep.equal({
				kind: "markdown",
				value: "`x`",
			});
			expect(createCompletionDocumentation(comment, createTestConfig())).to.deep.equal({
				kind: "markdown",
				value: "Adds two numbers.\n\n@param a - first",
			});
		});

		it("Returns undefined for blank documentation", () => {
			expect(createCompletionDocumentation(" \n ", createTestConfig())).to.be.undefined;
		});
	});
});
