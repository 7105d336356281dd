/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { NewlineKind } from "@rushstack/node-core-library";
import { expect } from "chai";

import {
	DeprecatedBlockTag,
	type DocComment,
	LiteralNode,
	ParamBlockTag,
	ReturnBlockTag,
	TextNode,
} from "../../documentation-domain/index.js";
import { createTestConfig, createTestLogger } from "../../test/utilities/TestUtilities.js";
import {
	renderCommentTextAsMarkdown,
	renderCommentTextAsMarkupContent,
	renderDocCommentAsMarkdown,
	renderDocCommentAsMarkupContent,
} from "../DocCommentRenderer.js";

const addComment: DocComment = {
	firstSentence: [new TextNode("Adds numbers.")],
	body: [new TextNode("Uses "), new LiteralNode("+"), new TextNode(".")],
	blockTags: [
		new ParamBlockTag("a", [new TextNode("first")]),
		new ReturnBlockTag([new TextNode("the sum")]),
	],
};

describe("DocCommentRenderer", () => {
	describe("renderDocCommentAsMarkdown", () => {
		it("Renders each section separated by a blank line", () => {
			expect(renderDocCommentAsMarkdown(addComment, createTestConfig())).to.equal(
				"Adds numbers.\n\nUses `+`.\n\n@param a - first\n@return the sum",
			);
		});

		it("Omits blank sections", () => {
			const config = createTestConfig();
			expect(
				renderDocCommentAsMarkdown(
					{ firstSentence: [], body: [], blockTags: [new DeprecatedBlockTag([])] },
					config,
				),
			).to.equal("@deprecated");
			expect(
				renderDocCommentAsMarkdown(
					{ firstSentence: [new TextNode(" \n ")], body: [], blockTags: [] },
					config,
				),
			).to.equal("");
		});

		it("Uses the configured newline kind", () => {
			const config = createTestConfig(createTestLogger(), { newlineKind: NewlineKind.CrLf });
			const comment: DocComment = {
				firstSentence: [new TextNode("Adds numbers.")],
				body: [],
				blockTags: [new ReturnBlockTag([new TextNode("x")])],
			};
			expect(renderDocCommentAsMarkdown(comment, config)).to.equal(
				"Adds numbers.\r\n\r\n@return x",
			);
		});
	});

	describe("renderDocCommentAsMarkupContent", () => {
		it("Produces Markdown content", () => {
			expect(
				renderDocCommentAsMarkupContent(
					{ firstSentence: [new TextNode("Hi.")], body: [], blockTags: [] },
					createTestConfig(),
				),
			).to.deep.equal({ kind: "markdown", value: "Hi." });
		});
	});

	describe("renderCommentTextAsMarkdown", () => {
		it("Resolves inline tags in plain text", () => {
			expect(renderCommentTextAsMarkdown("{@code x < y}", createTestConfig())).to.equal(
				"`x < y`",
			);
		});

		it("Renders empty text as an empty string", () => {
			expect(renderCommentTextAsMarkdown("", createTestConfig())).to.equal("");
		});

		it("Converts HTML-like text", () => {
			expect(
				renderCommentTextAsMarkdown("<b>Warning</b>: deprecated", createTestConfig()),
			).to.equal("**Warning**: deprecated");
		});

		it("Decodes entities in converted HTML", () => {
			expect(
				renderCommentTextAsMarkdown("Use <code>a &lt; b</code> here", createTestConfig()),
			).to.equal("Use `a < b` here");
		});

		it("Decodes only the entity table in converted HTML", () => {
			const config = createTestConfig();
			expect(renderCommentTextAsMarkdown("<b>a</b>&nbsp;b", config)).to.equal("**a** b");
			expect(renderCommentTextAsMarkdown("<b>a</b> &copy; &mdash;", config)).to.equal(
				"**a** &copy; &mdash;",
			);
			expect(renderCommentTextAsMarkdown("<i>x</i> &amp;amp;", config)).to.equal("*x* &amp;");
		});

		it("Renders malformed inline tags as-is", () => {
			const logger = createTestLogger();
			expect(
				renderCommentTextAsMarkdown("<b>x</b> {@code y", createTestConfig(logger)),
			).to.equal("**x** {@code y");
			expect(logger.messages.warning).to.have.length(2);
		});

		it("Falls back to the unconverted text when conversion fails", () => {
			const logger = createTestLogger();
			const config = createTestConfig(logger, { maxMarkupDepth: 1 });
			expect(renderCommentTextAsMarkdown("<i><b>x</b></i> {@code y}", config)).to.equal(
				"<i><b>x</b></i> `y`",
			);
			expect(logger.messages.warning).to.deep.equal([
				"Failed to convert comment HTML, falling back to plain text: Markup is nested deeper than 1 levels.",
			]);
		});

		it("Normalizes input newlines and uses the configured newline kind", () => {
			const config = createTestConfig(createTestLogger(), { newlineKind: NewlineKind.CrLf });
			expect(renderCommentTextAsMarkdown("{@code a}\r\nb", config)).to.equal("`a`\r\nb");
		});
	});

	describe("renderCommentTextAsMarkupContent", () => {
		it("Produces Markdown content", () => {
			expect(
				renderCommentTextAsMarkupContent("{@literal 1 < 2}", createTestConfig()),
			).to.deep.equal({ kind: "markdown", value: "1 < 2" });
		});
	});
});
