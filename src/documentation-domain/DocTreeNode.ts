/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Base interface for nodes of a documentation tree.
 *
 * @public
 */
export interface DocTreeNodeBase<TType extends string = string> {
	/**
	 * Discriminant identifying the kind of node.
	 */
	readonly type: TType;
}

/**
 * A run of prose.
 *
 * @remarks Whitespace spanning line breaks is collapsed when rendered, unless the text appears within a
 * `<code>` or `<pre>` element.
 *
 * @public
 */
export class TextNode implements DocTreeNodeBase<"text"> {
	public readonly type = "text";

	public constructor(
		/**
		 * The raw prose.
		 */
		public readonly body: string,
	) {}
}

/**
 * A verbatim span (e.g. `{@literal ...}` or `{@code ...}` content supplied by the tree parser).
 *
 * @remarks Always rendered as an inline code span, never whitespace-collapsed.
 *
 * @public
 */
export class LiteralNode implements DocTreeNodeBase<"literal"> {
	public readonly type = "literal";

	public constructor(public readonly body: string) {}
}

/**
 * A cross-reference link.
 *
 * @public
 */
export class LinkNode implements DocTreeNodeBase<"link"> {
	public readonly type = "link";

	public constructor(
		/**
		 * The symbol or URL being referenced.
		 *
		 * @remarks Used as the link's display text (as code) when no label is present.
		 */
		public readonly reference: string,

		/**
		 * Optional explicit display label.
		 */
		public readonly label: readonly DocTreeNode[] = [],
	) {}
}

/**
 * A reference appearing as the content of a `@see` tag.
 *
 * @public
 */
export class SeeReferenceNode implements DocTreeNodeBase<"seeReference"> {
	public readonly type = "seeReference";

	public constructor(public readonly reference: readonly DocTreeNode[]) {}
}

/**
 * An opening markup element marker (e.g. `<code>`).
 *
 * @public
 */
export class MarkupStartNode implements DocTreeNodeBase<"markupStart"> {
	public readonly type = "markupStart";

	public constructor(
		/**
		 * Element name, e.g. `"b"`. Compared case-insensitively.
		 */
		public readonly name: string,

		/**
		 * Whether the element was written in self-closing form (e.g. `<br/>`).
		 * Self-closing elements are never considered "open".
		 */
		public readonly selfClosing: boolean = false,
	) {}
}

/**
 * A closing markup element marker (e.g. `</code>`).
 *
 * @public
 */
export class MarkupEndNode implements DocTreeNodeBase<"markupEnd"> {
	public readonly type = "markupEnd";

	public constructor(public readonly name: string) {}
}

/**
 * A named character reference, e.g. `&lt;`.
 *
 * @public
 */
export class EntityNode implements DocTreeNodeBase<"entity"> {
	public readonly type = "entity";

	public constructor(
		/**
		 * The entity name, without the surrounding `&` and `;`.
		 */
		public readonly name: string,
	) {}
}

/**
 * A construct the tree parser could not make sense of.
 *
 * @public
 */
export class ErroneousNode implements DocTreeNodeBase<"erroneous"> {
	public readonly type = "erroneous";

	public constructor(
		/**
		 * The raw text that was captured.
		 */
		public readonly body: string,
	) {}
}

/**
 * An inline tag or element the tree parser did not recognize.
 *
 * @public
 */
export class UnknownTagNode implements DocTreeNodeBase<"unknownTag"> {
	public readonly type = "unknownTag";

	public constructor(public readonly rawText: string) {}
}

/**
 * The closed set of documentation tree nodes.
 *
 * @public
 */
export type DocTreeNode =
	| TextNode
	| LiteralNode
	| LinkNode
	| SeeReferenceNode
	| MarkupStartNode
	| MarkupEndNode
	| EntityNode
	| ErroneousNode
	| UnknownTagNode;

/**
 * {@link DocTreeNode} discriminant values.
 *
 * @public
 */
export type DocTreeNodeType = DocTreeNode["type"];
