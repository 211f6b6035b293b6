/**
 * Parser-neutral markdown block tree.
 *
 * The recipe pipeline only reads these shapes; an adapter maps whatever
 * CommonMark implementation is in use onto them.
 */

import type { HeadingLevel } from "./recipe";

export interface SourcePosition {
  /** Offset of the first character in the document source */
  start: number;
  /** Offset one past the last character */
  end: number;
}

export type EmphasisStrength = 1 | 2;

export interface TextNode {
  kind: "text";
  value: string;
}

export interface EmphasisNode {
  kind: "emphasis";
  strength: EmphasisStrength;
  children: InlineNode[];
}

export interface LinkNode {
  kind: "link";
  destination: string;
  title: string | null;
  children: InlineNode[];
}

/** Inline code or raw inline HTML */
export interface CodeNode {
  kind: "code";
  value: string;
}

/** Any other inline container */
export interface SpanNode {
  kind: "span";
  children: InlineNode[];
}

export type InlineNode = TextNode | EmphasisNode | LinkNode | CodeNode | SpanNode;

export interface HeadingBlock {
  kind: "heading";
  level: HeadingLevel;
  children: InlineNode[];
  position: SourcePosition;
}

export interface ParagraphBlock {
  kind: "paragraph";
  children: InlineNode[];
  position: SourcePosition;
}

export interface ListItemNode {
  children: BlockNode[];
  position: SourcePosition;
}

export interface ListBlock {
  kind: "list";
  ordered: boolean;
  items: ListItemNode[];
  position: SourcePosition;
}

export interface ThematicBreakBlock {
  kind: "thematicBreak";
  position: SourcePosition;
}

/**
 * A link reference definition. Links using it are already resolved in the
 * inline tree; the block is kept so its source travels with the section.
 */
export interface DefinitionBlock {
  kind: "definition";
  label: string;
  position: SourcePosition;
}

/** Code blocks, block quotes, raw HTML and anything else kept only as source */
export interface OpaqueBlock {
  kind: "block";
  position: SourcePosition;
}

export type BlockNode =
  | HeadingBlock
  | ParagraphBlock
  | ListBlock
  | ThematicBreakBlock
  | DefinitionBlock
  | OpaqueBlock;
