/**
 * Text helpers shared by the recipe parsers.
 */

import type {
  EmphasisNode,
  EmphasisStrength,
  InlineNode,
  SourcePosition,
} from "@/types/markdown";

/**
 * Concatenate the text of inline nodes, dropping all markup.
 */
export function flattenInlines(nodes: InlineNode[]): string {
  return nodes.map(flattenInline).join("");
}

function flattenInline(node: InlineNode): string {
  switch (node.kind) {
    case "text":
    case "code":
      return node.value;
    case "emphasis":
    case "link":
    case "span":
      return flattenInlines(node.children);
  }
}

/**
 * Collapse runs of whitespace (including soft line breaks) to single spaces
 * and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Plain, single-line text of inline content. Used for titles, tags, names.
 */
export function inlineText(nodes: InlineNode[]): string {
  return collapseWhitespace(flattenInlines(nodes));
}

/**
 * Markdown source of a node, trimmed.
 */
export function sliceSource(source: string, position: SourcePosition): string {
  return source.slice(position.start, position.end).trim();
}

/**
 * The emphasis run that makes up the whole of some inline content, if there
 * is exactly one child and it is emphasis of the given strength.
 */
export function exhaustiveEmphasis(
  children: InlineNode[],
  strength: EmphasisStrength
): EmphasisNode | null {
  if (children.length !== 1) return null;

  const [only] = children;

  return only.kind === "emphasis" && only.strength === strength ? only : null;
}
