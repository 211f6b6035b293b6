/**
 * Adapter from mdast (mdast-util-from-markdown) to the parser-neutral block
 * tree the recipe pipeline reads.
 */

import type { Definition, Nodes, PhrasingContent, RootContent } from "mdast";
import type { BlockNode, InlineNode, SourcePosition } from "@/types/markdown";

import { fromMarkdown } from "mdast-util-from-markdown";

type Definitions = Map<string, Definition>;

function toPosition(node: Nodes): SourcePosition {
  const start = node.position?.start.offset ?? 0;
  const end = node.position?.end.offset ?? start;

  return { start, end };
}

/**
 * Reference-style links are resolved against every definition in the
 * document, wherever it appears.
 */
function collectDefinitions(nodes: RootContent[], into: Definitions = new Map()): Definitions {
  for (const node of nodes) {
    if (node.type === "definition") {
      if (!into.has(node.identifier)) into.set(node.identifier, node);
    } else if ("children" in node) {
      collectDefinitions(node.children, into);
    }
  }

  return into;
}

function toInlines(nodes: PhrasingContent[], definitions: Definitions): InlineNode[] {
  return nodes.map((node) => toInline(node, definitions));
}

function toInline(node: PhrasingContent, definitions: Definitions): InlineNode {
  switch (node.type) {
    case "text":
      return { kind: "text", value: node.value };
    case "emphasis":
      return { kind: "emphasis", strength: 1, children: toInlines(node.children, definitions) };
    case "strong":
      return { kind: "emphasis", strength: 2, children: toInlines(node.children, definitions) };
    case "link":
      return {
        kind: "link",
        destination: node.url,
        title: node.title ?? null,
        children: toInlines(node.children, definitions),
      };
    case "linkReference": {
      const definition = definitions.get(node.identifier);
      const children = toInlines(node.children, definitions);

      if (!definition) return { kind: "span", children };

      return { kind: "link", destination: definition.url, title: definition.title ?? null, children };
    }
    case "inlineCode":
    case "html":
      return { kind: "code", value: node.value };
    case "break":
      return { kind: "text", value: "\n" };
    case "image":
    case "imageReference":
      return { kind: "text", value: node.alt ?? "" };
    default:
      if ("children" in node) return { kind: "span", children: toInlines(node.children, definitions) };

      return { kind: "span", children: [] };
  }
}

function toBlocks(nodes: RootContent[], definitions: Definitions): BlockNode[] {
  return nodes.map((node) => toBlock(node, definitions));
}

function toBlock(node: RootContent, definitions: Definitions): BlockNode {
  const position = toPosition(node);

  switch (node.type) {
    case "heading":
      return {
        kind: "heading",
        level: node.depth,
        children: toInlines(node.children, definitions),
        position,
      };
    case "paragraph":
      return { kind: "paragraph", children: toInlines(node.children, definitions), position };
    case "list":
      return {
        kind: "list",
        ordered: node.ordered === true,
        items: node.children.map((item) => ({
          children: toBlocks(item.children, definitions),
          position: toPosition(item),
        })),
        position,
      };
    case "thematicBreak":
      return { kind: "thematicBreak", position };
    case "definition":
      return { kind: "definition", label: node.label ?? node.identifier, position };
    default:
      return { kind: "block", position };
  }
}

/**
 * Parse CommonMark source into top-level blocks.
 */
export function parseBlocks(markdown: string): BlockNode[] {
  const root = fromMarkdown(markdown);
  const definitions = collectDefinitions(root.children);

  return toBlocks(root.children, definitions);
}
