/**
 * Metadata classification for RecipeMD documents.
 *
 * Everything before the first thematic break: the title heading, tags
 * (a paragraph that is one italic run), yields (a paragraph that is one bold
 * run) and free-form description blocks.
 */

import type { BlockNode, ParagraphBlock } from "@/types/markdown";
import type { Amount } from "@/types/recipe";
import type { WarningCollector } from "../errors";

import { readAmount } from "./amount";
import { collapseWhitespace, exhaustiveEmphasis, flattenInlines, inlineText, sliceSource } from "./text";

import { splitList } from "@/lib/split-list";
import { parserLogger } from "@/server/logger";

const log = parserLogger.child({ module: "metadata" });

export interface ParsedMetadata {
  /** Null when the section holds no level-1 heading */
  title: string | null;
  description: string[];
  tags: string[];
  yields: Amount[];
}

/**
 * Tags text of a paragraph that is a single italic run, else null.
 */
export function getTagsText(paragraph: ParagraphBlock): string | null {
  const emphasis = exhaustiveEmphasis(paragraph.children, 1);

  return emphasis ? flattenInlines(emphasis.children) : null;
}

/**
 * Yields text of a paragraph that is a single bold run, else null.
 */
export function getYieldsText(paragraph: ParagraphBlock): string | null {
  const strong = exhaustiveEmphasis(paragraph.children, 2);

  return strong ? flattenInlines(strong.children) : null;
}

/**
 * Classify the metadata blocks of a recipe.
 *
 * The first level-1 heading is the title, the first all-italic paragraph the
 * tags and the first all-bold paragraph the yields. Repeats of any of these
 * are kept as description and reported as ambiguity warnings.
 */
export function classifyMetadata(
  blocks: BlockNode[],
  source: string,
  warnings: WarningCollector
): ParsedMetadata {
  let title: string | null = null;
  let tags: string[] | null = null;
  let yields: Amount[] | null = null;
  const description: string[] = [];

  const toDescription = (block: BlockNode): void => {
    const text = sliceSource(source, block.position);

    if (text) description.push(text);
  };

  for (const block of blocks) {
    if (block.kind === "heading" && block.level === 1) {
      if (title === null) {
        title = inlineText(block.children);
      } else {
        warnings.add(
          "DUPLICATE_TITLE",
          `Additional title "${inlineText(block.children)}" was kept as description.`,
          block.position.start
        );
        toDescription(block);
      }

      continue;
    }

    if (block.kind !== "paragraph") {
      toDescription(block);

      continue;
    }

    const tagsText = getTagsText(block);

    if (tagsText !== null) {
      if (tags === null) {
        tags = splitList(tagsText).map(collapseWhitespace);
      } else {
        warnings.add(
          "DUPLICATE_TAGS",
          "Additional tags paragraph was kept as description.",
          block.position.start
        );
        toDescription(block);
      }

      continue;
    }

    const yieldsText = getYieldsText(block);

    if (yieldsText !== null) {
      if (yields === null) {
        yields = splitList(yieldsText).map((segment) =>
          readAmount(segment, warnings, block.position.start)
        );
      } else {
        warnings.add(
          "DUPLICATE_YIELDS",
          "Additional yields paragraph was kept as description.",
          block.position.start
        );
        toDescription(block);
      }

      continue;
    }

    toDescription(block);
  }

  log.debug(
    { title, tags: tags?.length ?? 0, yields: yields?.length ?? 0, description: description.length },
    "Classified recipe metadata"
  );

  return { title, description, tags: tags ?? [], yields: yields ?? [] };
}
