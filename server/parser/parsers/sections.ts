/**
 * Section segmentation for RecipeMD documents.
 *
 * A recipe is split by thematic breaks into metadata, ingredients and
 * instructions.
 */

import type { ParseMode } from "@/config/parse-options";
import type { BlockNode } from "@/types/markdown";

import { StructureError, type WarningCollector } from "../errors";

import { parserLogger } from "@/server/logger";

const log = parserLogger.child({ module: "sections" });

export interface RecipeSections {
  metadata: BlockNode[];
  ingredients: BlockNode[];
  instructions: BlockNode[];
}

/**
 * Partition top-level blocks at the first two thematic breaks.
 *
 * - before the first break: metadata
 * - between the first and second break (or to the end): ingredients
 * - after the second break: instructions, including any later breaks
 *
 * Without any break, strict mode throws a StructureError; permissive mode
 * treats everything as metadata and records a warning.
 */
export function segmentSections(
  blocks: BlockNode[],
  mode: ParseMode,
  warnings: WarningCollector
): RecipeSections {
  const first = blocks.findIndex((block) => block.kind === "thematicBreak");

  if (first === -1) {
    if (mode === "strict") {
      log.warn("No thematic break found in strict mode");
      throw new StructureError(
        "MISSING_DIVIDER",
        "Recipe has no thematic break separating metadata from ingredients."
      );
    }

    warnings.add(
      "MISSING_DIVIDER",
      "Recipe has no thematic break; the whole document was read as metadata."
    );

    return { metadata: [...blocks], ingredients: [], instructions: [] };
  }

  const offset = blocks.slice(first + 1).findIndex((block) => block.kind === "thematicBreak");
  const second = offset === -1 ? -1 : first + 1 + offset;

  log.debug({ blocks: blocks.length, first, second }, "Segmented recipe sections");

  if (second === -1) {
    return {
      metadata: blocks.slice(0, first),
      ingredients: blocks.slice(first + 1),
      instructions: [],
    };
  }

  return {
    metadata: blocks.slice(0, first),
    ingredients: blocks.slice(first + 1, second),
    instructions: blocks.slice(second + 1),
  };
}
