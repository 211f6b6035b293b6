/**
 * RecipeMD parse pipeline.
 *
 * markdown -> block tree -> sections -> metadata / ingredient tree /
 * instructions -> Recipe. Synchronous and free of shared state.
 */

import type { BlockNode } from "@/types/markdown";
import type { Recipe } from "@/types/recipe";
import type { ParseOptionsInput } from "@/config/parse-options";
import type { RecipeWarning } from "./errors";

import { RecipeWarningsError, StructureError, WarningCollector } from "./errors";
import { parseBlocks } from "./markdown";
import {
  buildIngredientTree,
  classifyMetadata,
  collectInstructions,
  segmentSections,
} from "./parsers";
import { mapErrorToResult, parseSuccess, type ParseResult } from "./result";

import { resolveParseOptions } from "@/config/parse-options";
import { parserLogger as log } from "@/server/logger";

export interface ParseRecipeResult {
  recipe: Recipe;
  /** Non-fatal problems found while parsing, in document order per section */
  warnings: RecipeWarning[];
}

/**
 * Build a recipe from an already parsed block tree.
 *
 * `source` is the markdown the blocks were parsed from; description and
 * instruction blocks are sliced out of it verbatim.
 *
 * @throws StructureError when the title or (in strict mode) the divider is missing
 * @throws RecipeWarningsError when `failOnWarnings` is set and anything was reported
 */
export function parseRecipeBlocks(
  blocks: BlockNode[],
  source: string,
  options: ParseOptionsInput = {}
): ParseRecipeResult {
  const { mode, failOnWarnings } = resolveParseOptions(options);
  const warnings = new WarningCollector();

  const sections = segmentSections(blocks, mode, warnings);
  const metadata = classifyMetadata(sections.metadata, source, warnings);

  if (!metadata.title) {
    log.warn({ mode }, "Recipe has no title");
    throw new StructureError("MISSING_TITLE", "Recipe has no level-1 heading for its title.");
  }

  const recipe: Recipe = {
    title: metadata.title,
    description: metadata.description,
    tags: metadata.tags,
    yields: metadata.yields,
    ingredients: buildIngredientTree(sections.ingredients, warnings),
    instructions: collectInstructions(sections.instructions, source),
  };

  if (warnings.size > 0) {
    log.debug({ title: recipe.title, warnings: warnings.warnings }, "Recipe parsed with warnings");

    if (failOnWarnings) throw new RecipeWarningsError(warnings.warnings);
  }

  return { recipe, warnings: warnings.warnings };
}

/**
 * Parse a RecipeMD document.
 *
 * @throws StructureError when the title or (in strict mode) the divider is missing
 * @throws RecipeWarningsError when `failOnWarnings` is set and anything was reported
 */
export function parseRecipe(markdown: string, options: ParseOptionsInput = {}): ParseRecipeResult {
  return parseRecipeBlocks(parseBlocks(markdown), markdown, options);
}

/**
 * Non-throwing variant of parseRecipe.
 */
export function tryParseRecipe(markdown: string, options: ParseOptionsInput = {}): ParseResult<Recipe> {
  try {
    const { recipe, warnings } = parseRecipe(markdown, options);

    return parseSuccess(recipe, warnings);
  } catch (error) {
    const result = mapErrorToResult<Recipe>(error);

    if (result) return result;

    throw error;
  }
}

export { parseBlocks } from "./markdown";
export * from "./errors";
export type { ParseErrorCode, ParseResult } from "./result";
