/**
 * Structured (JSON) export of a recipe, and import back into the model.
 */

import type { Amount, HeadingLevel, Ingredient, IngredientEntry, IngredientGroup, Recipe } from "@/types/recipe";
import type {
  AmountExport,
  IngredientExport,
  IngredientGroupExport,
  RecipeExport,
} from "@/types/dto/recipe-export";

import { amountFactor, formatAmountText, parseAmount } from "@/lib/parse-amount";
import { rendererLogger } from "@/server/logger";
import { RecipeExportSchema } from "@/server/zodSchemas/recipe-export";

const log = rendererLogger.child({ module: "json" });

/** Heading level of imported groups by nesting depth */
const GROUP_LEVELS: readonly HeadingLevel[] = [2, 3, 4, 5, 6];

function joinBlocks(blocks: string[]): string | null {
  return blocks.length > 0 ? blocks.join("\n\n") : null;
}

export function toAmountExport(amount: Amount): AmountExport {
  const factor = amountFactor(amount);

  if (factor === null) {
    return { factor: formatAmountText(amount), unit: null };
  }

  return { factor, unit: amount.unit || null };
}

function toIngredientExport(ingredient: Ingredient): IngredientExport {
  return {
    name: ingredient.name,
    amount: ingredient.amount ? toAmountExport(ingredient.amount) : null,
    link: ingredient.link,
  };
}

function toIngredientGroupExport(group: IngredientGroup): IngredientGroupExport {
  return {
    title: group.name,
    ...splitEntries(group.children),
  };
}

/**
 * Bare ingredients and groups of one level go to separate arrays.
 */
function splitEntries(entries: IngredientEntry[]): Omit<IngredientGroupExport, "title"> {
  const ingredients: IngredientExport[] = [];
  const groups: IngredientGroupExport[] = [];

  for (const entry of entries) {
    if (entry.type === "ingredient") {
      ingredients.push(toIngredientExport(entry));
    } else {
      groups.push(toIngredientGroupExport(entry));
    }
  }

  return { ingredients, ingredient_groups: groups };
}

export function toRecipeExport(recipe: Recipe): RecipeExport {
  const { ingredients, ingredient_groups } = splitEntries(recipe.ingredients);

  return {
    title: recipe.title,
    description: joinBlocks(recipe.description),
    tags: [...recipe.tags],
    yields: recipe.yields.map(toAmountExport),
    ingredients,
    ingredient_groups,
    instructions: joinBlocks(recipe.instructions),
  };
}

/**
 * Pretty-printed JSON export with a trailing newline.
 */
export function renderRecipeJson(recipe: Recipe): string {
  log.debug({ title: recipe.title }, "Rendering recipe as JSON");

  return JSON.stringify(toRecipeExport(recipe), null, 2) + "\n";
}

function fromAmountExport(amount: AmountExport): Amount {
  return parseAmount(amount.unit === null ? amount.factor : `${amount.factor} ${amount.unit}`);
}

function fromIngredientExport(ingredient: IngredientExport): Ingredient {
  return {
    type: "ingredient",
    amount: ingredient.amount ? fromAmountExport(ingredient.amount) : null,
    name: ingredient.name,
    link: ingredient.link,
  };
}

function toHeadingLevel(depth: number): HeadingLevel {
  return GROUP_LEVELS[Math.min(depth, GROUP_LEVELS.length - 1)];
}

function fromEntries(
  ingredients: IngredientExport[],
  groups: IngredientGroupExport[],
  depth: number
): IngredientEntry[] {
  return [
    ...ingredients.map(fromIngredientExport),
    ...groups.map(
      (group): IngredientGroup => ({
        type: "group",
        name: group.title,
        level: toHeadingLevel(depth),
        children: fromEntries(group.ingredients, group.ingredient_groups, depth + 1),
      })
    ),
  ];
}

/**
 * Rebuild a recipe from a JSON export.
 *
 * Amounts are re-parsed from their factor and unit. The export does not keep
 * heading levels, so groups get h2 at the top and one level deeper per
 * nesting step (never past h6).
 *
 * @throws ZodError when the value is not a recipe export
 */
export function recipeFromExport(value: unknown): Recipe {
  const data = RecipeExportSchema.parse(value);

  return {
    title: data.title,
    description: data.description ? [data.description] : [],
    tags: data.tags,
    yields: data.yields.map(fromAmountExport),
    ingredients: fromEntries(data.ingredients, data.ingredient_groups, 0),
    instructions: data.instructions ? [data.instructions] : [],
  };
}
