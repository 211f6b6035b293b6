import type { Amount, IngredientEntry, Recipe } from "@/types/recipe";
import type { ScaleOptionsInput } from "@/config/parse-options";

import { formatAmount, type AmountDisplayMode } from "./format-amount";

import { ScaleOptionsSchema } from "@/config/parse-options";

function scaleAmount(amount: Amount, factor: number, mode: AmountDisplayMode): Amount {
  if (amount.quantity === null) return amount;

  const quantity = amount.quantity * factor;
  const text = formatAmount(quantity, mode);

  return {
    quantity,
    unit: amount.unit,
    originalText: amount.unit ? `${text} ${amount.unit}` : text,
  };
}

function scaleEntries(
  entries: IngredientEntry[],
  factor: number,
  mode: AmountDisplayMode
): IngredientEntry[] {
  return entries.map((entry) => {
    if (entry.type === "group") {
      return { ...entry, children: scaleEntries(entry.children, factor, mode) };
    }

    return { ...entry, amount: entry.amount ? scaleAmount(entry.amount, factor, mode) : null };
  });
}

/**
 * Multiply every yield and ingredient quantity by `factor`.
 *
 * Scaled amounts get new text in the chosen display mode ("fraction" by
 * default: 2 1/4 cups doubled is "4 ½ cups"). Amounts without a number are
 * left as they are.
 */
export function scaleRecipe(recipe: Recipe, factor: number, options: ScaleOptionsInput = {}): Recipe {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new Error(`Scale factor must be a positive number, got ${factor}`);
  }

  const { mode } = ScaleOptionsSchema.parse(options);

  return {
    ...recipe,
    description: [...recipe.description],
    tags: [...recipe.tags],
    instructions: [...recipe.instructions],
    yields: recipe.yields.map((amount) => scaleAmount(amount, factor, mode)),
    ingredients: scaleEntries(recipe.ingredients, factor, mode),
  };
}

/**
 * Scale a recipe so that the yield with the target's unit reaches the
 * target quantity. Units match case-insensitively.
 */
export function scaleRecipeToYield(
  recipe: Recipe,
  target: Amount,
  options: ScaleOptionsInput = {}
): Recipe {
  if (target.quantity === null) {
    throw new Error(`Target yield "${target.originalText.trim()}" has no quantity`);
  }

  const unit = target.unit.trim().toLowerCase();
  const match = recipe.yields.find(
    (amount) => amount.quantity !== null && amount.unit.trim().toLowerCase() === unit
  );

  if (!match || !match.quantity) {
    throw new Error(`Recipe has no yield in "${target.unit}"`);
  }

  return scaleRecipe(recipe, target.quantity / match.quantity, options);
}
