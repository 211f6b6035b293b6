/**
 * Ingredient line parsing.
 *
 * An ingredient is one list item: an optional leading italic amount, then the
 * name, which may be (or contain) a single link to another recipe.
 */

import type { InlineNode, LinkNode, ListBlock } from "@/types/markdown";
import type { Amount, Ingredient } from "@/types/recipe";
import type { WarningCollector } from "../errors";

import { readAmount } from "./amount";
import { flattenInlines, inlineText } from "./text";

/**
 * Parse the inline content of one ingredient list item.
 *
 * Returns null (with an EMPTY_INGREDIENT warning) when nothing is left for the
 * name once the amount is taken off.
 */
export function parseIngredientLine(
  inlines: InlineNode[],
  warnings: WarningCollector,
  offset?: number
): Ingredient | null {
  let amount: Amount | null = null;
  let rest = inlines;

  const [first] = inlines;

  if (first && first.kind === "emphasis" && first.strength === 1) {
    amount = readAmount(flattenInlines(first.children), warnings, offset);
    rest = inlines.slice(1);
  }

  const links = rest.filter((node): node is LinkNode => node.kind === "link");
  const name = inlineText(rest);

  if (!name) {
    warnings.add("EMPTY_INGREDIENT", "Ingredient without a name was dropped.", offset);

    return null;
  }

  return {
    type: "ingredient",
    amount,
    name,
    link: links.length === 1 ? links[0].destination : null,
  };
}

/**
 * Parse every item of an ingredient list, in order.
 *
 * Only the first paragraph of an item is read; anything else it holds (nested
 * lists, code blocks, further paragraphs) is reported and skipped.
 */
export function parseIngredientList(list: ListBlock, warnings: WarningCollector): Ingredient[] {
  const ingredients: Ingredient[] = [];

  for (const item of list.items) {
    const paragraphIndex = item.children.findIndex((block) => block.kind === "paragraph");
    const paragraph = item.children[paragraphIndex];

    item.children.forEach((block, i) => {
      if (i !== paragraphIndex) {
        warnings.add(
          "IGNORED_BLOCK",
          `Ignored ${block.kind} block inside an ingredient.`,
          block.position.start
        );
      }
    });

    const inlines = paragraph && paragraph.kind === "paragraph" ? paragraph.children : [];
    const ingredient = parseIngredientLine(inlines, warnings, item.position.start);

    if (ingredient) ingredients.push(ingredient);
  }

  return ingredients;
}
