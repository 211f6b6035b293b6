/**
 * Markdown (RecipeMD) rendering of a recipe.
 *
 * Output parses back to an equivalent recipe; it is not byte-identical to
 * whatever source the recipe was first read from.
 */

import type { Ingredient, IngredientEntry, Recipe } from "@/types/recipe";

import { formatAmountText } from "@/lib/parse-amount";
import { rendererLogger } from "@/server/logger";

const log = rendererLogger.child({ module: "markdown" });

const INLINE_SPECIALS = /[\\`*_[\]<&]/g;
const BLOCK_START = /^([#>+\-~=])/;
const ORDERED_MARKER = /^(\d+)([.)])/;

/**
 * Backslash-escape text so it reads back as the same literal inline text.
 */
export function escapeInline(text: string): string {
  return text.replace(INLINE_SPECIALS, "\\$&");
}

/**
 * Like escapeInline, but also for text placed at the start of a block, where
 * "#", ">", "-" or "1." would open a heading, quote or list.
 */
export function escapeBlockStart(text: string): string {
  return escapeInline(text).replace(BLOCK_START, "\\$1").replace(ORDERED_MARKER, "$1\\$2");
}

function escapeTitle(title: string): string {
  // a trailing "#" run would be read as the heading's closing sequence
  return escapeBlockStart(title).replace(/(?<!\\)#$/, "\\#");
}

function linkDestination(link: string): string {
  return /[\s()<>]/.test(link) ? `<${link.replace(/[<>]/g, "\\$&")}>` : link;
}

function renderIngredient(ingredient: Ingredient): string {
  const amount = ingredient.amount ? formatAmountText(ingredient.amount) : "";
  const prefix = amount ? `*${escapeInline(amount)}* ` : "";
  const name = prefix ? escapeInline(ingredient.name) : escapeBlockStart(ingredient.name);
  const text = ingredient.link ? `[${name}](${linkDestination(ingredient.link)})` : name;

  return `- ${prefix}${text}`;
}

function renderEntries(entries: IngredientEntry[]): string[] {
  const blocks: string[] = [];
  let run: string[] = [];

  const flush = (): void => {
    if (run.length > 0) blocks.push(run.join("\n"));
    run = [];
  };

  for (const entry of entries) {
    if (entry.type === "ingredient") {
      run.push(renderIngredient(entry));
    } else {
      flush();
      blocks.push(`${"#".repeat(entry.level)} ${escapeTitle(entry.name)}`);
      blocks.push(...renderEntries(entry.children));
    }
  }

  flush();

  return blocks;
}

export function renderRecipeMarkdown(recipe: Recipe): string {
  log.debug({ title: recipe.title }, "Rendering recipe as markdown");

  const blocks: string[] = [`# ${escapeTitle(recipe.title)}`, ...recipe.description];

  if (recipe.tags.length > 0) {
    blocks.push(`*${recipe.tags.map(escapeInline).join(", ")}*`);
  }

  if (recipe.yields.length > 0) {
    blocks.push(`**${recipe.yields.map((amount) => escapeInline(formatAmountText(amount))).join(", ")}**`);
  }

  blocks.push("---", ...renderEntries(recipe.ingredients));

  if (recipe.instructions.length > 0) {
    blocks.push("---", ...recipe.instructions);
  }

  return blocks.join("\n\n") + "\n";
}
