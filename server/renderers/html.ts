/**
 * HTML rendering of a recipe.
 *
 * Markup uses a fixed class vocabulary (recipe-*, ingredient-*) so that
 * consumers can style it; schema.org Recipe microdata can be added on top.
 * Description and instruction blocks are markdown and are converted through
 * mdast/hast, with raw HTML dropped and the tree sanitized. Link URLs with a
 * scheme other than http(s) or mailto are removed.
 */

import type { Ingredient, IngredientEntry, IngredientGroup, Recipe } from "@/types/recipe";
import type { RenderHtmlOptionsInput } from "@/config/parse-options";

import { sanitize } from "hast-util-sanitize";
import { toHtml } from "hast-util-to-html";
import { encode } from "html-entities";
import { fromMarkdown } from "mdast-util-from-markdown";
import { toHast } from "mdast-util-to-hast";
import { sanitizeUri } from "micromark-util-sanitize-uri";

import { RenderHtmlOptionsSchema } from "@/config/parse-options";
import { formatAmountText } from "@/lib/parse-amount";
import { rendererLogger } from "@/server/logger";

const log = rendererLogger.child({ module: "html" });

type ItemProp =
  | "name"
  | "description"
  | "keywords"
  | "recipeYield"
  | "recipeIngredient"
  | "recipeInstructions";

const SAFE_PROTOCOL = /^(https?|mailto)$/i;

/**
 * Convert markdown blocks to sanitized HTML.
 *
 * `definitions` are link reference definitions from elsewhere in the recipe;
 * they resolve references in `blocks` and render nothing themselves.
 */
export function markdownToHtml(blocks: string[], definitions: string[] = []): string {
  const tree = toHast(fromMarkdown([...blocks, ...definitions].join("\n\n")));

  return toHtml(sanitize(tree));
}

/**
 * Source of the top-level link reference definitions among markdown blocks.
 */
export function definitionSources(blocks: string[]): string[] {
  const source = blocks.join("\n\n");

  return fromMarkdown(source).children.flatMap((node) => {
    const start = node.position?.start.offset;
    const end = node.position?.end.offset;

    return node.type === "definition" && start !== undefined && end !== undefined
      ? [source.slice(start, end)]
      : [];
  });
}

class HtmlWriter {
  private readonly lines: string[] = [];

  constructor(private readonly schemaOrg: boolean) {}

  attrs(className: string, itemprop?: ItemProp): string {
    const prop = this.schemaOrg && itemprop ? ` itemprop="${itemprop}"` : "";

    return ` class="${className}"${prop}`;
  }

  line(html: string): void {
    this.lines.push(html);
  }

  toString(): string {
    return this.lines.join("\n") + "\n";
  }
}

function renderIngredient(ingredient: Ingredient, out: HtmlWriter): string {
  const href = ingredient.link ? sanitizeUri(ingredient.link, SAFE_PROTOCOL) : "";
  const name = href ? `<a href="${encode(href)}">${encode(ingredient.name)}</a>` : encode(ingredient.name);
  const amount = ingredient.amount
    ? `<em${out.attrs("ingredient-amount")}>${encode(formatAmountText(ingredient.amount))}</em> `
    : "";

  return `<li${out.attrs("ingredient", "recipeIngredient")}>${amount}<span${out.attrs("ingredient-name")}>${name}</span></li>`;
}

function renderGroup(group: IngredientGroup, out: HtmlWriter): void {
  const tag = `h${Math.max(2, group.level)}`;

  out.line(`<section${out.attrs("ingredient-group")}>`);
  out.line(`<${tag}${out.attrs("ingredient-group-title")}>${encode(group.name)}</${tag}>`);
  renderEntries(group.children, out);
  out.line("</section>");
}

/**
 * Consecutive ingredients share one list; each group gets its own section.
 */
function renderEntries(entries: IngredientEntry[], out: HtmlWriter): void {
  let run: Ingredient[] = [];

  const flush = (): void => {
    if (run.length === 0) return;

    out.line(`<ul${out.attrs("ingredient-list")}>`);
    run.forEach((ingredient) => out.line(renderIngredient(ingredient, out)));
    out.line("</ul>");
    run = [];
  };

  for (const entry of entries) {
    if (entry.type === "ingredient") {
      run.push(entry);
    } else {
      flush();
      renderGroup(entry, out);
    }
  }

  flush();
}

/**
 * Render a recipe as an HTML fragment rooted at `<article class="recipe">`.
 * Empty sections are left out.
 */
export function renderRecipeHtml(recipe: Recipe, options: RenderHtmlOptionsInput = {}): string {
  const { schemaOrg } = RenderHtmlOptionsSchema.parse(options);
  const out = new HtmlWriter(schemaOrg);

  log.debug({ title: recipe.title, schemaOrg }, "Rendering recipe as HTML");

  out.line(
    schemaOrg
      ? `<article class="recipe" itemscope itemtype="https://schema.org/Recipe">`
      : `<article class="recipe">`
  );
  out.line(`<h1${out.attrs("recipe-title", "name")}>${encode(recipe.title)}</h1>`);

  if (recipe.description.length > 0) {
    out.line(`<div${out.attrs("recipe-description", "description")}>`);
    out.line(markdownToHtml(recipe.description, definitionSources(recipe.instructions)));
    out.line("</div>");
  }

  if (recipe.tags.length > 0) {
    out.line(`<ul${out.attrs("recipe-tags")}>`);
    recipe.tags.forEach((tag) => out.line(`<li${out.attrs("recipe-tag", "keywords")}>${encode(tag)}</li>`));
    out.line("</ul>");
  }

  if (recipe.yields.length > 0) {
    out.line(`<ul${out.attrs("recipe-yields")}>`);
    recipe.yields.forEach((amount) =>
      out.line(`<li${out.attrs("recipe-yield", "recipeYield")}>${encode(formatAmountText(amount))}</li>`)
    );
    out.line("</ul>");
  }

  if (recipe.ingredients.length > 0) {
    out.line(`<section${out.attrs("recipe-ingredients")}>`);
    renderEntries(recipe.ingredients, out);
    out.line("</section>");
  }

  if (recipe.instructions.length > 0) {
    out.line(`<div${out.attrs("recipe-instructions", "recipeInstructions")}>`);
    out.line(markdownToHtml(recipe.instructions, definitionSources(recipe.description)));
    out.line("</div>");
  }

  out.line("</article>");

  return out.toString();
}
