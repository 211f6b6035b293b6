import { describe, it, expect } from "vitest";

import type { Recipe } from "@/types/recipe";

import { parseRecipe } from "@/server/parser";
import { definitionSources, markdownToHtml, renderRecipeHtml } from "@/server/renderers/html";

const FISH: Recipe = {
  title: "Fish & <Chips>",
  description: [],
  tags: ["quick"],
  yields: [{ quantity: 2, unit: "servings", originalText: "2 servings" }],
  ingredients: [
    {
      type: "ingredient",
      amount: { quantity: 1, unit: "kg", originalText: "1 kg" },
      name: "fish",
      link: null,
    },
    { type: "ingredient", amount: null, name: "chips", link: "./chips.md" },
  ],
  instructions: [],
};

describe("renderRecipeHtml", () => {
  it("renders the fixed class vocabulary and escapes text", () => {
    expect(renderRecipeHtml(FISH)).toBe(
      [
        '<article class="recipe">',
        '<h1 class="recipe-title">Fish &amp; &lt;Chips&gt;</h1>',
        '<ul class="recipe-tags">',
        '<li class="recipe-tag">quick</li>',
        "</ul>",
        '<ul class="recipe-yields">',
        '<li class="recipe-yield">2 servings</li>',
        "</ul>",
        '<section class="recipe-ingredients">',
        '<ul class="ingredient-list">',
        '<li class="ingredient"><em class="ingredient-amount">1 kg</em> <span class="ingredient-name">fish</span></li>',
        '<li class="ingredient"><span class="ingredient-name"><a href="./chips.md">chips</a></span></li>',
        "</ul>",
        "</section>",
        "</article>",
        "",
      ].join("\n")
    );
  });

  it("omits empty sections", () => {
    const recipe: Recipe = { ...FISH, tags: [], yields: [], ingredients: [] };

    expect(renderRecipeHtml(recipe)).toBe(
      '<article class="recipe">\n<h1 class="recipe-title">Fish &amp; &lt;Chips&gt;</h1>\n</article>\n'
    );
  });

  it("adds schema.org microdata when asked", () => {
    const html = renderRecipeHtml(FISH, { schemaOrg: true });

    expect(html.split("\n")).toEqual(
      expect.arrayContaining([
        '<article class="recipe" itemscope itemtype="https://schema.org/Recipe">',
        '<h1 class="recipe-title" itemprop="name">Fish &amp; &lt;Chips&gt;</h1>',
        '<li class="recipe-tag" itemprop="keywords">quick</li>',
        '<li class="recipe-yield" itemprop="recipeYield">2 servings</li>',
        '<li class="ingredient" itemprop="recipeIngredient"><span class="ingredient-name"><a href="./chips.md">chips</a></span></li>',
      ])
    );
  });

  it("renders groups with their heading level", () => {
    const recipe: Recipe = {
      ...FISH,
      tags: [],
      yields: [],
      ingredients: [
        {
          type: "group",
          name: "Sauce",
          level: 1,
          children: [
            {
              type: "group",
              name: "Base",
              level: 3,
              children: [{ type: "ingredient", amount: null, name: "butter", link: null }],
            },
          ],
        },
      ],
    };

    expect(renderRecipeHtml(recipe)).toBe(
      [
        '<article class="recipe">',
        '<h1 class="recipe-title">Fish &amp; &lt;Chips&gt;</h1>',
        '<section class="recipe-ingredients">',
        '<section class="ingredient-group">',
        '<h2 class="ingredient-group-title">Sauce</h2>',
        '<section class="ingredient-group">',
        '<h3 class="ingredient-group-title">Base</h3>',
        '<ul class="ingredient-list">',
        '<li class="ingredient"><span class="ingredient-name">butter</span></li>',
        "</ul>",
        "</section>",
        "</section>",
        "</section>",
        "</article>",
        "",
      ].join("\n")
    );
  });

  it("renders description and instructions from markdown", () => {
    const recipe: Recipe = {
      ...FISH,
      tags: [],
      yields: [],
      ingredients: [],
      description: ["Some *good* food."],
      instructions: ["Mix <b>well</b>."],
    };

    expect(renderRecipeHtml(recipe, { schemaOrg: true })).toBe(
      [
        '<article class="recipe" itemscope itemtype="https://schema.org/Recipe">',
        '<h1 class="recipe-title" itemprop="name">Fish &amp; &lt;Chips&gt;</h1>',
        '<div class="recipe-description" itemprop="description">',
        "<p>Some <em>good</em> food.</p>",
        "</div>",
        '<div class="recipe-instructions" itemprop="recipeInstructions">',
        "<p>Mix well.</p>",
        "</div>",
        "</article>",
        "",
      ].join("\n")
    );
  });
});

describe("link safety", () => {
  it("drops javascript: URLs from ingredient and description links", () => {
    const { recipe } = parseRecipe(
      "# T\n\nSee [here](javascript:alert(1)).\n\n---\n\n- [crust](javascript:alert(1))\n"
    );
    const html = renderRecipeHtml(recipe);

    expect(html).not.toContain("javascript:");
    expect(html.split("\n")).toContain(
      '<li class="ingredient"><span class="ingredient-name">crust</span></li>'
    );
    expect(html).toContain(">here</a>.</p>");
  });

  it("keeps relative and https links", () => {
    expect(markdownToHtml(["[a](./a.md) and [b](https://example.com/b)"])).toBe(
      '<p><a href="./a.md">a</a> and <a href="https://example.com/b">b</a></p>'
    );
  });
});

describe("link reference definitions", () => {
  it("resolves references within and across sections", () => {
    const { recipe } = parseRecipe(
      "# T\n\nSee [the blog][blog].\n\n[blog]: https://example.com\n\n---\n\n---\n\nRead [the blog][blog] again.\n"
    );
    const lines = renderRecipeHtml(recipe).split("\n");

    expect(lines).toContain('<p>See <a href="https://example.com">the blog</a>.</p>');
    expect(lines).toContain('<p>Read <a href="https://example.com">the blog</a> again.</p>');
  });
});

describe("definitionSources", () => {
  it("returns the source of top-level definitions only", () => {
    expect(definitionSources(["Text [x].", '[x]: ./x.md "X"'])).toEqual(['[x]: ./x.md "X"']);
  });
});

describe("markdownToHtml", () => {
  it("converts markdown blocks", () => {
    expect(markdownToHtml(["1. Mix\n2. Bake"])).toBe("<ol>\n<li>Mix</li>\n<li>Bake</li>\n</ol>");
  });
});
