import { describe, it, expect } from "vitest";

import type { Recipe } from "@/types/recipe";

import { APPLE_PIE, APPLE_PIE_MD } from "@/__tests__/fixtures/recipes";

import { parseRecipe } from "@/server/parser";
import { escapeBlockStart, escapeInline, renderRecipeMarkdown } from "@/server/renderers/markdown";

describe("escapeInline", () => {
  it("escapes emphasis, link and code characters", () => {
    expect(escapeInline("a*b_c [d] `e`")).toBe("a\\*b\\_c \\[d\\] \\`e\\`");
  });
});

describe("escapeBlockStart", () => {
  it("escapes markers that would open a block", () => {
    expect(escapeBlockStart("# x")).toBe("\\# x");
    expect(escapeBlockStart("- x")).toBe("\\- x");
    expect(escapeBlockStart("1. egg")).toBe("1\\. egg");
  });

  it("leaves other text alone", () => {
    expect(escapeBlockStart("2 eggs")).toBe("2 eggs");
  });
});

describe("renderRecipeMarkdown", () => {
  it("renders a parsed recipe back to its source", () => {
    expect(renderRecipeMarkdown(APPLE_PIE)).toBe(APPLE_PIE_MD);
  });

  it("always writes the first divider", () => {
    const recipe: Recipe = {
      title: "T",
      description: [],
      tags: [],
      yields: [],
      ingredients: [],
      instructions: [],
    };

    expect(renderRecipeMarkdown(recipe)).toBe("# T\n\n---\n");
  });

  it("writes both dividers when only instructions are present", () => {
    const recipe: Recipe = {
      title: "T",
      description: [],
      tags: [],
      yields: [],
      ingredients: [],
      instructions: ["Serve."],
    };

    expect(renderRecipeMarkdown(recipe)).toBe("# T\n\n---\n\n---\n\nServe.\n");
  });

  it("escapes names so they read back unchanged", () => {
    const recipe: Recipe = {
      title: "C#",
      description: [],
      tags: ["*hot*"],
      yields: [],
      ingredients: [
        { type: "ingredient", amount: null, name: "# hash *star*", link: null },
        { type: "ingredient", amount: null, name: "1. first", link: null },
        { type: "ingredient", amount: null, name: "my pie", link: "./my pie.md" },
      ],
      instructions: [],
    };
    const markdown = renderRecipeMarkdown(recipe);

    expect(markdown).toBe(
      [
        "# C\\#",
        "",
        "*\\*hot\\**",
        "",
        "---",
        "",
        "- \\# hash \\*star\\*",
        "- 1\\. first",
        "- [my pie](<./my pie.md>)",
        "",
      ].join("\n")
    );
    expect(parseRecipe(markdown).recipe).toEqual(recipe);
  });

  it("keeps link reference definitions with their section", () => {
    const source =
      "# T\n\nSee [the blog][blog].\n\n[blog]: https://example.com\n\n---\n\n---\n\nRead [the blog][blog] again.\n";
    const { recipe } = parseRecipe(source);

    expect(recipe.description).toEqual(["See [the blog][blog].", "[blog]: https://example.com"]);
    expect(renderRecipeMarkdown(recipe)).toBe(source);
  });
});
