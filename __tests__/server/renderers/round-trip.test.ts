import { describe, it, expect } from "vitest";

import { APPLE_PIE_MD } from "@/__tests__/fixtures/recipes";

import { parseRecipe } from "@/server/parser";
import { recipeFromExport, renderRecipeJson, toRecipeExport } from "@/server/renderers/json";
import { renderRecipeMarkdown } from "@/server/renderers/markdown";

describe("round trip", () => {
  it("markdown -> recipe -> markdown -> recipe is stable", () => {
    const { recipe } = parseRecipe(APPLE_PIE_MD);
    const again = parseRecipe(renderRecipeMarkdown(recipe));

    expect(again).toEqual({ recipe, warnings: [] });
  });

  it("JSON export survives import, markdown rendering and re-parsing", () => {
    const exported = toRecipeExport(parseRecipe(APPLE_PIE_MD).recipe);
    const imported = recipeFromExport(JSON.parse(renderRecipeJson(parseRecipe(APPLE_PIE_MD).recipe)));
    const reparsed = parseRecipe(renderRecipeMarkdown(imported)).recipe;

    expect(toRecipeExport(reparsed)).toEqual(exported);
  });

  it("keeps nested groups through the JSON path", () => {
    const source = "# T\n\n---\n\n## A\n\n- *1* egg\n\n### B\n\n- *2,5 dl* milk\n";
    const exported = toRecipeExport(parseRecipe(source).recipe);
    const reparsed = parseRecipe(renderRecipeMarkdown(recipeFromExport(exported))).recipe;

    expect(toRecipeExport(reparsed)).toEqual(exported);
    expect(exported.ingredient_groups[0].ingredient_groups[0].ingredients).toEqual([
      { name: "milk", amount: { factor: "2,5", unit: "dl" }, link: null },
    ]);
  });
});
