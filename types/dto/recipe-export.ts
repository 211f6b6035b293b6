/**
 * JSON shape of an exported recipe.
 *
 * Amount factors are always the literal text from the source document so
 * that "1,5" or "2 1/4" survive an export unchanged.
 */

export interface AmountExport {
  factor: string;
  unit: string | null;
}

export interface IngredientExport {
  name: string;
  amount: AmountExport | null;
  link: string | null;
}

export interface IngredientGroupExport {
  title: string;
  ingredients: IngredientExport[];
  ingredient_groups: IngredientGroupExport[];
}

export interface RecipeExport {
  title: string;
  description: string | null;
  tags: string[];
  yields: AmountExport[];
  ingredients: IngredientExport[];
  ingredient_groups: IngredientGroupExport[];
  instructions: string | null;
}
