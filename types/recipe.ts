/**
 * Structured recipe model produced by the RecipeMD parser and consumed by
 * every renderer.
 */

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface Amount {
  /** Parsed numeric value, null when the text holds no recognizable number */
  quantity: number | null;
  /** Text after the numeric token, or the whole span when no number was found */
  unit: string;
  /** Verbatim source span, never trimmed */
  originalText: string;
}

export interface Ingredient {
  type: "ingredient";
  amount: Amount | null;
  name: string;
  link: string | null;
}

export interface IngredientGroup {
  type: "group";
  name: string;
  level: HeadingLevel;
  children: IngredientEntry[];
}

export type IngredientEntry = Ingredient | IngredientGroup;

export interface Recipe {
  title: string;
  /** Markdown source of each description block */
  description: string[];
  tags: string[];
  yields: Amount[];
  ingredients: IngredientEntry[];
  /** Markdown source of each instruction block */
  instructions: string[];
}
