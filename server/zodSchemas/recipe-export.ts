import type { IngredientGroupExport } from "@/types/dto/recipe-export";

import { z } from "zod";

export const AmountExportSchema = z.object({
  factor: z.string(),
  unit: z.string().nullable(),
});

export const IngredientExportSchema = z.object({
  name: z.string(),
  amount: AmountExportSchema.nullable(),
  link: z.string().nullable(),
});

export const IngredientGroupExportSchema: z.ZodType<IngredientGroupExport> = z.lazy(() =>
  z.object({
    title: z.string(),
    ingredients: z.array(IngredientExportSchema),
    ingredient_groups: z.array(IngredientGroupExportSchema),
  })
);

export const RecipeExportSchema = z.object({
  title: z.string().min(1),
  description: z.string().nullable(),
  tags: z.array(z.string()),
  yields: z.array(AmountExportSchema),
  ingredients: z.array(IngredientExportSchema),
  ingredient_groups: z.array(IngredientGroupExportSchema),
  instructions: z.string().nullable(),
});
