export {
  parseRecipe,
  parseRecipeBlocks,
  tryParseRecipe,
  parseBlocks,
  StructureError,
  RecipeWarningsError,
  WarningCollector,
  type ParseRecipeResult,
  type ParseResult,
  type ParseErrorCode,
  type RecipeWarning,
  type RecipeWarningCode,
  type RecipeWarningKind,
  type StructureErrorCode,
} from "./server/parser";
export {
  renderRecipeJson,
  toRecipeExport,
  recipeFromExport,
  renderRecipeHtml,
  renderRecipeMarkdown,
} from "./server/renderers";
export { RecipeExportSchema } from "./server/zodSchemas/recipe-export";
export { parseAmount, amountFactor, formatAmountText } from "./lib/parse-amount";
export { splitList } from "./lib/split-list";
export { formatAmount, formatAmountAsDecimal, formatAmountAsFraction } from "./lib/format-amount";
export type { AmountDisplayMode } from "./lib/format-amount";
export { scaleRecipe, scaleRecipeToYield } from "./lib/scale-recipe";
export type { ParseMode, ParseOptionsInput, RenderHtmlOptionsInput, ScaleOptionsInput } from "./config/parse-options";
export type * from "./types";
