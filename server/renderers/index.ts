export { renderRecipeJson, toRecipeExport, toAmountExport, recipeFromExport } from "./json";
export { renderRecipeHtml, markdownToHtml } from "./html";
export { renderRecipeMarkdown, escapeInline, escapeBlockStart } from "./markdown";
