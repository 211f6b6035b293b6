export { segmentSections, type RecipeSections } from "./sections";
export { classifyMetadata, getTagsText, getYieldsText, type ParsedMetadata } from "./metadata";
export { parseIngredientLine, parseIngredientList } from "./ingredients";
export { buildIngredientTree } from "./ingredient-groups";
export { collectInstructions } from "./instructions";
export { readAmount } from "./amount";
