export type { Amount, HeadingLevel, Ingredient, IngredientEntry, IngredientGroup, Recipe } from "./recipe";
export type {
  BlockNode,
  CodeNode,
  DefinitionBlock,
  EmphasisNode,
  EmphasisStrength,
  HeadingBlock,
  InlineNode,
  LinkNode,
  ListBlock,
  ListItemNode,
  OpaqueBlock,
  ParagraphBlock,
  SourcePosition,
  SpanNode,
  TextNode,
  ThematicBreakBlock,
} from "./markdown";
export type { RecipeExport, IngredientExport, IngredientGroupExport, AmountExport } from "./dto/recipe-export";
