/**
 * Parse failures and warnings.
 *
 * Only a StructureError aborts a parse. Everything else is recorded as a
 * RecipeWarning and returned next to a best-effort recipe.
 */

export type StructureErrorCode = "MISSING_TITLE" | "MISSING_DIVIDER";

export class StructureError extends Error {
  readonly code: StructureErrorCode;

  constructor(code: StructureErrorCode, message: string) {
    super(message);
    this.name = "StructureError";
    this.code = code;
  }
}

export type RecipeWarningKind = "structure" | "ambiguity" | "content" | "amount";

export type RecipeWarningCode =
  | "MISSING_DIVIDER"
  | "DUPLICATE_TITLE"
  | "DUPLICATE_TAGS"
  | "DUPLICATE_YIELDS"
  | "EMPTY_INGREDIENT"
  | "IGNORED_BLOCK"
  | "UNPARSED_AMOUNT";

const WARNING_KINDS: Record<RecipeWarningCode, RecipeWarningKind> = {
  MISSING_DIVIDER: "structure",
  DUPLICATE_TITLE: "ambiguity",
  DUPLICATE_TAGS: "ambiguity",
  DUPLICATE_YIELDS: "ambiguity",
  EMPTY_INGREDIENT: "content",
  IGNORED_BLOCK: "content",
  UNPARSED_AMOUNT: "amount",
};

export interface RecipeWarning {
  kind: RecipeWarningKind;
  code: RecipeWarningCode;
  message: string;
  /** Source offset of the node the warning is about */
  offset?: number;
}

/**
 * Thrown instead of returning a recipe when the caller asked for warnings to
 * be treated as failures.
 */
export class RecipeWarningsError extends Error {
  readonly warnings: RecipeWarning[];

  constructor(warnings: RecipeWarning[]) {
    super(`Recipe parsed with ${warnings.length} warning(s): ${warnings[0]?.message ?? ""}`);
    this.name = "RecipeWarningsError";
    this.warnings = warnings;
  }
}

/**
 * Accumulates warnings for a single parse.
 */
export class WarningCollector {
  private readonly items: RecipeWarning[] = [];

  add(code: RecipeWarningCode, message: string, offset?: number): void {
    const warning: RecipeWarning = { kind: WARNING_KINDS[code], code, message };

    if (offset !== undefined) warning.offset = offset;

    this.items.push(warning);
  }

  get warnings(): RecipeWarning[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}
