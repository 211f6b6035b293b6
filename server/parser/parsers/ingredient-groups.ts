import type { BlockNode } from "@/types/markdown";
import type { IngredientEntry, IngredientGroup } from "@/types/recipe";
import type { WarningCollector } from "../errors";

import { parseIngredientList } from "./ingredients";
import { inlineText } from "./text";

import { parserLogger } from "@/server/logger";

const log = parserLogger.child({ module: "ingredient-groups" });

/**
 * Build the ingredient tree from the blocks between the two thematic breaks.
 *
 * Headings open groups; a heading closes every open group of the same or a
 * deeper level first, so an h2 after an h3 returns to the top. Lists append
 * to the innermost open group, or to the top level before any heading.
 */
export function buildIngredientTree(
  blocks: BlockNode[],
  warnings: WarningCollector
): IngredientEntry[] {
  const entries: IngredientEntry[] = [];
  const stack: IngredientGroup[] = [];

  const append = (entry: IngredientEntry): void => {
    const top = stack[stack.length - 1];

    if (top) {
      top.children.push(entry);
    } else {
      entries.push(entry);
    }
  };

  for (const block of blocks) {
    switch (block.kind) {
      case "list":
        parseIngredientList(block, warnings).forEach(append);
        break;
      case "heading": {
        while (stack.length > 0 && stack[stack.length - 1].level >= block.level) {
          stack.pop();
        }

        const group: IngredientGroup = {
          type: "group",
          name: inlineText(block.children),
          level: block.level,
          children: [],
        };

        append(group);
        stack.push(group);
        break;
      }
      case "definition":
        // links using it were resolved when the block tree was built
        break;
      default:
        warnings.add(
          "IGNORED_BLOCK",
          `Ignored ${block.kind} block in the ingredients section.`,
          block.position.start
        );
    }
  }

  log.debug({ entries: entries.length }, "Built ingredient tree");

  return entries;
}
