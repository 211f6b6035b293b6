import type { Amount } from "@/types/recipe";
import type { WarningCollector } from "../errors";

import { parseAmount } from "@/lib/parse-amount";

/**
 * Parse an amount and record a warning when it carries no number.
 */
export function readAmount(text: string, warnings: WarningCollector, offset?: number): Amount {
  const amount = parseAmount(text);

  if (amount.quantity === null && amount.unit !== "") {
    warnings.add("UNPARSED_AMOUNT", `No quantity recognized in amount "${amount.unit}".`, offset);
  }

  return amount;
}
