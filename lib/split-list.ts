const ASCII_DIGIT = /^[0-9]$/;

/**
 * Split a comma-separated list such as tags or yields.
 *
 * A comma between two ASCII digits is a decimal separator ("1,5 kg") and does
 * not split. Segments are trimmed and empty ones dropped.
 *
 * Examples:
 *   "tag1, tag2, tag3"    -> ["tag1", "tag2", "tag3"]
 *   "4 servings, 1,5 kg"  -> ["4 servings", "1,5 kg"]
 */
export function splitList(text: string): string[] {
  const chars = Array.from(text);
  const segments: string[] = [];
  let current = "";

  const flush = (): void => {
    const segment = current.trim();

    if (segment) segments.push(segment);
    current = "";
  };

  chars.forEach((char, i) => {
    if (char !== ",") {
      current += char;

      return;
    }

    const before = chars[i - 1];
    const after = chars[i + 1];
    const isDecimalComma =
      before !== undefined && after !== undefined && ASCII_DIGIT.test(before) && ASCII_DIGIT.test(after);

    if (isDecimalComma) {
      current += char;
    } else {
      flush();
    }
  });

  flush();

  return segments;
}
