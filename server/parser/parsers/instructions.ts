import type { BlockNode } from "@/types/markdown";

import { sliceSource } from "./text";

/**
 * Instruction blocks as markdown text, one entry per top-level block.
 * Thematic breaks in this section are kept as text.
 */
export function collectInstructions(blocks: BlockNode[], source: string): string[] {
  return blocks.map((block) => sliceSource(source, block.position)).filter(Boolean);
}
