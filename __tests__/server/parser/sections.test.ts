import { describe, it, expect, vi, beforeEach } from "vitest";

import { StructureError, WarningCollector } from "@/server/parser/errors";
import { parseBlocks } from "@/server/parser/markdown";
import { segmentSections } from "@/server/parser/parsers/sections";

const { warn } = vi.hoisted(() => ({ warn: vi.fn() }));

vi.mock("@/server/logger", () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn, child: vi.fn() };

  log.child.mockReturnValue(log);

  return { logger: log, parserLogger: log, rendererLogger: log };
});

describe("segmentSections", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("splits at the first two thematic breaks and keeps later ones in instructions", () => {
    const blocks = parseBlocks("# T\n\n---\n\n- a\n\n---\n\nStep\n\n---\n\nMore\n");
    const sections = segmentSections(blocks, "strict", new WarningCollector());

    expect(sections.metadata.map((block) => block.kind)).toEqual(["heading"]);
    expect(sections.ingredients.map((block) => block.kind)).toEqual(["list"]);
    expect(sections.instructions.map((block) => block.kind)).toEqual([
      "paragraph",
      "thematicBreak",
      "paragraph",
    ]);
  });

  it("returns no instructions with a single break", () => {
    const sections = segmentSections(parseBlocks("# T\n\n---\n\n- a\n"), "strict", new WarningCollector());

    expect(sections.ingredients).toHaveLength(1);
    expect(sections.instructions).toEqual([]);
  });

  it("throws MISSING_DIVIDER in strict mode without a break", () => {
    const blocks = parseBlocks("# T\n\n- a\n");

    expect(() => segmentSections(blocks, "strict", new WarningCollector())).toThrow(StructureError);
    expect(() => segmentSections(blocks, "strict", new WarningCollector())).toThrow(
      "Recipe has no thematic break separating metadata from ingredients."
    );
    expect(warn).toHaveBeenCalledWith("No thematic break found in strict mode");
  });

  it("reads everything as metadata in permissive mode and records a warning", () => {
    const warnings = new WarningCollector();
    const sections = segmentSections(parseBlocks("# T\n\n- a\n"), "permissive", warnings);

    expect(sections.metadata).toHaveLength(2);
    expect(sections.ingredients).toEqual([]);
    expect(sections.instructions).toEqual([]);
    expect(warnings.warnings).toEqual([
      {
        kind: "structure",
        code: "MISSING_DIVIDER",
        message: "Recipe has no thematic break; the whole document was read as metadata.",
      },
    ]);
  });
});
