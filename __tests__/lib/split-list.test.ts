import { describe, it, expect } from "vitest";

import { splitList } from "@/lib/split-list";

describe("splitList", () => {
  it("splits on commas and trims", () => {
    expect(splitList("tag1, tag2,tag3")).toEqual(["tag1", "tag2", "tag3"]);
  });

  it("keeps a comma between two digits", () => {
    expect(splitList("4 servings, 1,5 kg")).toEqual(["4 servings", "1,5 kg"]);
  });

  it("splits when a space follows the comma", () => {
    expect(splitList("1, 5")).toEqual(["1", "5"]);
  });

  it("drops empty segments", () => {
    expect(splitList(", a,, b ,")).toEqual(["a", "b"]);
  });

  it("returns empty array for empty text", () => {
    expect(splitList("")).toEqual([]);
  });
});
