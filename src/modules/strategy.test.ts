import { describe, it, expect } from "vitest";
import { selectStrategy, type StrategyInput } from "./strategy";

const NONE: StrategyInput = {
  templated: false,
  hasExtension: false,
  isNative: false,
  isPageSegmented: false,
};

describe("selectStrategy", () => {
  it("writes the whole document when nothing else applies", () => {
    expect(selectStrategy(NONE)).toBe("whole");
  });

  it("prefers parts over everything else", () => {
    expect(
      selectStrategy({ templated: true, hasExtension: true, isNative: true, isPageSegmented: true }),
    ).toBe("parts");
  });

  it("runs the extension before native or page output", () => {
    expect(selectStrategy({ ...NONE, hasExtension: true, isNative: true })).toBe("extension");
    expect(selectStrategy({ ...NONE, hasExtension: true, isPageSegmented: true })).toBe(
      "extension",
    );
  });

  it("saves natively before splitting pages", () => {
    expect(selectStrategy({ ...NONE, isNative: true, isPageSegmented: true })).toBe("native");
  });

  it("splits page-segmented kinds into pages", () => {
    expect(selectStrategy({ ...NONE, isPageSegmented: true })).toBe("pages");
  });
});
