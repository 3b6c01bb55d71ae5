import { describe, it, expect } from "vitest";
import { isConvertError } from "./errors";
import {
  formatOutputSpec,
  fromNativeSeparators,
  outputKind,
  parseOutputTemplate,
  resolvePagePath,
  resolvePartPath,
  singleOutput,
  templatedOutput,
} from "./output-path";

describe("output paths", () => {
  describe("templatedOutput", () => {
    it("places the part name between prefix and suffix", () => {
      expect(templatedOutput("parts/", "pdf")).toEqual({
        kind: "templated",
        dir: "parts",
        baseName: "*",
        suffix: "pdf",
      });
    });

    it("tolerates a leading dot in the suffix", () => {
      expect(templatedOutput("out/song-", ".txt")).toEqual({
        kind: "templated",
        dir: "out",
        baseName: "song-*",
        suffix: "txt",
      });
    });

    it("uses the current directory for a bare prefix", () => {
      expect(templatedOutput("", "md")).toEqual({
        kind: "templated",
        dir: ".",
        baseName: "*",
        suffix: "md",
      });
    });
  });

  describe("parseOutputTemplate", () => {
    it("normalizes backslashes", () => {
      expect(parseOutputTemplate("out\\parts\\*.svg")).toEqual({
        kind: "templated",
        dir: "out/parts",
        baseName: "*",
        suffix: "svg",
      });
    });

    it("rejects a template without placeholder", () => {
      let caught: unknown;
      try {
        parseOutputTemplate("parts/score.md");
      } catch (error) {
        caught = error;
      }
      expect(isConvertError(caught, "NotSupported")).toBe(true);
    });
  });

  describe("resolvePartPath", () => {
    const spec = templatedOutput("parts/", "pdf");

    it("substitutes the part name", () => {
      expect(resolvePartPath(spec, "Violin")).toBe("parts/Violin.pdf");
      expect(resolvePartPath(spec, "Cello")).toBe("parts/Cello.pdf");
    });

    it("replaces every placeholder", () => {
      const doubled = parseOutputTemplate("out/*-*.txt");
      expect(resolvePartPath(doubled, "Bass")).toBe("out/Bass-Bass.txt");
    });

    it("keeps part names inside the template directory", () => {
      expect(resolvePartPath(spec, "../x")).toBe("parts/.._x.pdf");
      expect(resolvePartPath(spec, "Horn in F/Eb")).toBe("parts/Horn in F_Eb.pdf");
      expect(resolvePartPath(spec, "a\\b")).toBe("parts/a_b.pdf");
    });

    it("is deterministic", () => {
      expect(resolvePartPath(spec, "Viola")).toBe(resolvePartPath(spec, "Viola"));
    });
  });

  describe("resolvePagePath", () => {
    it("numbers pages from one", () => {
      expect(resolvePagePath("out/score.svg", 0)).toBe("out/score-1.svg");
      expect(resolvePagePath("out/score.svg", 2)).toBe("out/score-3.svg");
    });

    it("handles a path without directory", () => {
      expect(resolvePagePath("score.svg", 1)).toBe("score-2.svg");
    });
  });

  describe("outputKind", () => {
    it("lower-cases the suffix of a single output", () => {
      expect(outputKind(singleOutput("out/Score.MD"))).toBe("md");
    });

    it("reads the suffix of a templated output", () => {
      expect(outputKind(templatedOutput("parts/", "SVG"))).toBe("svg");
    });

    it("is empty without extension", () => {
      expect(outputKind(singleOutput("out/README"))).toBe("");
    });
  });

  describe("formatOutputSpec", () => {
    it("shows templated outputs with their placeholder", () => {
      expect(formatOutputSpec(templatedOutput("parts/", "pdf"))).toBe("parts/*.pdf");
    });

    it("shows single outputs as they are", () => {
      expect(formatOutputSpec(singleOutput("out\\a.md"))).toBe("out/a.md");
    });
  });

  it("fromNativeSeparators converts backslashes", () => {
    expect(fromNativeSeparators("scores\\in\\a.html")).toBe("scores/in/a.html");
  });
});
