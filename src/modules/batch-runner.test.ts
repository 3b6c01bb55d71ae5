import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestContext, FakeDocument } from "../testing/fakes";
import type { Job } from "../types";
import { ConvertError, isConvertError, singleOutput } from "../utils";
import {
  batchConvert,
  formatJobFailure,
  runBatch,
  summarizeFailures,
} from "./batch-runner";

describe("batch runner", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "sheetpress-batch-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const documents = {
    "a.html": () => new FakeDocument("a"),
    "c.html": () => new FakeDocument("c"),
  };

  function jobs(): Job[] {
    return ["a", "b", "c"].map((name) => ({
      input: `${name}.html`,
      output: singleOutput(join(dir, `${name}.txt`)),
    }));
  }

  // ==========================================================================
  // runBatch
  // ==========================================================================
  describe("runBatch", () => {
    it("keeps going after a failing job and names it in the error", async () => {
      const ctx = createTestContext({ documents });

      const result = await runBatch(jobs(), ctx);

      expect(await readFile(join(dir, "c.txt"), "utf-8")).toBe("c|-|-|-|-");
      expect(result.ok).toBe(false);
      expect(result.failures).toEqual([
        {
          input: "b.html",
          output: join(dir, "b.txt"),
          reason: "InFileFailedLoad",
          message: "Failed to load input file",
        },
      ]);
      if (result.ok) return;
      expect(isConvertError(result.error, "ConvertFailed")).toBe(true);
      expect(result.error.message).toBe(
        `failed convert, err: InFileFailedLoad: Failed to load input file, in: b.html, out: ${join(dir, "b.txt")}`,
      );
    });

    it("reports progress per job and finishes once", async () => {
      const ctx = createTestContext({ documents });

      const result = await runBatch(jobs(), ctx);

      expect(ctx.progressEvents.events).toEqual([
        { type: "start" },
        { type: "progress", current: 1, total: 3, label: "a.html" },
        { type: "progress", current: 2, total: 3, label: "b.html" },
        { type: "progress", current: 3, total: 3, label: "c.html" },
        { type: "finish", result },
      ]);
    });

    it("records totals in the tracker", async () => {
      const ctx = createTestContext({ documents });

      await runBatch(jobs(), ctx);

      const stats = ctx.tracker.getStats();
      expect(stats.totalJobs).toBe(3);
      expect(stats.successfulJobs).toBe(2);
      expect(stats.failedJobs).toBe(1);
      expect(ctx.tracker.getWrittenFiles()).toEqual([join(dir, "a.txt"), join(dir, "c.txt")]);
      expect(ctx.tracker.getIssues("job")).toEqual([
        {
          type: "job",
          input: "b.html",
          output: join(dir, "b.txt"),
          reason: "InFileFailedLoad",
          details: "Failed to load input file",
        },
      ]);
    });

    it("writes the same files when run again", async () => {
      await runBatch(jobs(), createTestContext({ documents }));
      const first = [
        await readFile(join(dir, "a.txt"), "utf-8"),
        await readFile(join(dir, "c.txt"), "utf-8"),
      ];

      const result = await runBatch(jobs(), createTestContext({ documents }));

      expect(result.failures.map((failure) => failure.input)).toEqual(["b.html"]);
      expect([
        await readFile(join(dir, "a.txt"), "utf-8"),
        await readFile(join(dir, "c.txt"), "utf-8"),
      ]).toEqual(first);
      expect(first).toEqual(["a|-|-|-|-", "c|-|-|-|-"]);
    });

    it("succeeds for an empty job list", async () => {
      const ctx = createTestContext();
      expect(await runBatch([], ctx)).toEqual({ ok: true, failures: [] });
    });

    it("records every remaining job as cancelled once aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const ctx = createTestContext({ documents, signal: controller.signal });

      const result = await runBatch(jobs(), ctx);

      expect(result.failures.map((failure) => failure.reason)).toEqual([
        "Cancelled",
        "Cancelled",
        "Cancelled",
      ]);
      expect(ctx.loader.loads).toEqual([]);
    });
  });

  // ==========================================================================
  // batchConvert
  // ==========================================================================
  describe("batchConvert", () => {
    it("runs every job of the file", async () => {
      const jobFile = join(dir, "jobs.json");
      await writeFile(
        jobFile,
        JSON.stringify([{ in: "a.html", out: [join(dir, "a.txt"), join(dir, "a.html")] }]),
      );
      const ctx = createTestContext({ documents });

      const result = await batchConvert(jobFile, ctx);

      expect(result).toEqual({ ok: true, failures: [] });
      expect(await readFile(join(dir, "a.html"), "utf-8")).toBe("native:a|-");
    });

    it("fails only the jobs a malformed element produces", async () => {
      const jobFile = join(dir, "jobs.json");
      await writeFile(
        jobFile,
        JSON.stringify([
          { in: "a.html", transpose: null, out: join(dir, "a.txt") },
          { in: "c.html", out: [["x", "y", "z"], join(dir, "c.txt")] },
          { in: "b.html" },
        ]),
      );
      const ctx = createTestContext({ documents });

      const result = await batchConvert(jobFile, ctx);

      expect(result.failures).toEqual([
        {
          input: "c.html",
          output: "",
          reason: "ConvertTypeUnknown",
          message: 'Unknown output type ""',
        },
      ]);
      expect(await readFile(join(dir, "a.txt"), "utf-8")).toBe("a|-|-|-|-");
      expect(await readFile(join(dir, "c.txt"), "utf-8")).toBe("c|-|-|-|-");
      expect(ctx.loader.loads.map((load) => load.path)).toEqual(["a.html", "c.html"]);
    });

    it("runs no job when the file is not an array", async () => {
      const jobFile = join(dir, "jobs.json");
      await writeFile(jobFile, JSON.stringify({ in: "a.html", out: "a.txt" }));
      const ctx = createTestContext({ documents });

      const result = await batchConvert(jobFile, ctx);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(isConvertError(result.error, "BatchJobFileFailedParse")).toBe(true);
      expect(result.failures).toEqual([]);
      expect(ctx.loader.loads).toEqual([]);
      expect(ctx.progressEvents.events).toEqual([
        { type: "start" },
        { type: "finish", result },
      ]);
    });

    it("runs no job when a transform is malformed", async () => {
      const jobFile = join(dir, "jobs.json");
      await writeFile(
        jobFile,
        JSON.stringify([
          { in: "a.html", out: "a.txt" },
          { in: "c.html", transpose: { mode: "up" }, out: "c.txt" },
        ]),
      );
      const ctx = createTestContext({ documents });

      const result = await batchConvert(jobFile, ctx);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toEqual(new Error("interval required"));
      expect(ctx.loader.loads).toEqual([]);
    });

    it("fails with BatchJobFileFailedOpen for a missing file", async () => {
      const ctx = createTestContext();

      const result = await batchConvert(join(dir, "missing.json"), ctx);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(isConvertError(result.error, "BatchJobFileFailedOpen")).toBe(true);
    });
  });

  // ==========================================================================
  // Failure formatting
  // ==========================================================================
  describe("summarizeFailures", () => {
    it("joins failures one per line", () => {
      const failures = [
        { input: "a.html", output: "a.md", reason: "ConvertTypeUnknown", message: "x" },
        { input: "b.html", output: "parts/*.md", reason: "TransposeError", message: "y" },
      ];

      const result = summarizeFailures(failures);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ConvertError);
      expect(result.error.message).toBe(
        [
          "failed convert, err: ConvertTypeUnknown: x, in: a.html, out: a.md",
          "failed convert, err: TransposeError: y, in: b.html, out: parts/*.md",
        ].join("\n"),
      );
    });

    it("formats a single failure", () => {
      expect(
        formatJobFailure({
          input: "b.html",
          output: "b.md",
          reason: "InFileFailedLoad",
          message: "Failed to load input file",
        }),
      ).toBe(
        "failed convert, err: InFileFailedLoad: Failed to load input file, in: b.html, out: b.md",
      );
    });
  });
});
