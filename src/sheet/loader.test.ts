import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { DocumentConfig } from "../types";
import { SheetLoader } from "./loader";

const CONFIG: DocumentConfig = {
  contentSelector: "main",
  partSelector: "[data-part]",
  pageBreakSelector: "hr.page-break",
  chordSelector: ".chord",
  keySelector: "[data-key]",
};

describe("SheetLoader", () => {
  const loader = new SheetLoader(CONFIG);
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "sheetpress-loader-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function sheet(name: string, html: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, html);
    return path;
  }

  it("names the document after the file", async () => {
    const path = await sheet("blue-moon.html", "<main><p>Blue moon</p></main>");
    const document = await loader.load(path, { force: false });
    expect(document.name).toBe("blue-moon");
    expect(document.text()).toBe("Blue moon");
  });

  it("rejects files without content", async () => {
    const path = await sheet("empty.html", "<p>no main</p>");
    await expect(loader.load(path, { force: false })).rejects.toThrow(
      `No content matching "main" in ${path}`,
    );
  });

  it("rejects newer sheet versions unless forced", async () => {
    const path = await sheet(
      "next.html",
      '<head><meta name="sheet-version" content="2"></head><main><p>x</p></main>',
    );
    await expect(loader.load(path, { force: false })).rejects.toThrow(
      "Sheet version 2 is newer than supported version 1",
    );
    const forced = await loader.load(path, { force: true });
    expect(forced.version()).toBe(2);
  });

  it("inlines the stylesheet", async () => {
    const path = await sheet("styled.html", "<main><p>x</p></main>");
    const stylePath = join(dir, "sheet.css");
    await writeFile(stylePath, "p { color: red; }");

    const document = await loader.load(path, { force: false, stylePath });

    expect(document.html()).toContain("<style>p { color: red; }</style>");
  });

  it("rejects missing files", async () => {
    await expect(
      loader.load(join(dir, "missing.html"), { force: false }),
    ).rejects.toThrow("ENOENT");
  });
});
