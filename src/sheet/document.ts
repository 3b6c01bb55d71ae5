/**
 * Sheet Document
 * An HTML lead sheet loaded with cheerio: parts, pages, chords and key
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { load, type CheerioAPI } from "cheerio";
import { isTag, type AnyNode } from "domhandler";
import type { ConvertibleDocument, DocumentConfig, SubDocument } from "../types";

const PART_NAME_ATTRIBUTE = "data-part";
const KEY_ATTRIBUTE = "data-key";
const BLOCK_ELEMENTS = "p, div, section, h1, h2, h3, h4, h5, h6, li, tr, pre, blockquote";

// ============================================================================
// Helpers
// ============================================================================

/**
 * Visible text of an HTML fragment, one entry per non-empty line
 */
export function textLines(html: string): string[] {
  const $ = load(html, null, false);
  $("br").replaceWith("\n");
  $(BLOCK_ELEMENTS).after("\n");
  return $.root()
    .text()
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0);
}

// ============================================================================
// Document
// ============================================================================

export class SheetDocument implements ConvertibleDocument<SheetDocument> {
  private disposed = false;

  private constructor(
    readonly name: string,
    private readonly $: CheerioAPI,
    private readonly config: DocumentConfig,
  ) {}

  static fromHtml(
    name: string,
    html: string,
    config: DocumentConfig,
  ): SheetDocument {
    return new SheetDocument(name, load(html), config);
  }

  // ============================================================================
  // Metadata
  // ============================================================================

  get title(): string {
    const $ = this.api();
    return (
      $("title").first().text().trim() ||
      $("h1").first().text().trim() ||
      this.name
    );
  }

  setTitle(title: string): void {
    const $ = this.api();
    const existing = $("title");
    if (existing.length > 0) {
      existing.first().text(title);
    } else {
      $("head").append($("<title></title>").text(title));
    }
  }

  /**
   * Value of `<meta name="sheet-version">`, or null when absent
   */
  version(): number | null {
    const content = this.getMeta("sheet-version");
    if (content === undefined) return null;
    const version = Number.parseInt(content, 10);
    return Number.isNaN(version) ? null : version;
  }

  soundProfile(): string | undefined {
    return this.getMeta("sound-profile");
  }

  setSoundProfile(profile: string): void {
    this.setMeta("sound-profile", profile);
  }

  /**
   * Inline a stylesheet into the document head
   */
  applyStyle(css: string): void {
    const $ = this.api();
    $("head").append($("<style></style>").text(css));
  }

  // ============================================================================
  // Content
  // ============================================================================

  hasContent(): boolean {
    return this.content().length > 0;
  }

  contentHtml(): string {
    return this.content().html() ?? "";
  }

  text(): string {
    return textLines(this.contentHtml()).join("\n");
  }

  /**
   * Content split at page breaks; always at least one page
   */
  pages(): string[] {
    const $ = this.api();
    const pages: string[] = [];
    let current: string[] = [];

    this.content()
      .contents()
      .each((_index: number, node: AnyNode) => {
        if (isTag(node) && $(node).is(this.config.pageBreakSelector)) {
          pages.push(current.join(""));
          current = [];
          return;
        }
        current.push($.html(node));
      });
    pages.push(current.join(""));

    const nonEmpty = pages.filter((page) => page.trim().length > 0);
    return nonEmpty.length > 0 ? nonEmpty : [""];
  }

  pageCount(): number {
    return this.pages().length;
  }

  pageLines(pageIndex: number): string[] {
    const pages = this.pages();
    const page = pages[pageIndex];
    if (page === undefined) {
      throw new RangeError(
        `Page ${pageIndex + 1} out of range, ${this.name} has ${pages.length} page(s)`,
      );
    }
    return textLines(page);
  }

  /**
   * Remove every element matching a selector; returns how many were removed
   */
  remove(selector: string): number {
    const matches = this.api()(selector);
    matches.remove();
    return matches.length;
  }

  // ============================================================================
  // Parts
  // ============================================================================

  parts(): SubDocument<SheetDocument>[] {
    const $ = this.api();
    const head = $("head").html() ?? "";
    const key = this.key();

    return $(this.config.partSelector)
      .toArray()
      .map((element, index) => {
        const $element = $(element);
        const name =
          $element.attr(PART_NAME_ATTRIBUTE)?.trim() ||
          $element.find("h1, h2, h3").first().text().trim() ||
          `Part ${index + 1}`;

        const part = SheetDocument.fromHtml(
          name,
          `<!DOCTYPE html><html><head>${head}</head><body>${$.html(element)}</body></html>`,
          // The part element itself is the content of the part document
          { ...this.config, contentSelector: "body > *" },
        );
        if (key !== null && part.key() === null) {
          part.setKey(key);
        }

        return { name, document: part };
      });
  }

  // ============================================================================
  // Key and chords
  // ============================================================================

  /**
   * Key as a position on the circle of fifths, or null when not declared
   */
  key(): number | null {
    const value = this.api()(this.config.keySelector).first().attr(KEY_ATTRIBUTE);
    if (value === undefined) return null;
    const key = Number.parseInt(value, 10);
    return Number.isNaN(key) ? null : key;
  }

  setKey(fifths: number): void {
    const $ = this.api();
    const target = $(this.config.keySelector).first();
    if (target.length > 0) {
      target.attr(KEY_ATTRIBUTE, String(fifths));
    } else {
      this.content().first().attr(KEY_ATTRIBUTE, String(fifths));
    }
  }

  chordSymbols(): string[] {
    const $ = this.api();
    return $(this.config.chordSelector)
      .toArray()
      .map((element) => $(element).text().trim());
  }

  /**
   * Replace the text of every chord symbol
   */
  mapChords(fn: (symbol: string) => string): void {
    const $ = this.api();
    $(this.config.chordSelector).each((_index, element) => {
      const $chord = $(element);
      $chord.text(fn($chord.text().trim()));
    });
  }

  // ============================================================================
  // Persistence
  // ============================================================================

  html(): string {
    return this.api().html();
  }

  async save(path: string): Promise<void> {
    const html = this.html();
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, html, "utf-8");
  }

  dispose(): void {
    this.disposed = true;
  }

  // ============================================================================
  // Private
  // ============================================================================

  private api(): CheerioAPI {
    if (this.disposed) {
      throw new Error(`Document ${this.name} has been disposed`);
    }
    return this.$;
  }

  private content() {
    return this.api()(this.config.contentSelector).first();
  }

  private getMeta(name: string): string | undefined {
    return this.api()(`meta[name="${name}"]`).attr("content");
  }

  private setMeta(name: string, content: string): void {
    const $ = this.api();
    const existing = $(`meta[name="${name}"]`);
    if (existing.length > 0) {
      existing.attr("content", content);
      return;
    }
    $("head").append($("<meta>").attr("name", name).attr("content", content));
  }
}
