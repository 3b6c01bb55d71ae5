/**
 * Writer registry for lead sheets
 */

import type { ConverterConfig, Writer, WriterRegistry } from "../../types";
import { loadPageTemplate } from "../../templates";
import type { SheetDocument } from "../document";
import { MarkdownWriter } from "./markdown";
import { OutlineWriter } from "./outline";
import { SvgPageWriter } from "./svg";
import { TextWriter } from "./text";

export { MarkdownWriter, OutlineWriter, SvgPageWriter, TextWriter };
export { buildOutline } from "./outline";
export type { SheetOutline } from "./outline";

export class SheetWriterRegistry implements WriterRegistry<SheetDocument> {
  private readonly writers = new Map<string, Writer<SheetDocument>>();

  register(kinds: string[], writer: Writer<SheetDocument>): this {
    for (const kind of kinds) {
      this.writers.set(kind.toLowerCase(), writer);
    }
    return this;
  }

  lookup(kind: string): Writer<SheetDocument> | undefined {
    return this.writers.get(kind.toLowerCase());
  }

  kinds(): string[] {
    return [...this.writers.keys()];
  }
}

/**
 * Registry with every built-in writer
 * Throws if a custom SVG template cannot be read
 */
export async function createWriterRegistry(
  config: ConverterConfig,
): Promise<SheetWriterRegistry> {
  const pageTemplate = await loadPageTemplate(config.svg.template);

  return new SheetWriterRegistry()
    .register(["md", "markdown"], new MarkdownWriter(config.markdown))
    .register(["txt"], new TextWriter())
    .register(["json"], new OutlineWriter())
    .register(["svg"], new SvgPageWriter(config.svg, pageTemplate));
}
