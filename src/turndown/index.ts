/**
 * Turndown Configuration
 * Sets up Turndown with the custom rules for lead sheets
 */

import TurndownService from "turndown";
import { gfm } from "@truto/turndown-plugin-gfm";
import type { MarkdownConfig } from "../types";
import { chordSymbolRule } from "./rules";

export function createTurndownService(config: MarkdownConfig): TurndownService {
  const turndownService = new TurndownService({
    headingStyle: config.headingStyle,
    codeBlockStyle: config.codeBlockStyle,
    emDelimiter: config.emphasis,
    strongDelimiter: config.strong,
    bulletListMarker: config.bulletMarker,
    hr: config.horizontalRule,
    br: config.lineBreak,
    fence: config.codeFence,
  });

  // Add GitHub Flavored Markdown support (tables, strikethrough, task lists)
  turndownService.use(gfm);

  // Inline chord symbols
  turndownService.use(chordSymbolRule(config));

  // Inlined stylesheets and scripts are not content
  turndownService.remove((node) => node.nodeName === "STYLE" || node.nodeName === "SCRIPT");

  return turndownService;
}
