/**
 * Turndown Rule: Inline Chord Symbols
 *
 * Lead sheets mark chords as <span class="chord">Am7</span> above or inside
 * lyric lines. Markdown has no equivalent, so they are written inline
 * between the configured delimiters: "[Am7]Autumn leaves".
 */

import type TurndownService from "turndown";
import type { MarkdownConfig } from "../../types";

export const CHORD_CLASS = "chord";

function hasClass(node: HTMLElement, className: string): boolean {
  const classes = node.getAttribute("class");
  return classes !== null && classes.split(/\s+/).includes(className);
}

export function chordSymbolRule(config: MarkdownConfig) {
  return (service: TurndownService): void => {
    service.addRule("chordSymbol", {
      filter: (node) => hasClass(node, CHORD_CLASS),
      replacement: (content) => {
        const symbol = content.trim();
        if (!symbol) return "";
        return `${config.chordOpen}${symbol}${config.chordClose}`;
      },
    });
  };
}
