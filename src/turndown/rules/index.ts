/**
 * Custom Turndown Rules Index
 */

export { chordSymbolRule } from "./chord-symbol";
