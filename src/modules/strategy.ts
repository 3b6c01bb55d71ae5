/**
 * Conversion strategy selection
 * Decides how a single job is written from the shape of its request
 */

export type ConversionStrategy =
  | "parts" // one output per part, names from a templated output
  | "extension" // run an extension, then write the whole document
  | "native" // document saves itself, no writer involved
  | "pages" // one output per page
  | "whole"; // one output for the whole document

export interface StrategyInput {
  templated: boolean;
  hasExtension: boolean;
  isNative: boolean;
  isPageSegmented: boolean;
}

/**
 * Order matters: first match wins, "whole" when nothing matches
 */
const STRATEGY_TABLE: ReadonlyArray<{
  strategy: ConversionStrategy;
  applies: (input: StrategyInput) => boolean;
}> = [
  { strategy: "parts", applies: (input) => input.templated },
  { strategy: "extension", applies: (input) => input.hasExtension },
  { strategy: "native", applies: (input) => input.isNative },
  { strategy: "pages", applies: (input) => input.isPageSegmented },
];

export function selectStrategy(input: StrategyInput): ConversionStrategy {
  for (const entry of STRATEGY_TABLE) {
    if (entry.applies(input)) {
      return entry.strategy;
    }
  }
  return "whole";
}
