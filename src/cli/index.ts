#!/usr/bin/env node

/**
 * CLI entry point for sheetpress
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { batchCommand } from "./commands/batch";
import { configCommand } from "./commands/config";
import { convertCommand } from "./commands/convert";
import { jobsCommand } from "./commands/jobs";

const program = new Command();

program
  .name("sheetpress")
  .description("Convert HTML lead sheets to Markdown, text, JSON and SVG pages")
  .version("0.1.0");

function withConversionOptions(command: Command): Command {
  return command
    .option("-s, --style <path>", "Stylesheet inlined into every document")
    .option("-f, --force", "Load documents newer than this version supports")
    .option("--sound-profile <name>", "Sound profile set on every document")
    .option("-e, --extension <uri>", "Extension run on every document (e.g. ext:remove?selector=.note)")
    .option("-c, --config <path>", "Path to custom config file")
    .option("-r, --report <path>", "Write run statistics as JSON")
    .option("-v, --verbose", "Verbose output");
}

withConversionOptions(
  program
    .command("batch <jobFile>")
    .description("Run every job of a batch job file"),
).action(batchCommand);

withConversionOptions(
  program
    .command("convert <input> <output>")
    .description("Convert one input file"),
)
  .option("--transpose <json>", "Transposition options as JSON")
  .option("--parts", "Treat <output> as a template (parts/*.md), one file per part")
  .action(convertCommand);

program
  .command("jobs <pattern>")
  .description("Write a batch job file for every input matching a glob pattern")
  .option("--format <formats...>", "Output formats per input (default: md)")
  .option("--parts <format>", "Also write one file per part in this format")
  .option("--out-dir <path>", "Output directory (default: beside each input)")
  .option("--write <path>", "Write the job file here instead of stdout")
  .action(jobsCommand);

program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
