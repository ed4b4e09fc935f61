#!/usr/bin/env tsx

/**
 * CLI entry point for the wiki exporter
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("wikitree-export")
  .description("Export a wiki to a static tree of HTML or Markdown files")
  .version("0.1.0");

// Main export command (default action)
program
  .argument("<inputConfig>", "JSON config describing the wiki to export")
  .argument("<outputDir>", "Directory the exported tree is written to")
  .option("--file-prefix <dir>", "Subdirectory for non-markup files")
  .option("--files-in-one-dir", "Flatten non-markup files into one directory")
  .option("--add-link-ext <ext>", "Extension appended to rendered pages")
  .option(
    "--ext-applies-to <target>",
    "Where the extension applies: output, referencesOnly or both",
  )
  .option("--format <format>", "Output format: html or markdown")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
