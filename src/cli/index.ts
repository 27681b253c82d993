#!/usr/bin/env tsx

/**
 * CLI entry point for docdrop
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { processCommand } from "./commands/process";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("docdrop")
  .description("Turn folders of scans and documents into organized documents")
  .version("0.1.0");

// Main processing command (default action)
program
  .option("-i, --input <path>", "Input directory with one folder per document")
  .option("-o, --output <path>", "Directory for generated files")
  .option("-d, --destination <path>", "Delivery root")
  .option("-f, --format <format>", "Output format: Word, PDF, Text or Markdown")
  .option("--organize <criteria>", "Organize by date, year, month, name or type")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--categorize", "Categorize documents with OpenAI")
  .option("--no-dates", "Do not tag documents with dates found in their text")
  .option("-v, --verbose", "Verbose output")
  .action(processCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
