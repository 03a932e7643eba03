#!/usr/bin/env node

/**
 * CLI entry point for the Mela to Mealie migrator
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { migrateCommand } from "./commands/migrate";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("mealie-migrate")
  .description("Migrate a Mela recipe export into a Mealie server")
  .version("0.1.0");

// Main migration command (default action)
program
  .argument("[export]", "Mela export: .melarecipes, .melarecipe, or a directory of them")
  .option("--url <url>", "Mealie base URL (overrides config)")
  .option("--token <token>", "Mealie API token (overrides config)")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--dry-run", "Preview the migration without contacting Mealie")
  .option("--skip-images", "Do not upload recipe images")
  .option("--report <file>", "Write the JSON report to a file")
  .option("--json", "Print the JSON report instead of the summary")
  .option("-v, --verbose", "Verbose output")
  .action(async (exportPath: string | undefined, options) => {
    if (!exportPath) {
      return program.help();
    }
    await migrateCommand(exportPath, options);
  });

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
