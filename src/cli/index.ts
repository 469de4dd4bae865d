#!/usr/bin/env node

/**
 * CLI entry point for the Pexels photo downloader
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { downloadCommand } from "./commands/download";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("pexels-harvest")
  .description("Download every large2x photo matching a Pexels search")
  .version("0.1.0");

// Main download command (default action)
program
  .option("-k, --key <key>", "Pexels API authorization key")
  .option("-d, --dst <path>", "Folder to save photos")
  .option("-q, --query <query>", "Query for search")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(downloadCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
