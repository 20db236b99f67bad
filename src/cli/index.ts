#!/usr/bin/env node

/**
 * CLI entry point for imgbatch
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { configCommand } from "./commands/config";
import { downloadCommand } from "./commands/download";
import { processCommand } from "./commands/process";

const program = new Command();

program
  .name("imgbatch")
  .description("Download and process images in bulk, with a per-item run report")
  .version("0.1.0");

function withRunOptions(command: Command): Command {
  return command
    .option("-o, --output <path>", "Output directory")
    .option("--ext <extension>", "Output file extension (selects the format)")
    .option("-j, --jobs <n>", "Number of concurrent workers")
    .option("--resize <WxH>", "Resize every image to WIDTHxHEIGHT")
    .option("--min-dim <n>", "Resize so the smaller side is n pixels")
    .option("--grayscale", "Convert to grayscale")
    .option("--brightness", "Record mean brightness in the run report")
    .option("--dhash", "Record a difference hash in the run report")
    .option("--overwrite", "Process items whose output already exists")
    .option("--report <path>", "Save the run report (.csv or .json)")
    .option("-c, --config <path>", "Path to custom config file")
    .option("-v, --verbose", "Verbose output");
}

withRunOptions(
  program
    .command("download <urls-file>")
    .description("Download the image URLs listed in a file, one per line")
    .option("--hash-names", "Name outputs by a hash of the URL"),
).action(downloadCommand);

withRunOptions(
  program
    .command("process <input-dir>")
    .description("Process every image file under a directory"),
).action(processCommand);

program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
