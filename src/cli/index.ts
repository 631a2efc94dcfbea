#!/usr/bin/env node

/**
 * CLI entry point for morphmv
 * Rename, copy or convert a file depending on the destination extension
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("morphmv")
  .description("Move or convert files based on destination extension")
  .version("0.1.0");

// Main command (default action)
program
  .argument("[source]", "Source file (single mode) or an extra batch input")
  .argument("[destination]", "Destination file (single mode)")
  .option("--plan", "Show the plan without executing")
  .option("--dry-run", "Alias for --plan")
  .option("--overwrite", "Overwrite destination if it exists")
  .option("--backup", "Back up destination if it exists (.bak, .bak.1, ...)")
  .option("--move-source", "Delete the source after a successful run")
  .option("--json", "Emit JSON output")
  .option("--batch", "Enable batch mode")
  .option("--dest-dir <dir>", "Destination directory for batch mode")
  .option("--input <path...>", "Additional batch inputs (paths, directories or globs)")
  .option("--stdin", "Read batch inputs from stdin, one per line")
  .option("--recursive", "Recurse into directories in batch mode")
  .option("--to-ext <ext>", "Change the destination extension in batch mode (e.g. mp3)")
  .option("--interactive", "Show a live dashboard while the batch runs")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--profile <name>", "Config profile name")
  .option("--image-quality <n>", "Image quality (1-100) for ImageMagick conversions")
  .option("--video-bitrate <rate>", "Video bitrate (e.g. 2500k) for ffmpeg conversions")
  .option("--audio-bitrate <rate>", "Audio bitrate (e.g. 192k) for ffmpeg conversions")
  .option("--preset <name>", "Encoder preset (e.g. fast, medium) for ffmpeg conversions")
  .option("--video-codec <codec>", "ffmpeg video codec (e.g. libx264, libx265)")
  .option("--audio-codec <codec>", "ffmpeg audio codec (e.g. aac, libopus)")
  .option("--stream-copy", "Force ffmpeg stream copy (no re-encode)")
  .option("--transcode", "Force ffmpeg transcode (re-encode)")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--show", "Print the merged configuration")
  .action(configCommand);

await program.parseAsync();
