/**
 * Commander program for zlinker
 */

import { Command } from "commander";
import { linkCommand } from "./commands/link";
import { configCommand } from "./commands/config";
import { targetsCommand } from "./commands/targets";

export function createProgram(): Command {
  const program = new Command();

  // Root options stop at the first subcommand, so `targets -c` stays local
  program
    .name("zlinker")
    .description(
      "Link z-app data between them and publish every link as a short URL",
    )
    .version("0.1.0")
    .enablePositionalOptions();

  // Main linking command (default action)
  program
    .option("-d, --data <path>", "Data file path", "data.txt")
    .option("-f, --fast", "Resolve links in dependency order (fails on cycles)")
    .option("-p, --preview", "Write the links graph to a Graphviz DOT file")
    .option("--dry-run", "Parse and link without creating short URLs")
    .option("--with-debug", "Add a debug link listing every link")
    .option("-c, --config <path>", "Path to custom config file")
    .option("-q, --quiet", "Only show the progress bar while resolving")
    .option("-v, --verbose", "Verbose output")
    .action(linkCommand);

  // Config command - show config location
  program
    .command("config")
    .description("Show configuration file location")
    .action(configCommand);

  // Targets command - list separators and their apps
  program
    .command("targets")
    .description("List header separators and the apps they target")
    .option("-c, --config <path>", "Path to custom config file")
    .action(targetsCommand);

  return program;
}
