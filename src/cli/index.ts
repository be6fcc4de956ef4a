import { Command } from "commander";

import { DEFAULT_SNAPSHOT_PATH, registerPackagesCommand } from "./packages.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("curaview")
    .description("Query curated package data of software composition analysis runs")
    .option("--data <path>", `Run snapshot JSON file (default: ${DEFAULT_SNAPSHOT_PATH})`)
    .option("--config <path>", "Engine config YAML file")
    .option("--json", "Print JSON envelopes instead of text", false)
    .option("--pretty", "Pretty-print JSON output", false)
    .option("--debug", "Include error codes, causes and stacks", false);

  registerPackagesCommand(program);

  return program;
}
