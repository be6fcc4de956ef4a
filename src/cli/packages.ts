import { Command } from "commander";

import { SnapshotPackageDataSource } from "../adapters/snapshot-source.js";
import { PackageService } from "../app/package-service.js";
import { loadEngineConfig } from "../core/config-loader.js";
import { createDefaultConfig, type EngineConfig } from "../core/config.js";
import { JsonlLogger } from "../core/logger.js";
import type { EcosystemStats, ListQueryResult, PackageRunData } from "../model/types.js";
import { parsePackageQuery } from "../query/query-parameters.js";

import { emitError, emitResult, type CliOutputOptions } from "./output.js";
import {
  collectValues,
  parseFilterArg,
  parseIntegerOption,
  parseRunIds,
  parseSortArg,
} from "./query-args.js";

export const DEFAULT_SNAPSHOT_PATH = ".curaview/snapshot.json";

type GlobalOptions = {
  data?: string;
  config?: string;
  json?: boolean;
  pretty?: boolean;
  debug?: boolean;
};

type RunOptions = {
  run: string[];
};

type ListOptions = RunOptions & {
  sort: string[];
  filter: string[];
  limit?: string;
  offset?: string;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerPackagesCommand(program: Command): void {
  const packages = program.command("packages").description("Query curated packages of analysis runs");

  packages
    .command("list")
    .description("List curated packages, deduplicated across runs")
    .option("--run <id>", "Run id to include (repeatable, comma separated)", collectValues, [])
    .option("--sort <field[:dir]>", "Sort key, e.g. purl:desc (repeatable)", collectValues, [])
    .option("--filter <field:op:value>", "Filter, e.g. purl:ilike:pkg:npm (repeatable)", collectValues, [])
    .option("--limit <n>", "Maximum number of packages to return")
    .option("--offset <n>", "Number of packages to skip")
    .action(async (opts: ListOptions, command: Command) => {
      await runAction(command, async (service, config) => {
        const query = parsePackageQuery(
          {
            sort: opts.sort.map(parseSortArg),
            filters: opts.filter.map(parseFilterArg),
            limit: parseIntegerOption(opts.limit) ?? null,
            offset: parseIntegerOption(opts.offset) ?? 0,
          },
          { defaultSort: config.query.default_sort, maxLimit: config.query.max_limit },
        );
        return service.listForRunIds(parseRunIds(opts.run), query);
      }, renderPackageList);
    });

  packages
    .command("count")
    .description("Count distinct packages across runs")
    .option("--run <id>", "Run id to include (repeatable, comma separated)", collectValues, [])
    .action(async (opts: RunOptions, command: Command) => {
      await runAction(command, (service) => service.countForRunIds(parseRunIds(opts.run)), (count) => [
        `Packages: ${count}`,
      ]);
    });

  packages
    .command("ecosystems")
    .description("Count distinct packages per ecosystem")
    .option("--run <id>", "Run id to include (repeatable, comma separated)", collectValues, [])
    .action(async (opts: RunOptions, command: Command) => {
      await runAction(
        command,
        (service) => service.countEcosystemsForRunIds(parseRunIds(opts.run)),
        renderEcosystems,
      );
    });

  packages
    .command("licenses")
    .description("List distinct processed declared licenses")
    .option("--run <id>", "Run id to include (repeatable, comma separated)", collectValues, [])
    .action(async (opts: RunOptions, command: Command) => {
      await runAction(
        command,
        (service) => service.getProcessedDeclaredLicenses(parseRunIds(opts.run)),
        (licenses) => (licenses.length > 0 ? licenses : ["(no declared licenses)"]),
      );
    });
}

// =============================================================================
// ACTION PLUMBING
// =============================================================================

async function runAction<T>(
  command: Command,
  execute: (service: PackageService, config: EngineConfig) => Promise<T>,
  renderText: (result: T) => string[],
): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const output: CliOutputOptions = {
    useJson: globals.json ?? false,
    prettyJson: globals.pretty ?? false,
    debug: globals.debug ?? false,
  };

  try {
    const config = globals.config ? loadEngineConfig(globals.config) : createDefaultConfig();
    const dataSource = await SnapshotPackageDataSource.fromFile(globals.data ?? DEFAULT_SNAPSHOT_PATH);
    const service = new PackageService({
      dataSource,
      logger: config.logging.file ? new JsonlLogger(config.logging.file, { source: "cli" }) : undefined,
      maxLimit: config.query.max_limit,
    });

    emitResult(await execute(service, config), output, renderText);
  } catch (error) {
    emitError(error, output);
  }
}

// =============================================================================
// TEXT RENDERING
// =============================================================================

function renderPackageList(result: ListQueryResult<PackageRunData>): string[] {
  if (result.data.length === 0) {
    return [`No packages matched (total: ${result.totalCount}).`];
  }

  const purlWidth = Math.max("PURL".length, ...result.data.map((view) => view.pkg.purl.length));
  const lines = [`${pad("PURL", purlWidth)}  RUN  PATHS  LICENSE`];

  for (const view of result.data) {
    const license = view.pkg.processedDeclaredLicense.spdxExpression || "-";
    const concluded = view.concludedLicense ? ` (concluded: ${view.concludedLicense})` : "";
    lines.push(
      `${pad(view.pkg.purl, purlWidth)}  ${pad(`${view.runId}`, 3)}  ${pad(
        `${view.shortestDependencyPaths.length}`,
        5,
      )}  ${license}${concluded}`,
    );
  }

  lines.push(`Showing ${result.data.length} of ${result.totalCount} package(s).`);
  return lines;
}

function renderEcosystems(ecosystems: EcosystemStats[]): string[] {
  if (ecosystems.length === 0) {
    return ["(no packages)"];
  }

  const width = Math.max(...ecosystems.map((entry) => entry.name.length));
  return ecosystems.map((entry) => `${pad(entry.name, width)}  ${entry.count}`);
}

function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}
