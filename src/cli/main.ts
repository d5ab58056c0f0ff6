import { Command, InvalidArgumentError } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import {
  formatErrorChain,
  type DatasetError,
} from "../core/entities/appError";
import type { SourcePreference } from "../core/entities/dataset";
import { logger } from "../shared/logger/logger";
import {
  formatCacheEntries,
  formatCacheStatus,
  formatDatasetInfo,
  formatDatasetList,
  formatRemoteAssets,
  formatResolvedReport,
  formatUpdateReports,
} from "./reports";

const sources: readonly SourcePreference[] = ["auto", "local", "remote", "live"];

const parseSource = (value: string): SourcePreference => {
  const match = sources.find((source) => source === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${sources.join(", ")}.`);
  }
  return match;
};

const parseInteger = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return parsed;
};

/**
 * Prints the error chain and marks the process as failed without exiting,
 * so pending log writes still flush.
 */
const fail = (error: DatasetError): void => {
  logger.debug({ code: error.code, datasetId: error.datasetId }, "Command failed");
  console.error(formatErrorChain(error));
  process.exitCode = 1;
};

type GetOptions = {
  table?: string;
  source: SourcePreference;
  cache: boolean;
  quiet?: boolean;
  maxRetries: number;
  acceptStale?: boolean;
  from?: string;
  to?: string;
  timeout?: number;
  rows: number;
  json?: boolean;
};

type ListOptions = {
  all?: boolean;
  category?: string;
  source?: string;
  geography?: string;
};

export const buildCli = () => {
  const cli = new Command();
  cli
    .name("housing-datasets")
    .description("Resolve Brazilian housing datasets from the local cache, the remote release or the source");

  cli
    .command("get")
    .description("Resolve a dataset and print a preview or JSON")
    .argument("<id>", "Dataset id or legacy alias")
    .option("--table <table>", "Table to extract from a multi-table dataset")
    .option("--source <source>", "auto, local, remote or live", parseSource, "auto")
    .option("--no-cache", "Skip the local cache for reads and writes")
    .option("--quiet", "Only log warnings and errors")
    .option("--max-retries <n>", "Attempts per network tier", parseInteger, 3)
    .option("--accept-stale", "Serve local entries past their freshness limit")
    .option("--from <date>", "Keep rows dated on or after YYYY-MM-DD")
    .option("--to <date>", "Keep rows dated on or before YYYY-MM-DD")
    .option("--timeout <seconds>", "Give up on network tiers after this many seconds", parseInteger)
    .option("--rows <n>", "Rows to preview per table", parseInteger, 5)
    .option("--json", "Print the resolved data and provenance as JSON")
    .action(async (id: string, opts: GetOptions) => {
      const { resolver } = createRuntime();
      const resolved = await resolver.resolve(id, {
        table: opts.table,
        source: opts.source,
        useCache: opts.cache,
        quiet: Boolean(opts.quiet),
        maxRetries: opts.maxRetries,
        acceptStale: Boolean(opts.acceptStale),
        dateStart: opts.from,
        dateEnd: opts.to,
        deadline:
          typeof opts.timeout === "number"
            ? new Date(Date.now() + opts.timeout * 1_000)
            : undefined,
      });

      if (resolved.isErr()) {
        fail(resolved.error);
        return;
      }

      console.log(
        opts.json
          ? JSON.stringify(resolved.value, null, 2)
          : formatResolvedReport(id, resolved.value, opts.rows),
      );
    });

  cli
    .command("list")
    .description("List available datasets")
    .option("--all", "Include hidden datasets")
    .option("--category <text>", "Keep datasets whose description mentions the text")
    .option("--source <text>", "Keep datasets published by a matching source")
    .option("--geography <text>", "Keep datasets covering a matching geography")
    .action((opts: ListOptions) => {
      const { resolver } = createRuntime();
      const summaries = resolver.listDatasets(Boolean(opts.all), {
        category: opts.category,
        source: opts.source,
        geography: opts.geography,
      });
      console.log(formatDatasetList(summaries));
    });

  cli
    .command("info")
    .description("Show a dataset's descriptor")
    .argument("<id>", "Dataset id or legacy alias")
    .action((id: string) => {
      const { registry } = createRuntime();
      const info = registry.info(id);
      if (info.isErr()) {
        fail(info.error);
        return;
      }
      console.log(formatDatasetInfo(info.value));
    });

  const cache = cli.command("cache").description("Inspect and maintain the local cache");

  cache
    .command("list")
    .description("List cached entries")
    .action(async () => {
      const { maintenance } = createRuntime();
      console.log(formatCacheEntries(await maintenance.entries()));
    });

  cache
    .command("status")
    .description("Report freshness per dataset")
    .action(async () => {
      const { maintenance } = createRuntime();
      console.log(formatCacheStatus(await maintenance.status()));
    });

  cache
    .command("clear")
    .description("Remove one dataset's cached entries, or all of them")
    .argument("[id]", "Dataset id or legacy alias")
    .action(async (id: string | undefined) => {
      const { maintenance } = createRuntime();
      const cleared = await maintenance.clear(id);
      if (cleared.isErr()) {
        fail(cleared.error);
        return;
      }
      console.log(`Removed ${cleared.value} cached entr${cleared.value === 1 ? "y" : "ies"}.`);
    });

  cache
    .command("update")
    .description("Copy remote release assets into the local cache")
    .argument("[id]", "Dataset id or legacy alias; every public dataset when omitted")
    .option("--force", "Download even when the local copy is current")
    .option("--max-retries <n>", "Attempts per download", parseInteger, 3)
    .action(async (id: string | undefined, opts: { force?: boolean; maxRetries: number }) => {
      const { maintenance } = createRuntime();
      const updated = await maintenance.update(id, {
        force: Boolean(opts.force),
        maxRetries: opts.maxRetries,
      });
      if (updated.isErr()) {
        fail(updated.error);
        return;
      }
      console.log(formatUpdateReports(updated.value));
      if (updated.value.some((report) => report.status === "error")) {
        process.exitCode = 1;
      }
    });

  cli
    .command("remote")
    .description("Inspect the remote release")
    .command("list")
    .description("List assets on the configured release")
    .action(async () => {
      const { maintenance } = createRuntime();
      const assets = await maintenance.remoteAssets();
      if (assets.isErr()) {
        fail(assets.error);
        return;
      }
      console.log(formatRemoteAssets(assets.value));
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
