import type {
  DatasetCacheStatus,
  DatasetUpdateReport,
} from "../application/services/cacheMaintenanceService";
import type { CacheSummary, RemoteAsset } from "../core/entities/cache";
import type {
  DatasetDescriptor,
  DatasetSummary,
} from "../core/entities/dataset";
import type { ResolvedDataset } from "../core/entities/provenance";
import type { CellValue, Table } from "../core/entities/table";

const formatCell = (value: CellValue | undefined): string =>
  value === null || value === undefined ? "" : String(value);

const formatBytes = (bytes: number): string => {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KiB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
};

const tableLines = (name: string, table: Table, rowLimit: number): string[] => {
  if (table.kind === "record") {
    return [`${name}: record with ${Object.keys(table.value).length} field(s)`];
  }

  const lines = [
    `${name}: ${table.rows.length} row(s) x ${table.columns.length} column(s)`,
    `  ${table.columns.join(" | ")}`,
  ];
  table.rows.slice(0, rowLimit).forEach((row) => {
    lines.push(`  ${table.columns.map((column) => formatCell(row[column])).join(" | ")}`);
  });
  if (table.rows.length > rowLimit) {
    lines.push(`  ... ${table.rows.length - rowLimit} more row(s)`);
  }
  return lines;
};

/**
 * Terminal view of a resolved dataset: provenance first, then a preview of
 * each table.
 */
export const formatResolvedReport = (
  datasetId: string,
  resolved: ResolvedDataset,
  rowLimit = 5,
): string => {
  const { provenance, data } = resolved;
  const lines = [
    `Dataset: ${datasetId}${provenance.table ? ` (table ${provenance.table})` : ""}`,
    `Source: ${provenance.source}`,
    `Fetched: ${provenance.fetchedAt.toISOString()}`,
    `Retries: ${provenance.retries}`,
  ];

  if (provenance.notes.length > 0) {
    lines.push("Notes:");
    provenance.notes.forEach((note) => lines.push(`- ${note}`));
  }

  lines.push("");
  if (data.shape === "single") {
    lines.push(...tableLines(provenance.table ?? datasetId, data.table, rowLimit));
  } else {
    Object.entries(data.tables).forEach(([key, table]) => {
      lines.push(...tableLines(key, table, rowLimit));
    });
  }

  return lines.join("\n");
};

export const formatDatasetList = (summaries: Iterable<DatasetSummary>): string => {
  const lines: string[] = [];
  for (const summary of summaries) {
    const hidden = summary.visibility === "hidden" ? " (hidden)" : "";
    const tables = summary.tables.length > 0 ? ` [${summary.tables.join(", ")}]` : "";
    lines.push(`${summary.id}${hidden}: ${summary.displayName}${tables}`);
  }
  return lines.length > 0 ? lines.join("\n") : "No datasets.";
};

export const formatDatasetInfo = (descriptor: DatasetDescriptor): string => {
  const lines = [
    `${descriptor.id}: ${descriptor.displayName}`,
    descriptor.description,
    `Source: ${descriptor.source}`,
    `Geography: ${descriptor.geography}`,
    `Frequency: ${descriptor.frequency}`,
  ];
  if (descriptor.coverage) {
    lines.push(`Coverage: ${descriptor.coverage}`);
  }
  if (descriptor.url) {
    lines.push(`URL: ${descriptor.url}`);
  }
  lines.push(
    `Live fetch: ${descriptor.capabilities.liveFetchable ? "yes" : "no (cache tiers only)"}`,
  );
  if (descriptor.legacyAliases.length > 0) {
    lines.push(`Aliases: ${descriptor.legacyAliases.join(", ")}`);
  }

  lines.push("Tables:");
  if (descriptor.tables.length === 0) {
    lines.push("- (single table)");
  } else {
    descriptor.tables.forEach((table) =>
      lines.push(`- ${table.key}: ${table.displayName}`),
    );
  }

  return lines.join("\n");
};

export const formatCacheEntries = (entries: readonly CacheSummary[]): string => {
  if (entries.length === 0) {
    return "Local cache is empty.";
  }

  return entries
    .map(
      (entry) =>
        `${entry.key}: ${entry.rowCount} row(s), ${formatBytes(entry.sizeBytes)} ${entry.format}, from ${entry.source}, ${entry.ageDays.toFixed(1)} day(s) old`,
    )
    .join("\n");
};

export const formatCacheStatus = (statuses: readonly DatasetCacheStatus[]): string =>
  statuses
    .map((status) => {
      const limit = Number.isFinite(status.maxAgeDays)
        ? `${status.maxAgeDays}d`
        : "never";
      const keys = status.entries.map((entry) => entry.key).join(", ");
      return `${status.datasetId}: ${status.state} (stale after ${limit})${keys ? ` ${keys}` : ""}`;
    })
    .join("\n");

export const formatUpdateReports = (reports: readonly DatasetUpdateReport[]): string =>
  reports
    .flatMap((report) => {
      if (report.status === "error") {
        return [`${report.datasetId}: failed (${report.error.message})`];
      }
      return report.outcomes.map(
        (outcome) =>
          `${outcome.key}: ${outcome.status.replaceAll("_", " ")}${outcome.message ? ` (${outcome.message})` : ""}`,
      );
    })
    .join("\n");

export const formatRemoteAssets = (assets: readonly RemoteAsset[]): string => {
  if (assets.length === 0) {
    return "Remote release has no dataset assets.";
  }

  return assets
    .map(
      (asset) =>
        `${asset.name}: ${formatBytes(asset.sizeBytes)}, updated ${asset.updatedAt.toISOString()}`,
    )
    .join("\n");
};
