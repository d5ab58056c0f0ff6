import type { TableKey } from "./table";

export type Visibility = "public" | "hidden";

export type UpdateSchedule = "daily" | "weekly" | "monthly" | "manual";

export type TableDescriptor = {
  key: TableKey;
  displayName: string;
  requiredColumns?: readonly string[];
};

export type ValidationRules = {
  requiredColumns: readonly string[];
  minRows: number;
  dateColumn?: string;
  maxFutureDays: number;
};

export type DatasetCapabilities = {
  cacheOnly: boolean;
  liveFetchable: boolean;
};

/**
 * Registry entry describing a dataset's identity, shape and capabilities.
 * An empty `tables` list means the dataset is a single implicit table.
 */
export type DatasetDescriptor = {
  id: string;
  displayName: string;
  description: string;
  source: string;
  geography: string;
  frequency: string;
  coverage?: string;
  url?: string;
  tables: readonly TableDescriptor[];
  visibility: Visibility;
  capabilities: DatasetCapabilities;
  legacyAliases: readonly string[];
  updateSchedule?: UpdateSchedule;
  staleAfterDays?: number;
  validation: Omit<ValidationRules, "maxFutureDays">;
};

export type DatasetSummary = {
  id: string;
  displayName: string;
  tables: TableKey[];
  visibility: Visibility;
};

/**
 * Catalog discovery filters. Each is a case-insensitive substring match;
 * `category` is matched against the description.
 */
export type DatasetFilter = {
  category?: string;
  source?: string;
  geography?: string;
};

export type TierName = "local" | "remote" | "live";

export type SourcePreference = TierName | "auto";

export type DateRange = {
  start?: string;
  end?: string;
};

/**
 * Caller options accepted by `resolve`, before validation.
 */
export type ResolveOptions = {
  table?: string;
  source?: SourcePreference;
  useCache?: boolean;
  quiet?: boolean;
  maxRetries?: number;
  acceptStale?: boolean;
  dateStart?: string;
  dateEnd?: string;
  deadline?: Date;
};

/**
 * Request after registry validation: aliases resolved, defaults applied.
 */
export type NormalizedRequest = {
  descriptor: DatasetDescriptor;
  requestedId: string;
  table: TableKey | null;
  source: SourcePreference;
  useCache: boolean;
  quiet: boolean;
  maxRetries: number;
  acceptStale: boolean;
  dateRange: DateRange | null;
  deadline?: Date;
};

export const tableKeys = (descriptor: DatasetDescriptor): TableKey[] =>
  descriptor.tables.map((table) => table.key);

/**
 * Cache key for a dataset, or for one of its tables when cached separately.
 */
export const cacheKeyFor = (datasetId: string, table?: TableKey | null) =>
  table ? `${datasetId}.${table}` : datasetId;

const scheduleMaxAgeDays: Record<UpdateSchedule, number> = {
  daily: 2,
  weekly: 14,
  monthly: 60,
  manual: Number.POSITIVE_INFINITY,
};

/**
 * Age after which a cached copy counts as stale: the descriptor's own
 * threshold, then its update schedule, then the configured default.
 */
export const maxAgeDaysFor = (
  descriptor: DatasetDescriptor,
  fallbackDays: number,
): number => {
  if (typeof descriptor.staleAfterDays === "number") {
    return descriptor.staleAfterDays;
  }

  return descriptor.updateSchedule
    ? scheduleMaxAgeDays[descriptor.updateSchedule]
    : fallbackDays;
};

/**
 * Cache keys consulted for a request, most specific first.
 */
export const candidateCacheKeys = (
  datasetId: string,
  table: TableKey | null,
): string[] =>
  table ? [cacheKeyFor(datasetId, table), datasetId] : [datasetId];
