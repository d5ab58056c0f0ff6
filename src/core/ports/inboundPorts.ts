import type { Result } from "neverthrow";
import type { DatasetError } from "../entities/appError";
import type {
  DatasetFilter,
  DatasetSummary,
  DateRange,
  ResolveOptions,
} from "../entities/dataset";
import type { ResolvedDataset } from "../entities/provenance";
import type { TableKey, TierResult } from "../entities/table";

export type LiveFetchRequest = {
  datasetId: string;
  table: TableKey | null;
  dateRange: DateRange | null;
  deadline?: Date;
};

/**
 * Contract every per-source collaborator implements. Failures must be
 * `live_fetch_error`s with `retryable` set: true for transport timeouts and
 * upstream 5xx/429, false for malformed payloads.
 */
export interface DatasetFetcherPort {
  fetch(request: LiveFetchRequest): Promise<Result<TierResult, DatasetError>>;
}

export interface DatasetResolverPort {
  resolve(
    id: string,
    options?: ResolveOptions,
  ): Promise<Result<ResolvedDataset, DatasetError>>;
  listDatasets(
    includeHidden?: boolean,
    filter?: DatasetFilter,
  ): Iterable<DatasetSummary>;
}
