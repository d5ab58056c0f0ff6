import { err, ok, type Result } from "neverthrow";
import type { DatasetError } from "../../core/entities/appError";
import type {
  CacheSummary,
  RemoteAsset,
  RemoteUpdateOutcome,
} from "../../core/entities/cache";
import {
  maxAgeDaysFor,
  type DatasetDescriptor,
} from "../../core/entities/dataset";
import type { RetryTiming } from "../../core/entities/retry";
import type {
  LocalCachePort,
  RemoteCachePort,
} from "../../core/ports/outboundPorts";
import { logger, type Logger } from "../../shared/logger/logger";
import type { DatasetRegistry } from "./datasetRegistry";

export type CachedKeyStatus = CacheSummary & { stale: boolean };

export type DatasetCacheStatus = {
  datasetId: string;
  state: "fresh" | "stale" | "missing";
  maxAgeDays: number;
  entries: CachedKeyStatus[];
};

export type DatasetUpdateReport =
  | { datasetId: string; status: "ok"; outcomes: RemoteUpdateOutcome[] }
  | { datasetId: string; status: "error"; error: DatasetError };

const belongsTo = (key: string, datasetId: string): boolean =>
  key === datasetId || key.startsWith(`${datasetId}.`);

/**
 * Housekeeping for the local cache: freshness report, clearing and bulk
 * refresh from the remote release.
 */
export class CacheMaintenanceService {
  constructor(
    private readonly registry: DatasetRegistry,
    private readonly cache: LocalCachePort,
    private readonly remote: RemoteCachePort,
    private readonly defaultMaxAgeDays: number,
    private readonly retryDelays: Omit<RetryTiming, "maxAttempts">,
    private readonly log: Logger = logger,
  ) {}

  async entries(): Promise<CacheSummary[]> {
    return this.cache.list();
  }

  /**
   * Freshness of every public dataset. A dataset is stale when any of its
   * cached keys is older than its threshold.
   */
  async status(): Promise<DatasetCacheStatus[]> {
    const summaries = await this.cache.list();
    const statuses: DatasetCacheStatus[] = [];

    for (const summary of this.registry.list()) {
      const descriptor = this.registry.info(summary.id);
      if (descriptor.isErr()) {
        continue;
      }

      const maxAgeDays = maxAgeDaysFor(descriptor.value, this.defaultMaxAgeDays);
      const entries = summaries
        .filter((entry) => belongsTo(entry.key, summary.id))
        .map((entry) => ({ ...entry, stale: entry.ageDays > maxAgeDays }));

      statuses.push({
        datasetId: summary.id,
        state:
          entries.length === 0
            ? "missing"
            : entries.some((entry) => entry.stale)
              ? "stale"
              : "fresh",
        maxAgeDays,
        entries,
      });
    }

    return statuses;
  }

  /**
   * Removes a dataset's cached keys, or the whole cache when no id is given.
   */
  async clear(datasetId?: string): Promise<Result<number, DatasetError>> {
    if (!datasetId) {
      const removed = await this.cache.clear();
      this.log.info({ removed }, "Cleared local cache");
      return ok(removed);
    }

    const found = this.registry.lookup(datasetId, { includeHidden: true });
    if (found.isErr()) {
      return err(found.error);
    }

    const id = found.value.descriptor.id;
    const keys = (await this.cache.list())
      .map((entry) => entry.key)
      .filter((key) => belongsTo(key, id));

    let removed = 0;
    for (const key of keys) {
      removed += await this.cache.clear(key);
    }

    this.log.info({ datasetId: id, removed }, "Cleared cached dataset");
    return ok(removed);
  }

  /**
   * Copies remote assets into the local cache for one dataset, or for every
   * public dataset. Per-dataset failures are reported, not thrown.
   */
  async update(
    datasetId?: string,
    options: { force?: boolean; maxRetries?: number; deadline?: Date } = {},
  ): Promise<Result<DatasetUpdateReport[], DatasetError>> {
    let targets: DatasetDescriptor[];
    if (datasetId) {
      const found = this.registry.lookup(datasetId);
      if (found.isErr()) {
        return err(found.error);
      }
      targets = [found.value.descriptor];
    } else {
      targets = [...this.registry.list()].flatMap((summary) => {
        const descriptor = this.registry.info(summary.id);
        return descriptor.isOk() ? [descriptor.value] : [];
      });
    }

    const retry = { ...this.retryDelays, maxAttempts: options.maxRetries ?? 3 };
    const reports: DatasetUpdateReport[] = [];
    for (const descriptor of targets) {
      const updated = await this.remote.updateFromRemote(descriptor, {
        retry,
        force: options.force,
        deadline: options.deadline,
      });

      if (updated.isErr()) {
        this.log.warn(
          { datasetId: descriptor.id, code: updated.error.code },
          updated.error.message,
        );
        reports.push({ datasetId: descriptor.id, status: "error", error: updated.error });
        continue;
      }

      reports.push({ datasetId: descriptor.id, status: "ok", outcomes: updated.value });
    }

    return ok(reports);
  }

  async remoteAssets(
    maxRetries = 3,
    deadline?: Date,
  ): Promise<Result<RemoteAsset[], DatasetError>> {
    return this.remote.listAssets(
      { ...this.retryDelays, maxAttempts: maxRetries },
      deadline,
    );
  }
}
