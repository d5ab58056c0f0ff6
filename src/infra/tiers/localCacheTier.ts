import { err, ok, type Result } from "neverthrow";
import {
  cacheMissError,
  type DatasetError,
} from "../../core/entities/appError";
import {
  candidateCacheKeys,
  maxAgeDaysFor,
} from "../../core/entities/dataset";
import { isEmptyResult } from "../../core/entities/table";
import type {
  ClockPort,
  DatasetTierPort,
  LocalCachePort,
  TierFetch,
  TierRequest,
} from "../../core/ports/outboundPorts";
import { logger, type Logger } from "../../shared/logger/logger";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Serves requests from the on-disk cache. Never touches the network.
 */
export class LocalCacheTier implements DatasetTierPort {
  readonly name = "local" as const;

  constructor(
    private readonly cache: LocalCachePort,
    private readonly clock: ClockPort,
    private readonly defaultMaxAgeDays: number,
    private readonly log: Logger = logger,
  ) {}

  async fetch(request: TierRequest): Promise<Result<TierFetch, DatasetError>> {
    const datasetId = request.descriptor.id;
    const maxAgeDays = maxAgeDaysFor(request.descriptor, this.defaultMaxAgeDays);
    const reasons: string[] = [];

    for (const key of candidateCacheKeys(datasetId, request.table)) {
      const loaded = await this.cache.load(key, {
        maxAgeDays,
        acceptStale: request.acceptStale,
      });

      if (loaded.isErr()) {
        reasons.push(loaded.error.message);
        continue;
      }

      const entry = loaded.value;
      if (isEmptyResult(entry.payload)) {
        reasons.push(`Cached '${key}' holds no rows.`);
        continue;
      }

      const ageDays =
        (this.clock.now().getTime() - entry.metadata.savedAt.getTime()) / DAY_MS;
      const notes = [`local entry '${key}' saved ${entry.metadata.savedAt.toISOString()}`];
      if (ageDays > maxAgeDays) {
        notes.push(
          `accepted stale local entry (${ageDays.toFixed(1)} days old, limit ${maxAgeDays})`,
        );
      }

      this.log.debug({ datasetId, key, ageDays }, "Local cache hit");
      return ok({ result: entry.payload, attempts: 1, notes, cacheKey: key });
    }

    return err(cacheMissError(reasons.join(" "), "local", datasetId));
  }
}
