import { err, ok, type Result } from "neverthrow";
import {
  cacheMissError,
  liveFetchError,
  structuralValidationError,
  type DatasetError,
} from "../../core/entities/appError";
import {
  cacheKeyFor,
  type DatasetFilter,
  type DatasetSummary,
  type NormalizedRequest,
  type ResolveOptions,
  type TierName,
} from "../../core/entities/dataset";
import type { ResolvedDataset } from "../../core/entities/provenance";
import type { RetryTiming } from "../../core/entities/retry";
import type { TierResult } from "../../core/entities/table";
import type { DatasetResolverPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  DatasetTierPort,
  LocalCachePort,
  TierFetch,
  TierRequest,
} from "../../core/ports/outboundPorts";
import { logger, type Logger } from "../../shared/logger/logger";
import type { DatasetRegistry } from "./datasetRegistry";
import type { DatasetValidator } from "./datasetValidator";
import { annotate } from "./provenanceAttacher";
import { applyDateRange, applyTableFilter } from "./tableFilter";

export type ResolverTiers = Readonly<Record<TierName, DatasetTierPort>>;

export type ResolutionState =
  | "not_tried"
  | "local_checked"
  | "remote_checked"
  | "live_checked"
  | "done"
  | "failed";

const TIER_ORDER: readonly TierName[] = ["local", "remote", "live"];

const checkedState: Record<TierName, ResolutionState> = {
  local: "local_checked",
  remote: "remote_checked",
  live: "live_checked",
};

/**
 * Tiers consulted for a request, in order. A pinned source runs alone;
 * auto skips the local tier when caching is off and the live tier for
 * datasets that cannot be fetched live.
 */
export const tierPlan = (request: NormalizedRequest): TierName[] => {
  if (request.source !== "auto") {
    return [request.source];
  }

  return TIER_ORDER.filter((tier) => {
    if (tier === "local") {
      return request.useCache;
    }
    if (tier === "live") {
      return request.descriptor.capabilities.liveFetchable;
    }
    return true;
  });
};

type Shaped = { fetch: TierFetch; data: TierResult; notes: string[] };

/**
 * Walks the tiers for one request, then filters, validates, writes through to
 * the local cache and attaches provenance.
 */
export class DatasetResolverService implements DatasetResolverPort {
  constructor(
    private readonly registry: DatasetRegistry,
    private readonly tiers: ResolverTiers,
    private readonly cache: LocalCachePort,
    private readonly validator: DatasetValidator,
    private readonly clock: ClockPort,
    private readonly retryDelays: Omit<RetryTiming, "maxAttempts">,
    private readonly log: Logger = logger,
  ) {}

  listDatasets(
    includeHidden = false,
    filter: DatasetFilter = {},
  ): Iterable<DatasetSummary> {
    return this.registry.list(includeHidden, filter);
  }

  async resolve(
    id: string,
    options: ResolveOptions = {},
  ): Promise<Result<ResolvedDataset, DatasetError>> {
    const validated = this.registry.validate(id, options);
    if (validated.isErr()) {
      return err(validated.error);
    }

    const request = validated.value;
    const datasetId = request.descriptor.id;
    const log = request.quiet
      ? this.log.child({ datasetId }, { level: "warn" })
      : this.log.child({ datasetId });
    const tierRequest: TierRequest = {
      descriptor: request.descriptor,
      table: request.table,
      retry: { ...this.retryDelays, maxAttempts: request.maxRetries },
      acceptStale: request.acceptStale,
      dateRange: request.dateRange,
      deadline: request.deadline,
    };

    const plan = tierPlan(request);
    const pinned = request.source !== "auto";
    const causes: DatasetError[] = [];
    let state: ResolutionState = "not_tried";

    log.debug(
      { requestedId: request.requestedId, table: request.table, plan },
      "Resolving dataset",
    );

    for (const tierName of plan) {
      const fetched = await this.tiers[tierName].fetch(tierRequest);
      state = checkedState[tierName];

      const shaped: Result<Shaped, DatasetError> = fetched.isOk()
        ? this.shape(fetched.value, request, tierName)
        : err(fetched.error);
      if (shaped.isErr()) {
        log.info(
          { tier: tierName, state, code: shaped.error.code, reason: shaped.error.message },
          "Tier did not satisfy request",
        );
        if (pinned) {
          return err(shaped.error);
        }
        causes.push(shaped.error);
        continue;
      }

      const { fetch } = shaped.value;
      const outcome = this.validator.check(
        shaped.value.data,
        request.descriptor,
        request.table,
        this.clock.now(),
      );
      if (outcome.status === "failure") {
        log.error({ tier: tierName, reason: outcome.reason }, "Result failed validation");
        return err({
          ...structuralValidationError(outcome.reason, datasetId, tierName),
          causes: causes.length > 0 ? causes : undefined,
        });
      }

      const notes = [
        ...causes.map((cause) => `${cause.tier ?? "unknown"} tier: ${cause.message}`),
        ...fetch.notes,
        ...shaped.value.notes,
        ...(outcome.status === "warning" ? outcome.warnings : []),
      ];
      if (outcome.status === "warning") {
        outcome.warnings.forEach((warning) =>
          log.warn({ tier: tierName }, warning),
        );
      }

      if (tierName !== "local" && request.useCache) {
        notes.push(...(await this.writeThrough(fetch, tierName, request, log)));
      }

      state = "done";
      log.info(
        { tier: tierName, state, attempts: fetch.attempts },
        "Dataset resolved",
      );
      return ok(
        annotate(
          shaped.value.data,
          tierName,
          request.table,
          fetch.attempts - 1,
          notes,
          this.clock,
        ),
      );
    }

    state = "failed";
    const last = causes[causes.length - 1];
    if (!last) {
      return err(
        cacheMissError(`No tier could be consulted for '${datasetId}'.`, "local", datasetId),
      );
    }

    log.warn({ state, tried: causes.map((cause) => cause.tier) }, "All tiers failed");
    const earlier = causes.slice(0, -1);
    return err({ ...last, causes: earlier.length > 0 ? earlier : undefined });
  }

  /**
   * Narrows a tier's result to the requested table and date range. A result
   * that lacks the requested table counts as a miss for that tier, and so
   * does a single table fetched under the whole-dataset key.
   */
  private shape(
    fetch: TierFetch,
    request: NormalizedRequest,
    tierName: TierName,
  ): Result<Shaped, DatasetError> {
    const datasetId = request.descriptor.id;
    const filtered = applyTableFilter(
      fetch.result,
      request.table,
      fetch.cacheKey === cacheKeyFor(datasetId, request.table),
    );
    if (!filtered) {
      const message = `The ${tierName} result for '${datasetId}' has no table '${request.table ?? ""}'.`;
      return err(
        tierName === "live"
          ? { ...liveFetchError(message, false, { datasetId }), attempts: fetch.attempts }
          : cacheMissError(message, tierName, datasetId),
      );
    }

    const range = request.dateRange;
    if (!range) {
      return ok({ fetch, data: filtered, notes: [] });
    }

    const dateColumn = request.descriptor.validation.dateColumn;
    if (!dateColumn) {
      return ok({
        fetch,
        data: filtered,
        notes: ["date range ignored: dataset has no date column"],
      });
    }

    return ok({
      fetch,
      data: applyDateRange(filtered, dateColumn, range),
      notes: [`rows limited to ${range.start ?? "..."} to ${range.end ?? "..."}`],
    });
  }

  /**
   * Promotes a remote or live result into the local cache, unfiltered. A live
   * result narrowed by a date range at the source is not saved.
   */
  private async writeThrough(
    fetch: TierFetch,
    tierName: TierName,
    request: NormalizedRequest,
    log: Logger,
  ): Promise<string[]> {
    if (tierName === "live" && request.dateRange) {
      return ["not cached: live request was limited to a date range"];
    }

    try {
      await this.cache.save(fetch.cacheKey, fetch.result, {
        source: tierName,
        ...fetch.origin,
      });
      log.debug({ key: fetch.cacheKey, tier: tierName }, "Result saved to local cache");
      return [`saved to local cache as '${fetch.cacheKey}'`];
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn({ key: fetch.cacheKey, error: message }, "Local cache write failed");
      return [`local cache write failed: ${message}`];
    }
  }
}
