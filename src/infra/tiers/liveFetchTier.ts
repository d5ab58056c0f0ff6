import { err, ok, type Result } from "neverthrow";
import {
  liveFetchError,
  type DatasetError,
} from "../../core/entities/appError";
import { cacheKeyFor } from "../../core/entities/dataset";
import { isEmptyResult, type TierResult } from "../../core/entities/table";
import type {
  DatasetFetcherPort,
  LiveFetchRequest,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  DatasetTierPort,
  SleepPort,
  TierFetch,
  TierRequest,
} from "../../core/ports/outboundPorts";
import { logger, type Logger } from "../../shared/logger/logger";
import { retryWithBackoff } from "../../shared/retry/retryWithBackoff";

/**
 * Last tier: dispatches to the dataset's own collaborator, with retries.
 */
export class LiveFetchTier implements DatasetTierPort {
  readonly name = "live" as const;

  constructor(
    private readonly fetchers: ReadonlyMap<string, DatasetFetcherPort>,
    private readonly sleeper: SleepPort,
    private readonly clock: ClockPort,
    private readonly log: Logger = logger,
  ) {}

  async fetch(request: TierRequest): Promise<Result<TierFetch, DatasetError>> {
    const datasetId = request.descriptor.id;
    const fetcher = this.fetchers.get(datasetId);
    if (!fetcher) {
      return err(
        liveFetchError(`No live fetcher is registered for '${datasetId}'.`, false, {
          datasetId,
        }),
      );
    }

    const liveRequest: LiveFetchRequest = {
      datasetId,
      table: request.table,
      dateRange: request.dateRange,
      deadline: request.deadline,
    };

    const outcome = await retryWithBackoff(
      (attempt) => this.attempt(fetcher, liveRequest, attempt),
      { ...request.retry, isRetryable: (error: DatasetError) => error.retryable },
      {
        sleeper: this.sleeper,
        clock: this.clock,
        deadline: request.deadline,
        onRetry: ({ attempt, delayMs }) =>
          this.log.warn(
            { datasetId, attempt, delayMs },
            "Live fetch failed; retrying",
          ),
      },
    );

    if (outcome.isErr()) {
      return err({
        ...outcome.error.error,
        tier: "live",
        datasetId,
        attempts: outcome.error.attempts,
      });
    }

    const { value: result, attempts } = outcome.value;
    if (isEmptyResult(result)) {
      return err({
        ...liveFetchError(`Live fetch for '${datasetId}' returned no rows.`, false, {
          datasetId,
        }),
        attempts,
      });
    }

    const notes =
      attempts > 1 ? [`live fetch succeeded after ${attempts} attempts`] : [];
    const cacheKey =
      result.shape === "single" &&
      request.table &&
      request.descriptor.tables.length > 0
        ? cacheKeyFor(datasetId, request.table)
        : datasetId;

    return ok({ result, attempts, notes, cacheKey });
  }

  /**
   * A collaborator that throws is treated as a fatal failure of the attempt.
   */
  private async attempt(
    fetcher: DatasetFetcherPort,
    request: LiveFetchRequest,
    attempt: number,
  ): Promise<Result<TierResult, DatasetError>> {
    this.log.debug({ datasetId: request.datasetId, attempt }, "Live fetch attempt");
    try {
      return await fetcher.fetch(request);
    } catch (error) {
      return err(
        liveFetchError(
          `Live fetcher for '${request.datasetId}' threw: ${
            error instanceof Error ? error.message : String(error)
          }`,
          false,
          { datasetId: request.datasetId, cause: error },
        ),
      );
    }
  }
}
