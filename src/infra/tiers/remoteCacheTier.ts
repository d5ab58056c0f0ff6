import { readFile, rm } from "node:fs/promises";
import { err, ok, type Result } from "neverthrow";
import {
  cacheMissError,
  networkError,
  type DatasetError,
} from "../../core/entities/appError";
import {
  cacheFormats,
  type CacheMetadata,
  type RemoteAsset,
  type RemoteUpdateOutcome,
} from "../../core/entities/cache";
import {
  candidateCacheKeys,
  type DatasetDescriptor,
} from "../../core/entities/dataset";
import type { RetryTiming } from "../../core/entities/retry";
import { isEmptyResult, type TierResult } from "../../core/entities/table";
import type {
  ClockPort,
  DatasetTierPort,
  LocalCachePort,
  RemoteCachePort,
  RemoteStorePort,
  SleepPort,
  TierFetch,
  TierRequest,
} from "../../core/ports/outboundPorts";
import { logger, type Logger } from "../../shared/logger/logger";
import { retryWithBackoff } from "../../shared/retry/retryWithBackoff";
import { decodePayload } from "../cache/payloadCodec";

/**
 * Picks the asset for `key`, preferring compressed payloads.
 */
export const pickAsset = (
  assets: readonly RemoteAsset[],
  key: string,
): RemoteAsset | undefined => {
  for (const format of cacheFormats) {
    const match = assets.find(
      (asset) => asset.key === key && asset.format === format,
    );
    if (match) {
      return match;
    }
  }
  return undefined;
};

/**
 * Every cache key on the release that belongs to the dataset: its own entry
 * and table-scoped `id.table` entries, each in its preferred format.
 */
export const assetsForDataset = (
  assets: readonly RemoteAsset[],
  datasetId: string,
): RemoteAsset[] => {
  const keys = new Set(
    assets
      .map((asset) => asset.key)
      .filter((key) => key === datasetId || key.startsWith(`${datasetId}.`)),
  );

  return [...keys]
    .sort()
    .map((key) => pickAsset(assets, key))
    .filter((asset): asset is RemoteAsset => asset !== undefined);
};

/**
 * Digests decide when both sides have one; otherwise the local copy is
 * current when it was taken from (or saved after) the remote's last update.
 */
export const isUpToDate = (
  local: CacheMetadata | null,
  remote: RemoteAsset,
): boolean => {
  if (!local) {
    return false;
  }

  if (local.remoteDigest && remote.digest) {
    return local.remoteDigest === remote.digest;
  }

  const localStamp = local.remoteUpdatedAt ?? local.savedAt;
  return localStamp.getTime() >= remote.updatedAt.getTime();
};

/**
 * Second tier: versioned assets on the remote release.
 */
export class RemoteCacheTier implements DatasetTierPort, RemoteCachePort {
  readonly name = "remote" as const;

  constructor(
    private readonly store: RemoteStorePort,
    private readonly cache: LocalCachePort,
    private readonly sleeper: SleepPort,
    private readonly clock: ClockPort,
    private readonly log: Logger = logger,
  ) {}

  async fetch(request: TierRequest): Promise<Result<TierFetch, DatasetError>> {
    const datasetId = request.descriptor.id;

    const listed = await this.listWithAttempts(request.retry, request.deadline);
    if (listed.isErr()) {
      return err({ ...listed.error, datasetId });
    }

    const keys = candidateCacheKeys(datasetId, request.table);
    const asset = keys
      .map((key) => pickAsset(listed.value.assets, key))
      .find((candidate): candidate is RemoteAsset => candidate !== undefined);

    if (!asset) {
      return err(
        cacheMissError(
          `No remote asset for ${keys.map((key) => `'${key}'`).join(" or ")}.`,
          "remote",
          datasetId,
        ),
      );
    }

    const downloaded = await this.downloadAndDecode(
      asset,
      request.retry,
      request.deadline,
    );
    if (downloaded.isErr()) {
      return err({ ...downloaded.error, datasetId });
    }

    if (isEmptyResult(downloaded.value.result)) {
      return err(
        cacheMissError(`Remote asset '${asset.name}' holds no rows.`, "remote", datasetId),
      );
    }

    return ok({
      result: downloaded.value.result,
      // One attempt plus the retries of both the listing and the download.
      attempts: listed.value.attempts + downloaded.value.attempts - 1,
      notes: [
        `remote asset '${asset.name}' updated ${asset.updatedAt.toISOString()}`,
      ],
      cacheKey: asset.key,
      origin: { remoteUpdatedAt: asset.updatedAt, remoteDigest: asset.digest },
    });
  }

  /**
   * Copies the dataset's remote assets into the local cache. Keys whose local
   * copy is already current are skipped unless `force` is set.
   */
  async updateFromRemote(
    descriptor: DatasetDescriptor,
    options: { retry: RetryTiming; force?: boolean; deadline?: Date },
  ): Promise<Result<RemoteUpdateOutcome[], DatasetError>> {
    const listed = await this.listAssets(options.retry, options.deadline);
    if (listed.isErr()) {
      return err({ ...listed.error, datasetId: descriptor.id });
    }

    const assets = assetsForDataset(listed.value, descriptor.id);
    if (assets.length === 0) {
      return err(
        cacheMissError(
          `No remote asset for '${descriptor.id}'.`,
          "remote",
          descriptor.id,
        ),
      );
    }

    const outcomes: RemoteUpdateOutcome[] = [];
    for (const asset of assets) {
      const local = await this.cache.readMetadata(asset.key);
      if (!options.force && isUpToDate(local, asset)) {
        outcomes.push({ key: asset.key, status: "up_to_date", asset: asset.name });
        continue;
      }

      const downloaded = await this.downloadAndDecode(
        asset,
        options.retry,
        options.deadline,
      );
      if (downloaded.isErr()) {
        this.log.warn(
          { key: asset.key, error: downloaded.error.message },
          "Remote update failed for cache key",
        );
        outcomes.push({
          key: asset.key,
          status: "failed",
          asset: asset.name,
          message: downloaded.error.message,
        });
        continue;
      }

      try {
        await this.cache.save(asset.key, downloaded.value.result, {
          source: "remote",
          format: asset.format,
          remoteUpdatedAt: asset.updatedAt,
          remoteDigest: asset.digest,
        });
      } catch (error) {
        const message = `Local cache write failed: ${
          error instanceof Error ? error.message : String(error)
        }`;
        this.log.warn({ key: asset.key, error: message }, "Remote update failed for cache key");
        outcomes.push({ key: asset.key, status: "failed", asset: asset.name, message });
        continue;
      }
      outcomes.push({ key: asset.key, status: "updated", asset: asset.name });
    }

    return ok(outcomes);
  }

  async listAssets(
    retry: RetryTiming,
    deadline?: Date,
  ): Promise<Result<RemoteAsset[], DatasetError>> {
    const listed = await this.listWithAttempts(retry, deadline);
    return listed.map(({ assets }) => assets);
  }

  private async listWithAttempts(
    retry: RetryTiming,
    deadline?: Date,
  ): Promise<Result<{ assets: RemoteAsset[]; attempts: number }, DatasetError>> {
    const listed = await retryWithBackoff(
      () => this.store.listAssets(undefined, deadline),
      { ...retry, isRetryable: (error: DatasetError) => error.retryable },
      { sleeper: this.sleeper, clock: this.clock, deadline },
    );

    if (listed.isErr()) {
      return err({ ...listed.error.error, attempts: listed.error.attempts });
    }

    return ok({ assets: listed.value.value, attempts: listed.value.attempts });
  }

  private async downloadAndDecode(
    asset: RemoteAsset,
    retry: RetryTiming,
    deadline?: Date,
  ): Promise<Result<{ result: TierResult; attempts: number }, DatasetError>> {
    const downloaded = await this.store.download(asset, retry, deadline);
    if (downloaded.isErr()) {
      return err(downloaded.error);
    }

    const { path, dir, attempts } = downloaded.value;
    try {
      const decoded = await decodePayload(await readFile(path), asset.format);
      if (decoded.isErr()) {
        return err(
          networkError(
            `Remote asset '${asset.name}' is unreadable: ${decoded.error.message}`,
            false,
            { cause: decoded.error.cause },
          ),
        );
      }

      return ok({ result: decoded.value, attempts });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}
