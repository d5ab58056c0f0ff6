import type { Result } from "neverthrow";
import type { DatasetError } from "../entities/appError";
import type {
  CacheEntry,
  CacheMetadata,
  CacheMiss,
  CacheSummary,
  LoadOptions,
  RemoteAsset,
  RemoteUpdateOutcome,
  SaveMetadata,
} from "../entities/cache";
import type {
  DatasetDescriptor,
  DateRange,
  TierName,
} from "../entities/dataset";
import type { RetryTiming } from "../entities/retry";
import type { TableKey, TierResult } from "../entities/table";

export interface ClockPort {
  now(): Date;
}

export interface SleepPort {
  sleep(ms: number): Promise<void>;
}

export interface LocalCachePort {
  load(
    key: string,
    options: LoadOptions,
  ): Promise<Result<CacheEntry, CacheMiss>>;
  readMetadata(key: string): Promise<CacheMetadata | null>;
  save(
    key: string,
    payload: TierResult,
    meta: SaveMetadata,
  ): Promise<CacheMetadata>;
  list(): Promise<CacheSummary[]>;
  clear(key?: string): Promise<number>;
}

export interface RemoteStorePort {
  listAssets(
    tag?: string,
    deadline?: Date,
  ): Promise<Result<RemoteAsset[], DatasetError>>;
  download(
    asset: RemoteAsset,
    retry: RetryTiming,
    deadline?: Date,
  ): Promise<Result<DownloadedAsset, DatasetError>>;
}

/**
 * Verified copy of a remote asset in a private temp directory. The caller
 * removes `dir` once the payload has been read.
 */
export type DownloadedAsset = {
  path: string;
  dir: string;
  attempts: number;
};

export type TierRequest = {
  descriptor: DatasetDescriptor;
  table: TableKey | null;
  retry: RetryTiming;
  acceptStale: boolean;
  dateRange: DateRange | null;
  deadline?: Date;
};

export type TierFetch = {
  result: TierResult;
  attempts: number;
  notes: string[];
  cacheKey: string;
  origin?: Pick<SaveMetadata, "remoteUpdatedAt" | "remoteDigest">;
};

/**
 * One backend the resolver can consult. A miss is reported as a `cache_miss`
 * error so that every tier speaks the same failure vocabulary.
 */
export interface DatasetTierPort {
  readonly name: TierName;
  fetch(request: TierRequest): Promise<Result<TierFetch, DatasetError>>;
}

/**
 * Maintenance view of the remote tier: listing with retries, and copying a
 * dataset's assets into the local cache.
 */
export interface RemoteCachePort {
  listAssets(
    retry: RetryTiming,
    deadline?: Date,
  ): Promise<Result<RemoteAsset[], DatasetError>>;
  updateFromRemote(
    descriptor: DatasetDescriptor,
    options: { retry: RetryTiming; force?: boolean; deadline?: Date },
  ): Promise<Result<RemoteUpdateOutcome[], DatasetError>>;
}
