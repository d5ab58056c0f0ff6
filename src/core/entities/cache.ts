import type { TierName } from "./dataset";
import type { TierResult } from "./table";

export type CacheFormat = "json.gz" | "json";

export const cacheFormats: readonly CacheFormat[] = ["json.gz", "json"];

/**
 * Sidecar written next to every cached payload.
 */
export type CacheMetadata = {
  key: string;
  savedAt: Date;
  format: CacheFormat;
  sizeBytes: number;
  rowCount: number;
  colCount: number;
  tableCount: number;
  source: TierName;
  remoteUpdatedAt?: Date;
  remoteDigest?: string;
};

export type CacheEntry = {
  key: string;
  payload: TierResult;
  metadata: CacheMetadata;
};

export type CacheSummary = CacheMetadata & {
  ageDays: number;
};

export type CacheMissReason = "absent" | "stale" | "unreadable";

export type CacheMiss = {
  key: string;
  reason: CacheMissReason;
  message: string;
  ageDays?: number;
};

export type SaveMetadata = {
  source: TierName;
  format?: CacheFormat;
  remoteUpdatedAt?: Date;
  remoteDigest?: string;
};

export type LoadOptions = {
  maxAgeDays: number;
  acceptStale: boolean;
};

/**
 * Asset attached to the remote release, one per cache key and format.
 */
export type RemoteAsset = {
  key: string;
  name: string;
  format: CacheFormat;
  sizeBytes: number;
  updatedAt: Date;
  downloadUrl: string;
  digest?: string;
};

export type RemoteUpdateOutcome = {
  key: string;
  status: "updated" | "up_to_date" | "failed";
  asset: string;
  message?: string;
};
