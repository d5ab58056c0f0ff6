import { randomUUID } from "node:crypto";
import {
  mkdir,
  readFile,
  readdir,
  rename,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import { join } from "node:path";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  cacheFormats,
  type CacheEntry,
  type CacheFormat,
  type CacheMetadata,
  type CacheMiss,
  type CacheSummary,
  type LoadOptions,
  type SaveMetadata,
} from "../../core/entities/cache";
import { statsOf, type TierResult } from "../../core/entities/table";
import type {
  ClockPort,
  LocalCachePort,
  SleepPort,
} from "../../core/ports/outboundPorts";
import { logger, type Logger } from "../../shared/logger/logger";
import { FileLock } from "./fileLock";
import {
  decodePayload,
  encodePayload,
  parsePayloadFileName,
  payloadFileName,
} from "./payloadCodec";

const DAY_MS = 24 * 60 * 60 * 1000;

const KEY_PATTERN = /^[a-z0-9_]+(\.[a-z0-9_]+)?$/;

const isoDate = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

const sidecarSchema = z.object({
  key: z.string(),
  savedAt: isoDate,
  format: z.enum(["json.gz", "json"]),
  sizeBytes: z.number().int().nonnegative(),
  rowCount: z.number().int().nonnegative(),
  colCount: z.number().int().nonnegative(),
  tableCount: z.number().int().nonnegative(),
  source: z.enum(["local", "remote", "live"]),
  remoteUpdatedAt: isoDate.optional(),
  remoteDigest: z.string().optional(),
});

export type LocalCacheStoreOptions = {
  rootDir: string;
  lockTimeoutMs: number;
  defaultFormat?: CacheFormat;
};

const assertKey = (key: string): void => {
  if (!KEY_PATTERN.test(key)) {
    throw new Error(`Invalid cache key '${key}'.`);
  }
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Persisted cache directory: one payload file and one `.meta.json` sidecar per key.
 * Writes go to a temp file and are renamed into place under a per-key lock.
 */
export class LocalCacheStore implements LocalCachePort {
  constructor(
    private readonly options: LocalCacheStoreOptions,
    private readonly clock: ClockPort,
    private readonly sleeper: SleepPort,
    private readonly log: Logger = logger,
  ) {}

  get rootDir(): string {
    return this.options.rootDir;
  }

  async load(
    key: string,
    options: LoadOptions,
  ): Promise<Result<CacheEntry, CacheMiss>> {
    assertKey(key);

    const located = await this.locatePayload(key);
    if (!located) {
      return err({
        key,
        reason: "absent",
        message: `No cached payload for '${key}'.`,
      });
    }

    const metadata =
      (await this.readMetadata(key)) ??
      (await this.metadataFromFile(key, located.format, located.path));

    const ageDays = this.ageInDays(metadata.savedAt);
    if (ageDays > options.maxAgeDays && !options.acceptStale) {
      return err({
        key,
        reason: "stale",
        message: `Cached '${key}' is ${ageDays.toFixed(1)} days old (limit ${options.maxAgeDays}).`,
        ageDays,
      });
    }

    let bytes: Buffer;
    try {
      bytes = await readFile(located.path);
    } catch (error) {
      if (isMissingFile(error)) {
        return err({
          key,
          reason: "absent",
          message: `Cached payload for '${key}' disappeared while loading.`,
        });
      }
      throw error;
    }

    const decoded = await decodePayload(bytes, located.format);
    if (decoded.isErr()) {
      this.log.warn(
        { key, reason: decoded.error.message },
        "Cached payload unreadable; treating as miss",
      );
      return err({
        key,
        reason: "unreadable",
        message: `Cached '${key}' is unreadable: ${decoded.error.message}`,
        ageDays,
      });
    }

    return ok({ key, payload: decoded.value, metadata });
  }

  async readMetadata(key: string): Promise<CacheMetadata | null> {
    assertKey(key);

    let raw: string;
    try {
      raw = await readFile(this.sidecarPath(key), "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.log.warn({ key, error }, "Cache sidecar is not valid JSON");
      return null;
    }

    const sidecar = sidecarSchema.safeParse(parsed);
    if (!sidecar.success || sidecar.data.key !== key) {
      this.log.warn({ key }, "Cache sidecar does not match the expected layout");
      return null;
    }

    return sidecar.data;
  }

  async save(
    key: string,
    payload: TierResult,
    meta: SaveMetadata,
  ): Promise<CacheMetadata> {
    assertKey(key);

    const format = meta.format ?? this.options.defaultFormat ?? "json.gz";
    const bytes = await encodePayload(payload, format);
    const stats = statsOf(payload);
    const metadata: CacheMetadata = {
      key,
      savedAt: this.clock.now(),
      format,
      sizeBytes: bytes.length,
      rowCount: stats.rowCount,
      colCount: stats.colCount,
      tableCount: stats.tableCount,
      source: meta.source,
      remoteUpdatedAt: meta.remoteUpdatedAt,
      remoteDigest: meta.remoteDigest,
    };

    await mkdir(this.rootDir, { recursive: true });

    await this.lockFor(key).withLock(async () => {
      await this.writeAtomic(this.payloadPath(key, format), bytes);

      for (const other of cacheFormats) {
        if (other !== format) {
          await rm(this.payloadPath(key, other), { force: true });
        }
      }

      await this.writeAtomic(
        this.sidecarPath(key),
        Buffer.from(JSON.stringify(metadata, null, 2), "utf8"),
      );
    });

    this.log.debug(
      { key, format, sizeBytes: metadata.sizeBytes, rowCount: stats.rowCount },
      "Saved dataset to local cache",
    );

    return metadata;
  }

  async list(): Promise<CacheSummary[]> {
    const files = await this.readDirectory();
    const summaries: CacheSummary[] = [];

    for (const fileName of files) {
      const parsed = parsePayloadFileName(fileName);
      if (!parsed || !KEY_PATTERN.test(parsed.key)) {
        continue;
      }

      const metadata =
        (await this.readMetadata(parsed.key)) ??
        (await this.metadataFromFile(
          parsed.key,
          parsed.format,
          join(this.rootDir, fileName),
        ));

      summaries.push({ ...metadata, ageDays: this.ageInDays(metadata.savedAt) });
    }

    return summaries.sort(
      (left, right) => right.savedAt.getTime() - left.savedAt.getTime(),
    );
  }

  /**
   * Removes one key (payload and sidecar), or every key when none is given.
   * Returns the number of entries removed.
   */
  async clear(key?: string): Promise<number> {
    if (key !== undefined) {
      assertKey(key);
      return (await this.removeEntry(key)) ? 1 : 0;
    }

    const keys = new Set<string>();
    for (const fileName of await this.readDirectory()) {
      const parsed = parsePayloadFileName(fileName);
      if (parsed && KEY_PATTERN.test(parsed.key)) {
        keys.add(parsed.key);
      }
    }

    let removed = 0;
    for (const entryKey of keys) {
      if (await this.removeEntry(entryKey)) {
        removed += 1;
      }
    }

    return removed;
  }

  private async removeEntry(key: string): Promise<boolean> {
    const located = await this.locatePayload(key);
    if (!located) {
      return false;
    }

    await this.lockFor(key).withLock(async () => {
      for (const format of cacheFormats) {
        await rm(this.payloadPath(key, format), { force: true });
      }
      await rm(this.sidecarPath(key), { force: true });
    });

    return true;
  }

  private async locatePayload(
    key: string,
  ): Promise<{ path: string; format: CacheFormat } | null> {
    for (const format of cacheFormats) {
      const path = this.payloadPath(key, format);
      try {
        const info = await stat(path);
        if (info.isFile()) {
          return { path, format };
        }
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
      }
    }

    return null;
  }

  /**
   * Metadata for a payload with no usable sidecar: mtime stands in for savedAt.
   */
  private async metadataFromFile(
    key: string,
    format: CacheFormat,
    path: string,
  ): Promise<CacheMetadata> {
    const info = await stat(path);
    return {
      key,
      savedAt: info.mtime,
      format,
      sizeBytes: info.size,
      rowCount: 0,
      colCount: 0,
      tableCount: 0,
      source: "local",
    };
  }

  private async writeAtomic(target: string, bytes: Buffer): Promise<void> {
    const temp = `${target}.tmp-${process.pid}-${randomUUID()}`;
    try {
      await writeFile(temp, bytes);
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }

  private async readDirectory(): Promise<string[]> {
    try {
      return (await readdir(this.rootDir)).sort();
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }

  private lockFor(key: string): FileLock {
    return new FileLock(
      join(this.rootDir, key),
      { timeoutMs: this.options.lockTimeoutMs },
      this.sleeper,
      this.clock,
    );
  }

  private ageInDays(savedAt: Date): number {
    return Math.max(0, (this.clock.now().getTime() - savedAt.getTime()) / DAY_MS);
  }

  private payloadPath(key: string, format: CacheFormat): string {
    return join(this.rootDir, payloadFileName(key, format));
  }

  private sidecarPath(key: string): string {
    return join(this.rootDir, `${key}.meta.json`);
  }
}
