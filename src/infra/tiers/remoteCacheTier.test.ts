import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { err, ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import {
  descriptorFixture,
  fixedClock,
  recordingSleeper,
} from "../../__tests__/fixtures";
import { networkError } from "../../core/entities/appError";
import type {
  CacheMetadata,
  RemoteAsset,
  SaveMetadata,
} from "../../core/entities/cache";
import {
  multiple,
  single,
  tabular,
  type TierResult,
} from "../../core/entities/table";
import type {
  LocalCachePort,
  RemoteStorePort,
  TierRequest,
} from "../../core/ports/outboundPorts";
import { encodePayload } from "../cache/payloadCodec";
import {
  assetsForDataset,
  isUpToDate,
  pickAsset,
  RemoteCacheTier,
} from "./remoteCacheTier";

const sbpe = tabular(["date", "value"], [{ date: "2024-01-01", value: 3 }]);

const asset = (key: string, format: RemoteAsset["format"] = "json.gz"): RemoteAsset => ({
  key,
  name: `${key}.${format}`,
  format,
  sizeBytes: 10,
  updatedAt: new Date("2025-02-01T00:00:00.000Z"),
  downloadUrl: `https://downloads.example.test/${key}.${format}`,
  digest: `sha256:${key}`,
});

const metadata = (overrides: Partial<CacheMetadata> = {}): CacheMetadata => ({
  key: "abecip",
  savedAt: new Date("2025-01-01T00:00:00.000Z"),
  format: "json.gz",
  sizeBytes: 10,
  rowCount: 1,
  colCount: 2,
  tableCount: 1,
  source: "remote",
  ...overrides,
});

/**
 * Remote store serving encoded payloads from a temp directory.
 */
const storeWith = (
  assets: RemoteAsset[],
  payloads: Record<string, TierResult>,
  downloads: string[] = [],
): RemoteStorePort => ({
  listAssets: async () => ok(assets),
  download: async (target) => {
    downloads.push(target.name);
    const payload = payloads[target.key];
    if (!payload) {
      return err(networkError(`missing ${target.name}`, false));
    }
    const dir = await mkdtemp(join(tmpdir(), "remote-tier-"));
    const path = join(dir, target.name);
    await writeFile(path, await encodePayload(payload, target.format));
    return ok({ path, dir, attempts: 2 });
  },
});

const recordingCache = (
  existing: Record<string, CacheMetadata> = {},
  failingKeys: readonly string[] = [],
): LocalCachePort & {
  saves: Array<{ key: string; payload: TierResult; meta: SaveMetadata }>;
} => {
  const saves: Array<{ key: string; payload: TierResult; meta: SaveMetadata }> = [];
  return {
    saves,
    load: async (key) => err({ key, reason: "absent", message: "absent" }),
    readMetadata: async (key) => existing[key] ?? null,
    save: async (key, payload, meta) => {
      if (failingKeys.includes(key)) {
        throw new Error(`Timed out after 1000ms waiting for ${key}.json.gz.lock.`);
      }
      saves.push({ key, payload, meta });
      return metadata({ key });
    },
    list: async () => [],
    clear: async () => 0,
  };
};

const request = (overrides: Partial<TierRequest> = {}): TierRequest => ({
  descriptor: descriptorFixture(),
  table: null,
  retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
  acceptStale: false,
  dateRange: null,
  ...overrides,
});

describe("asset selection", () => {
  it("prefers compressed payloads and groups table-scoped keys", () => {
    const assets = [
      asset("abecip", "json"),
      asset("abecip"),
      asset("abecip.sbpe", "json"),
      asset("abecip_extra"),
      asset("secovi"),
    ];

    expect(pickAsset(assets, "abecip")?.name).toBe("abecip.json.gz");
    expect(assetsForDataset(assets, "abecip").map((item) => item.name)).toEqual([
      "abecip.json.gz",
      "abecip.sbpe.json",
    ]);
  });
});

describe("isUpToDate", () => {
  it("compares digests when both sides carry one", () => {
    expect(
      isUpToDate(metadata({ remoteDigest: "sha256:abecip" }), asset("abecip")),
    ).toBe(true);
    expect(
      isUpToDate(
        metadata({
          remoteDigest: "sha256:old",
          savedAt: new Date("2025-06-01T00:00:00.000Z"),
        }),
        asset("abecip"),
      ),
    ).toBe(false);
  });

  it("falls back to timestamps", () => {
    const remote = { ...asset("abecip"), digest: undefined };

    expect(isUpToDate(null, remote)).toBe(false);
    expect(isUpToDate(metadata(), remote)).toBe(false);
    expect(
      isUpToDate(
        metadata({ remoteUpdatedAt: new Date("2025-02-01T00:00:00.000Z") }),
        remote,
      ),
    ).toBe(true);
  });
});

describe("RemoteCacheTier", () => {
  it("downloads the table-scoped asset first and reports its origin", async () => {
    const downloads: string[] = [];
    const tier = new RemoteCacheTier(
      storeWith(
        [asset("abecip"), asset("abecip.sbpe")],
        { "abecip.sbpe": single(sbpe), abecip: multiple({ sbpe }) },
        downloads,
      ),
      recordingCache(),
      recordingSleeper(),
      fixedClock("2025-03-01T00:00:00.000Z"),
    );

    const fetched = await tier.fetch(request({ table: "sbpe" }));

    expect(downloads).toEqual(["abecip.sbpe.json.gz"]);
    expect(fetched._unsafeUnwrap()).toEqual({
      result: single(sbpe),
      attempts: 2,
      notes: ["remote asset 'abecip.sbpe.json.gz' updated 2025-02-01T00:00:00.000Z"],
      cacheKey: "abecip.sbpe",
      origin: {
        remoteUpdatedAt: new Date("2025-02-01T00:00:00.000Z"),
        remoteDigest: "sha256:abecip.sbpe",
      },
    });
  });

  it("reports a missing asset as a remote cache miss", async () => {
    const tier = new RemoteCacheTier(
      storeWith([asset("secovi")], {}),
      recordingCache(),
      recordingSleeper(),
      fixedClock("2025-03-01T00:00:00.000Z"),
    );

    const fetched = await tier.fetch(request({ table: "units" }));

    expect(fetched._unsafeUnwrapErr()).toMatchObject({
      code: "cache_miss",
      tier: "remote",
      datasetId: "abecip",
      message: "No remote asset for 'abecip.units' or 'abecip'.",
    });
  });

  it("retries the release listing with backoff", async () => {
    let calls = 0;
    const sleeper = recordingSleeper();
    const store: RemoteStorePort = {
      listAssets: async () => {
        calls += 1;
        return err(networkError("HTTP request failed with status 503.", true));
      },
      download: async () => err(networkError("unused", false)),
    };
    const tier = new RemoteCacheTier(
      store,
      recordingCache(),
      sleeper,
      fixedClock("2025-03-01T00:00:00.000Z"),
    );

    const fetched = await tier.fetch(
      request({ retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 15 } }),
    );

    expect(calls).toBe(3);
    expect(sleeper.delays).toEqual([10, 15]);
    expect(fetched._unsafeUnwrapErr()).toMatchObject({
      code: "network_error",
      attempts: 3,
      datasetId: "abecip",
    });
  });

  it("counts listing retries together with download retries", async () => {
    let listings = 0;
    const served = storeWith([asset("abecip")], { abecip: multiple({ sbpe }) });
    const store: RemoteStorePort = {
      listAssets: async (tag, deadline) => {
        listings += 1;
        return listings === 1
          ? err(networkError("HTTP request failed with status 502.", true))
          : served.listAssets(tag, deadline);
      },
      download: served.download,
    };
    const sleeper = recordingSleeper();
    const tier = new RemoteCacheTier(
      store,
      recordingCache(),
      sleeper,
      fixedClock("2025-03-01T00:00:00.000Z"),
    );

    const fetched = await tier.fetch(
      request({ retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100 } }),
    );

    expect(listings).toBe(2);
    expect(sleeper.delays).toEqual([10]);
    expect(fetched._unsafeUnwrap().attempts).toBe(3);
  });

  it("updates stale keys from the remote and skips current ones", async () => {
    const cache = recordingCache({
      abecip: metadata({ remoteDigest: "sha256:abecip" }),
    });
    const tier = new RemoteCacheTier(
      storeWith(
        [asset("abecip"), asset("abecip.sbpe"), asset("secovi")],
        { abecip: multiple({ sbpe }), "abecip.sbpe": single(sbpe) },
      ),
      cache,
      recordingSleeper(),
      fixedClock("2025-03-01T00:00:00.000Z"),
    );

    const updated = await tier.updateFromRemote(descriptorFixture(), {
      retry: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 },
    });

    expect(updated._unsafeUnwrap()).toEqual([
      { key: "abecip", status: "up_to_date", asset: "abecip.json.gz" },
      { key: "abecip.sbpe", status: "updated", asset: "abecip.sbpe.json.gz" },
    ]);
    expect(cache.saves).toEqual([
      {
        key: "abecip.sbpe",
        payload: single(sbpe),
        meta: {
          source: "remote",
          format: "json.gz",
          remoteUpdatedAt: new Date("2025-02-01T00:00:00.000Z"),
          remoteDigest: "sha256:abecip.sbpe",
        },
      },
    ]);
  });

  it("reports a failed cache write per key and keeps updating", async () => {
    const cache = recordingCache({}, ["abecip"]);
    const tier = new RemoteCacheTier(
      storeWith(
        [asset("abecip"), asset("abecip.sbpe"), asset("secovi")],
        {
          abecip: multiple({ sbpe }),
          "abecip.sbpe": single(sbpe),
          secovi: single(sbpe),
        },
      ),
      cache,
      recordingSleeper(),
      fixedClock("2025-03-01T00:00:00.000Z"),
    );
    const retry = { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 };

    const abecip = await tier.updateFromRemote(descriptorFixture(), { retry });
    const secovi = await tier.updateFromRemote(
      descriptorFixture({ id: "secovi", tables: [], legacyAliases: [] }),
      { retry },
    );

    expect(abecip._unsafeUnwrap()).toEqual([
      {
        key: "abecip",
        status: "failed",
        asset: "abecip.json.gz",
        message: "Local cache write failed: Timed out after 1000ms waiting for abecip.json.gz.lock.",
      },
      { key: "abecip.sbpe", status: "updated", asset: "abecip.sbpe.json.gz" },
    ]);
    expect(secovi._unsafeUnwrap()).toEqual([
      { key: "secovi", status: "updated", asset: "secovi.json.gz" },
    ]);
    expect(cache.saves.map((entry) => entry.key)).toEqual(["abecip.sbpe", "secovi"]);
  });
});
