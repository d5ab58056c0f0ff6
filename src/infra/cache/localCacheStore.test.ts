import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { multiple, single, tabular } from "../../core/entities/table";
import { LocalCacheStore } from "./localCacheStore";

const DAY_MS = 24 * 60 * 60 * 1000;

const createClock = (iso: string) => {
  let current = new Date(iso);
  return {
    now: () => current,
    advanceDays: (days: number) => {
      current = new Date(current.getTime() + days * DAY_MS);
    },
  };
};

const noSleep = { sleep: async () => undefined };

const sbpe = tabular(
  ["date", "value"],
  [
    { date: "2024-01-01", value: 10 },
    { date: "2024-02-01", value: 12 },
  ],
);

describe("LocalCacheStore", () => {
  let rootDir = "";

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), "local-cache-"));
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it("saves a payload with its sidecar and loads it back", async () => {
    const clock = createClock("2025-03-01T00:00:00.000Z");
    const store = new LocalCacheStore(
      { rootDir, lockTimeoutMs: 1_000 },
      clock,
      noSleep,
    );

    const metadata = await store.save("abecip.sbpe", single(sbpe), {
      source: "remote",
    });

    expect(metadata).toMatchObject({
      key: "abecip.sbpe",
      format: "json.gz",
      rowCount: 2,
      colCount: 2,
      tableCount: 1,
      source: "remote",
    });
    expect((await readdir(rootDir)).sort()).toEqual([
      "abecip.sbpe.json.gz",
      "abecip.sbpe.meta.json",
    ]);

    const loaded = await store.load("abecip.sbpe", {
      maxAgeDays: 30,
      acceptStale: false,
    });

    expect(loaded._unsafeUnwrap().payload).toEqual(single(sbpe));
    expect(loaded._unsafeUnwrap().metadata.savedAt).toEqual(
      new Date("2025-03-01T00:00:00.000Z"),
    );
  });

  it("reports a missing key as an absent miss", async () => {
    const store = new LocalCacheStore(
      { rootDir, lockTimeoutMs: 1_000 },
      createClock("2025-03-01T00:00:00.000Z"),
      noSleep,
    );

    const loaded = await store.load("secovi", {
      maxAgeDays: 30,
      acceptStale: false,
    });

    expect(loaded._unsafeUnwrapErr().reason).toBe("absent");
  });

  it("treats entries older than the threshold as stale unless accepted", async () => {
    const clock = createClock("2025-03-01T00:00:00.000Z");
    const store = new LocalCacheStore(
      { rootDir, lockTimeoutMs: 1_000 },
      clock,
      noSleep,
    );
    await store.save("secovi", multiple({ rent: sbpe }), { source: "live" });

    clock.advanceDays(15);

    const stale = await store.load("secovi", {
      maxAgeDays: 14,
      acceptStale: false,
    });
    expect(stale._unsafeUnwrapErr()).toMatchObject({
      key: "secovi",
      reason: "stale",
      ageDays: 15,
    });

    const accepted = await store.load("secovi", {
      maxAgeDays: 14,
      acceptStale: true,
    });
    expect(accepted._unsafeUnwrap().payload).toEqual(multiple({ rent: sbpe }));
  });

  it("reports a corrupt payload as unreadable", async () => {
    const store = new LocalCacheStore(
      { rootDir, lockTimeoutMs: 1_000 },
      createClock("2025-03-01T00:00:00.000Z"),
      noSleep,
    );
    await store.save("rppi", single(sbpe), { source: "remote", format: "json" });
    await writeFile(join(rootDir, "rppi.json"), "{not json");

    const loaded = await store.load("rppi", {
      maxAgeDays: 30,
      acceptStale: false,
    });

    expect(loaded._unsafeUnwrapErr().reason).toBe("unreadable");
  });

  it("falls back to the payload file when the sidecar is missing", async () => {
    const store = new LocalCacheStore(
      { rootDir, lockTimeoutMs: 1_000 },
      createClock("2025-03-01T00:00:00.000Z"),
      noSleep,
    );
    await store.save("b3_stocks", single(sbpe), {
      source: "remote",
      format: "json",
    });
    await rm(join(rootDir, "b3_stocks.meta.json"));

    expect(await store.readMetadata("b3_stocks")).toBeNull();

    const loaded = await store.load("b3_stocks", {
      maxAgeDays: Number.POSITIVE_INFINITY,
      acceptStale: false,
    });

    expect(loaded._unsafeUnwrap().metadata).toMatchObject({
      key: "b3_stocks",
      format: "json",
      source: "local",
    });
  });

  it("replaces a payload saved in another format", async () => {
    const store = new LocalCacheStore(
      { rootDir, lockTimeoutMs: 1_000 },
      createClock("2025-03-01T00:00:00.000Z"),
      noSleep,
    );
    await store.save("fgv_ibre", single(sbpe), { source: "live", format: "json" });
    await store.save("fgv_ibre", single(sbpe), { source: "live" });

    expect((await readdir(rootDir)).sort()).toEqual([
      "fgv_ibre.json.gz",
      "fgv_ibre.meta.json",
    ]);

    const sidecar: unknown = JSON.parse(
      await readFile(join(rootDir, "fgv_ibre.meta.json"), "utf8"),
    );
    expect(sidecar).toMatchObject({ key: "fgv_ibre", format: "json.gz" });
  });

  it("lists entries newest first and clears one or all keys", async () => {
    const clock = createClock("2025-03-01T00:00:00.000Z");
    const store = new LocalCacheStore(
      { rootDir, lockTimeoutMs: 1_000 },
      clock,
      noSleep,
    );
    await store.save("abecip", multiple({ sbpe }), { source: "remote" });
    clock.advanceDays(1);
    await store.save("secovi", single(sbpe), { source: "live" });
    clock.advanceDays(1);
    await store.save("rppi", single(sbpe), { source: "live" });

    const listed = await store.list();
    expect(listed.map((entry) => entry.key)).toEqual([
      "rppi",
      "secovi",
      "abecip",
    ]);
    expect(listed.map((entry) => entry.ageDays)).toEqual([0, 1, 2]);

    expect(await store.clear("secovi")).toBe(1);
    expect(await store.clear("secovi")).toBe(0);
    expect(await store.clear()).toBe(2);
    expect(await readdir(rootDir)).toEqual([]);
  });

  it("rejects keys that could escape the cache directory", async () => {
    const store = new LocalCacheStore(
      { rootDir, lockTimeoutMs: 1_000 },
      createClock("2025-03-01T00:00:00.000Z"),
      noSleep,
    );

    await expect(
      store.save("../outside", single(sbpe), { source: "live" }),
    ).rejects.toThrow("Invalid cache key '../outside'.");
  });
});
