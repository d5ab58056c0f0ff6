import { describe, expect, it } from "vitest";
import { descriptorFixture } from "../__tests__/fixtures";
import { networkError } from "../core/entities/appError";
import { multiple, single, tabular } from "../core/entities/table";
import {
  formatCacheStatus,
  formatDatasetInfo,
  formatDatasetList,
  formatRemoteAssets,
  formatResolvedReport,
  formatUpdateReports,
} from "./reports";

const fetchedAt = new Date("2025-03-01T00:00:00.000Z");

describe("formatResolvedReport", () => {
  it("previews a single table with provenance", () => {
    const report = formatResolvedReport(
      "bcb_series",
      {
        data: single(
          tabular(
            ["date", "value"],
            [
              { date: "2024-01-01", value: 1.5 },
              { date: "2024-02-01", value: null },
              { date: "2024-03-01", value: 2 },
            ],
          ),
        ),
        provenance: {
          source: "live",
          fetchedAt,
          table: "price",
          retries: 2,
          notes: ["live fetch succeeded after 3 attempts"],
        },
      },
      2,
    );

    expect(report).toBe(
      [
        "Dataset: bcb_series (table price)",
        "Source: live",
        "Fetched: 2025-03-01T00:00:00.000Z",
        "Retries: 2",
        "Notes:",
        "- live fetch succeeded after 3 attempts",
        "",
        "price: 3 row(s) x 2 column(s)",
        "  date | value",
        "  2024-01-01 | 1.5",
        "  2024-02-01 | ",
        "  ... 1 more row(s)",
      ].join("\n"),
    );
  });

  it("lists every table of a multiple result", () => {
    const report = formatResolvedReport("abecip", {
      data: multiple({
        sbpe: tabular(["date"], []),
        notes: { kind: "record", value: { source: "ABECIP" } },
      }),
      provenance: { source: "local", fetchedAt, table: null, retries: 0, notes: [] },
    });

    expect(report.split("\n").slice(4)).toEqual([
      "",
      "sbpe: 0 row(s) x 1 column(s)",
      "  date",
      "notes: record with 1 field(s)",
    ]);
  });
});

describe("catalog reports", () => {
  it("renders the dataset list", () => {
    expect(
      formatDatasetList([
        { id: "abecip", displayName: "ABECIP", tables: ["sbpe", "cgi"], visibility: "public" },
        { id: "itbi_bhe", displayName: "ITBI", tables: [], visibility: "hidden" },
      ]),
    ).toBe("abecip: ABECIP [sbpe, cgi]\nitbi_bhe (hidden): ITBI");
    expect(formatDatasetList([])).toBe("No datasets.");
  });

  it("renders dataset details", () => {
    expect(formatDatasetInfo(descriptorFixture({ coverage: "1982-present" }))).toBe(
      [
        "abecip: ABECIP housing credit",
        "Housing credit indicators",
        "Source: ABECIP",
        "Geography: Brazil",
        "Frequency: monthly",
        "Coverage: 1982-present",
        "Live fetch: no (cache tiers only)",
        "Aliases: abecip_indicators",
        "Tables:",
        "- sbpe: SBPE flows",
        "- units: Financed units",
        "- cgi: Home equity",
      ].join("\n"),
    );
  });
});

describe("maintenance reports", () => {
  it("renders cache status with open-ended thresholds", () => {
    expect(
      formatCacheStatus([
        {
          datasetId: "nre_ire",
          state: "missing",
          maxAgeDays: Number.POSITIVE_INFINITY,
          entries: [],
        },
        {
          datasetId: "b3_stocks",
          state: "stale",
          maxAgeDays: 5,
          entries: [
            {
              key: "b3_stocks",
              savedAt: fetchedAt,
              format: "json.gz",
              sizeBytes: 2048,
              rowCount: 20,
              colCount: 3,
              tableCount: 1,
              source: "remote",
              ageDays: 6,
              stale: true,
            },
          ],
        },
      ]),
    ).toBe(
      "nre_ire: missing (stale after never)\nb3_stocks: stale (stale after 5d) b3_stocks",
    );
  });

  it("renders update outcomes and failures", () => {
    expect(
      formatUpdateReports([
        {
          datasetId: "abecip",
          status: "ok",
          outcomes: [
            { key: "abecip", status: "up_to_date", asset: "abecip.json.gz" },
            { key: "abecip.sbpe", status: "updated", asset: "abecip.sbpe.json.gz" },
          ],
        },
        {
          datasetId: "secovi",
          status: "error",
          error: networkError("GitHub API returned HTTP 503.", true),
        },
      ]),
    ).toBe(
      [
        "abecip: up to date",
        "abecip.sbpe: updated",
        "secovi: failed (GitHub API returned HTTP 503.)",
      ].join("\n"),
    );
  });

  it("renders remote assets with sizes", () => {
    expect(
      formatRemoteAssets([
        {
          key: "abecip",
          name: "abecip.json.gz",
          format: "json.gz",
          sizeBytes: 1536,
          updatedAt: fetchedAt,
          downloadUrl: "https://downloads.example.test/abecip.json.gz",
        },
      ]),
    ).toBe("abecip.json.gz: 1.5 KiB, updated 2025-03-01T00:00:00.000Z");
    expect(formatRemoteAssets([])).toBe("Remote release has no dataset assets.");
  });
});
