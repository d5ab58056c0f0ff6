import { describe, expect, it } from "vitest";
import {
  multiple,
  single,
  tabular,
  type TierResult,
} from "../../core/entities/table";
import { applyDateRange, applyTableFilter } from "./tableFilter";

const sbpe = tabular(
  ["date", "deposits"],
  [
    { date: "2024-01-01", deposits: 10 },
    { date: "2024-02-01", deposits: 12 },
    { date: "2024-03-01", deposits: 9 },
  ],
);
const units = tabular(["date", "units"], [{ date: "2024-01-01", units: 400 }]);
const notes = { kind: "record" as const, value: { note: "monthly" } };

describe("applyTableFilter", () => {
  it("passes results through when no table is requested", () => {
    const result = multiple({ sbpe, units });

    expect(applyTableFilter(result)).toBe(result);
    expect(applyTableFilter(result, null)).toBe(result);
  });

  it("always yields a single table when a key is supplied", () => {
    const filtered = applyTableFilter(multiple({ sbpe, units }), "units");

    expect(filtered).toEqual({ shape: "single", table: units });
  });

  it("treats a table-scoped single result as the requested table", () => {
    const result = single(sbpe);

    expect(applyTableFilter(result, "sbpe", true)).toBe(result);
  });

  it("refuses to relabel a whole-dataset single result", () => {
    expect(applyTableFilter(single(sbpe), "units")).toBeUndefined();
    expect(applyTableFilter(single(sbpe), "sbpe", false)).toBeUndefined();
  });

  it("reports a multiple result without the requested table", () => {
    expect(applyTableFilter(multiple({ sbpe }), "cgi")).toBeUndefined();
  });
});

describe("applyDateRange", () => {
  const rowsOf = (result: TierResult, key?: string) => {
    const table = result.shape === "single" ? result.table : result.tables[key ?? ""];
    return table?.kind === "tabular" ? table.rows : [];
  };

  it("keeps rows within an inclusive range", () => {
    const narrowed = applyDateRange(single(sbpe), "date", {
      start: "2024-02-01",
      end: "2024-03-01",
    });

    expect(rowsOf(narrowed).map((row) => row.date)).toEqual([
      "2024-02-01",
      "2024-03-01",
    ]);
  });

  it("supports open-ended ranges", () => {
    const narrowed = applyDateRange(single(sbpe), "date", { end: "2024-01-31" });

    expect(rowsOf(narrowed)).toEqual([{ date: "2024-01-01", deposits: 10 }]);
  });

  it("narrows every tabular table and leaves the rest alone", () => {
    const narrowed = applyDateRange(
      multiple({ sbpe, units, notes }),
      "date",
      { start: "2024-03-01" },
    );

    expect(rowsOf(narrowed, "sbpe")).toHaveLength(1);
    expect(rowsOf(narrowed, "units")).toHaveLength(0);
    expect(narrowed.shape === "multiple" && narrowed.tables.notes).toEqual(notes);
  });

  it("does not mutate the input rows", () => {
    applyDateRange(single(sbpe), "date", { start: "2025-01-01" });

    expect(sbpe.rows).toHaveLength(3);
  });

  it("skips tables without the date column", () => {
    const narrowed = applyDateRange(single(units), "period", { start: "2030-01-01" });

    expect(rowsOf(narrowed)).toEqual(units.rows);
  });
});
