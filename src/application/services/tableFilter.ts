import type { DateRange } from "../../core/entities/dataset";
import {
  multiple,
  single,
  type Table,
  type TableKey,
  type TierResult,
} from "../../core/entities/table";

/**
 * Narrows a tier result to the requested table. Without a key the result is
 * returned as-is. With a key the output is always `single`; `undefined` means
 * the result does not carry that table.
 *
 * A `single` result only stands for the requested table when it was stored
 * under that table's own key (`scopedToTable`); a whole-dataset entry cannot
 * say which table it holds.
 */
export const applyTableFilter = (
  result: TierResult,
  tableKey?: TableKey | null,
  scopedToTable = false,
): TierResult | undefined => {
  if (!tableKey) {
    return result;
  }

  if (result.shape === "single") {
    return scopedToTable ? result : undefined;
  }

  const table = result.tables[tableKey];
  return table ? single(table) : undefined;
};

const withinRange = (value: unknown, range: DateRange): boolean => {
  if (typeof value !== "string") {
    return false;
  }

  const day = value.slice(0, 10);
  if (range.start && day < range.start) {
    return false;
  }
  return !(range.end && day > range.end);
};

const narrowTable = (
  table: Table,
  dateColumn: string,
  range: DateRange,
): Table => {
  if (table.kind !== "tabular" || !table.columns.includes(dateColumn)) {
    return table;
  }

  return {
    ...table,
    rows: table.rows.filter((row) => withinRange(row[dateColumn], range)),
  };
};

/**
 * Keeps rows whose date column falls inside the inclusive range. Tables
 * without that column, and record tables, pass through untouched.
 */
export const applyDateRange = (
  result: TierResult,
  dateColumn: string,
  range: DateRange,
): TierResult => {
  if (result.shape === "single") {
    return single(narrowTable(result.table, dateColumn, range));
  }

  return multiple(
    Object.fromEntries(
      Object.entries(result.tables).map(([key, table]) => [
        key,
        narrowTable(table, dateColumn, range),
      ]),
    ),
  );
};
