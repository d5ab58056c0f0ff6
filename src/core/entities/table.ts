export type CellValue = string | number | boolean | null;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type DataRow = Readonly<Record<string, CellValue>>;

/**
 * Rectangular dataset: every row carries the same named columns.
 * Dates are stored as ISO `YYYY-MM-DD` strings.
 */
export type TabularTable = {
  kind: "tabular";
  columns: readonly string[];
  rows: readonly DataRow[];
};

/**
 * Structured payload for datasets that are not a single rectangle of rows.
 */
export type RecordTable = {
  kind: "record";
  value: Readonly<Record<string, JsonValue>>;
};

export type Table = TabularTable | RecordTable;

export type TableKey = string;

/**
 * The only two shapes a tier may hand back to the resolver.
 */
export type TierResult =
  | { shape: "single"; table: Table }
  | { shape: "multiple"; tables: Readonly<Record<TableKey, Table>> };

export type TableStats = {
  rowCount: number;
  colCount: number;
  tableCount: number;
};

export const tabular = (
  columns: readonly string[],
  rows: readonly DataRow[],
): TabularTable => ({ kind: "tabular", columns, rows });

export const single = (table: Table): TierResult => ({
  shape: "single",
  table,
});

export const multiple = (
  tables: Readonly<Record<TableKey, Table>>,
): TierResult => ({ shape: "multiple", tables });

const statsOfTable = (table: Table): TableStats => {
  if (table.kind === "record") {
    return {
      rowCount: 1,
      colCount: Object.keys(table.value).length,
      tableCount: 1,
    };
  }

  return {
    rowCount: table.rows.length,
    colCount: table.columns.length,
    tableCount: 1,
  };
};

/**
 * Row totals across every table, widest column count, and number of tables.
 */
export const statsOf = (result: TierResult): TableStats => {
  if (result.shape === "single") {
    return statsOfTable(result.table);
  }

  return Object.values(result.tables).reduce<TableStats>(
    (acc, table) => {
      const stats = statsOfTable(table);
      return {
        rowCount: acc.rowCount + stats.rowCount,
        colCount: Math.max(acc.colCount, stats.colCount),
        tableCount: acc.tableCount + 1,
      };
    },
    { rowCount: 0, colCount: 0, tableCount: 0 },
  );
};

/**
 * A result is empty when it carries no tables, or its only table has no rows.
 */
export const isEmptyResult = (result: TierResult): boolean => {
  if (result.shape === "multiple") {
    return Object.keys(result.tables).length === 0;
  }

  const table = result.table;
  if (table.kind === "record") {
    return Object.keys(table.value).length === 0;
  }

  return table.rows.length === 0;
};
