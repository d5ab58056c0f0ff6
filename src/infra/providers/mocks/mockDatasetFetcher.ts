import { ok, type Result } from "neverthrow";
import type { DatasetError } from "../../../core/entities/appError";
import type { DatasetDescriptor } from "../../../core/entities/dataset";
import {
  multiple,
  single,
  tabular,
  type CellValue,
  type DataRow,
  type Table,
  type TableKey,
  type TierResult,
} from "../../../core/entities/table";
import type {
  DatasetFetcherPort,
  LiveFetchRequest,
} from "../../../core/ports/inboundPorts";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import { toIsoDate } from "../utils/dateUtils";

/**
 * Deterministic monthly series shaped like the dataset's tables, for offline
 * development against the live tier.
 */
export class MockDatasetFetcher implements DatasetFetcherPort {
  constructor(
    private readonly descriptor: DatasetDescriptor,
    private readonly clock: ClockPort,
    private readonly months = 12,
  ) {}

  async fetch(
    request: LiveFetchRequest,
  ): Promise<Result<TierResult, DatasetError>> {
    if (request.table) {
      return ok(single(this.buildTable(request.table)));
    }

    if (this.descriptor.tables.length === 0) {
      return ok(single(this.buildTable(null)));
    }

    const tables: Record<TableKey, Table> = {};
    for (const table of this.descriptor.tables) {
      tables[table.key] = this.buildTable(table.key);
    }
    return ok(multiple(tables));
  }

  /**
   * Columns are the dataset's required ones plus `series` and `value`; any
   * required column without a known meaning repeats the series name.
   */
  private buildTable(tableKey: TableKey | null): Table {
    const seed = tableKey ?? this.descriptor.id;
    const tableColumns =
      this.descriptor.tables.find((table) => table.key === tableKey)
        ?.requiredColumns ?? [];
    const columns = [
      ...new Set([
        "date",
        ...this.descriptor.validation.requiredColumns,
        ...tableColumns,
        "series",
        "value",
      ]),
    ];

    const now = this.clock.now();
    const offset = [...seed].reduce((sum, char) => sum + char.charCodeAt(0), 0) % 50;
    const rows: DataRow[] = Array.from({ length: this.months }, (_, index) => {
      const month = new Date(
        Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - (this.months - index), 1),
      );
      const known: Record<string, CellValue> = {
        date: toIsoDate(month),
        series: seed,
        value: offset + index * 1.5,
      };
      return Object.fromEntries(
        columns.map((column) => [column, known[column] ?? seed]),
      );
    });

    return tabular(columns, rows);
  }
}
