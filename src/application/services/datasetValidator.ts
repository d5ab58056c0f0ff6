import type {
  DatasetDescriptor,
  ValidationRules,
} from "../../core/entities/dataset";
import type {
  Table,
  TableKey,
  TierResult,
} from "../../core/entities/table";

export type ValidationOutcome =
  | { status: "ok" }
  | { status: "warning"; warnings: string[] }
  | { status: "failure"; reason: string };

const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})/;

const parseDay = (value: unknown): Date | null => {
  if (typeof value !== "string") {
    return null;
  }

  const match = ISO_DAY.exec(value);
  if (!match) {
    return null;
  }

  const parsed = new Date(`${match[1]}-${match[2]}-${match[3]}T00:00:00.000Z`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};

/**
 * Rules for one table: the dataset-wide rules plus the table's own columns.
 */
export const rulesFor = (
  descriptor: DatasetDescriptor,
  tableKey: TableKey | null,
  maxFutureDays: number,
): ValidationRules => {
  const tableColumns =
    descriptor.tables.find((table) => table.key === tableKey)?.requiredColumns ??
    [];

  return {
    ...descriptor.validation,
    requiredColumns: [
      ...new Set([...descriptor.validation.requiredColumns, ...tableColumns]),
    ],
    maxFutureDays,
  };
};

type TableCheck = { failure?: string; warnings: string[] };

const checkTable = (
  label: string,
  table: Table,
  rules: ValidationRules,
  now: Date,
): TableCheck => {
  if (table.kind === "record") {
    return Object.keys(table.value).length === 0
      ? { failure: `Record '${label}' is empty.`, warnings: [] }
      : { warnings: [] };
  }

  if (table.rows.length === 0) {
    return { failure: `Table '${label}' has no rows.`, warnings: [] };
  }

  const missing = rules.requiredColumns.filter(
    (column) => !table.columns.includes(column),
  );
  if (missing.length > 0) {
    return {
      failure: `Table '${label}' is missing required columns: ${missing.join(", ")}.`,
      warnings: [],
    };
  }

  const warnings: string[] = [];
  const dateColumn = rules.dateColumn;
  if (dateColumn && table.columns.includes(dateColumn)) {
    const unparseable: unknown[] = [];
    let futureCount = 0;
    let latestMs = Number.NEGATIVE_INFINITY;
    const limit = new Date(now.getTime() + rules.maxFutureDays * DAY_MS);

    for (const row of table.rows) {
      const raw = row[dateColumn];
      if (raw === null || raw === undefined) {
        continue;
      }
      const day = parseDay(raw);
      if (!day) {
        unparseable.push(raw);
        continue;
      }
      if (day.getTime() > limit.getTime()) {
        futureCount += 1;
        latestMs = Math.max(latestMs, day.getTime());
      }
    }

    if (unparseable.length > 0) {
      return {
        failure: `Table '${label}' has ${unparseable.length} unparseable value(s) in '${dateColumn}' (first: ${JSON.stringify(unparseable[0])}).`,
        warnings: [],
      };
    }
    if (futureCount > 0) {
      warnings.push(
        `Table '${label}' has ${futureCount} row(s) dated more than ${rules.maxFutureDays} days ahead (latest ${new Date(latestMs).toISOString().slice(0, 10)}).`,
      );
    }
  }

  if (table.rows.length < rules.minRows) {
    warnings.push(
      `Table '${label}' has ${table.rows.length} row(s); at least ${rules.minRows} expected.`,
    );
  }

  return { warnings };
};

/**
 * Structural checks run on every result before it reaches the caller.
 * Failures abort resolution; warnings travel in the provenance notes.
 */
export class DatasetValidator {
  constructor(private readonly maxFutureDays: number) {}

  check(
    result: TierResult,
    descriptor: DatasetDescriptor,
    tableKey: TableKey | null,
    now: Date,
  ): ValidationOutcome {
    const targets: [string, Table, TableKey | null][] =
      result.shape === "single"
        ? [[tableKey ?? descriptor.id, result.table, tableKey]]
        : Object.entries(result.tables).map(([key, table]) => [key, table, key]);

    if (targets.length === 0) {
      return {
        status: "failure",
        reason: `Result for '${descriptor.id}' holds no tables.`,
      };
    }

    const warnings: string[] = [];
    for (const [label, table, key] of targets) {
      const outcome = checkTable(
        label,
        table,
        rulesFor(descriptor, key, this.maxFutureDays),
        now,
      );
      if (outcome.failure) {
        return { status: "failure", reason: outcome.failure };
      }
      warnings.push(...outcome.warnings);
    }

    return warnings.length > 0 ? { status: "warning", warnings } : { status: "ok" };
  }
}
