import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  notFoundError,
  validationError,
  type DatasetError,
} from "../../core/entities/appError";
import {
  tableKeys,
  type DatasetDescriptor,
  type DatasetFilter,
  type DatasetSummary,
  type NormalizedRequest,
  type ResolveOptions,
} from "../../core/entities/dataset";

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .refine(
    (value) => {
      const parsed = new Date(`${value}T00:00:00.000Z`);
      return (
        !Number.isNaN(parsed.getTime()) &&
        parsed.toISOString().slice(0, 10) === value
      );
    },
    { message: "not a calendar date" },
  );

const resolveOptionsSchema = z
  .object({
    table: z.string().min(1).optional(),
    source: z.enum(["auto", "local", "remote", "live"]).default("auto"),
    useCache: z.boolean().default(true),
    quiet: z.boolean().default(false),
    maxRetries: z.number().int().min(1).max(10).default(3),
    acceptStale: z.boolean().default(false),
    dateStart: isoDate.optional(),
    dateEnd: isoDate.optional(),
    deadline: z.date().optional(),
  })
  .strict()
  .refine(
    (options) =>
      !options.dateStart || !options.dateEnd || options.dateStart <= options.dateEnd,
    { message: "dateStart must not be after dateEnd", path: ["dateStart"] },
  );

export type LookupResult = {
  descriptor: DatasetDescriptor;
  viaAlias: boolean;
};

const summarize = (descriptor: DatasetDescriptor): DatasetSummary => ({
  id: descriptor.id,
  displayName: descriptor.displayName,
  tables: tableKeys(descriptor),
  visibility: descriptor.visibility,
});

const contains = (haystack: string, needle?: string): boolean =>
  !needle || haystack.toLowerCase().includes(needle.trim().toLowerCase());

const matchesFilter = (
  descriptor: DatasetDescriptor,
  filter: DatasetFilter,
): boolean =>
  contains(descriptor.description, filter.category) &&
  contains(descriptor.source, filter.source) &&
  contains(descriptor.geography, filter.geography);

/**
 * In-memory catalog of dataset descriptors, keyed by id and legacy alias.
 * Pure: no method performs I/O.
 */
export class DatasetRegistry {
  private readonly byName = new Map<string, DatasetDescriptor>();
  private readonly ordered: readonly DatasetDescriptor[];

  constructor(descriptors: readonly DatasetDescriptor[]) {
    this.ordered = [...descriptors].sort((left, right) =>
      left.id.localeCompare(right.id),
    );
    for (const descriptor of this.ordered) {
      this.byName.set(descriptor.id, descriptor);
      descriptor.legacyAliases.forEach((alias) =>
        this.byName.set(alias, descriptor),
      );
    }
  }

  /**
   * Hidden datasets answer exactly like unknown ids unless `includeHidden` is set.
   */
  lookup(
    id: string,
    options: { includeHidden?: boolean } = {},
  ): Result<LookupResult, DatasetError> {
    const descriptor = this.byName.get(id.trim());
    if (
      !descriptor ||
      (descriptor.visibility === "hidden" && !options.includeHidden)
    ) {
      return err(notFoundError(id));
    }

    return ok({ descriptor, viaAlias: descriptor.id !== id.trim() });
  }

  /**
   * Lazily yields summaries sorted by id. Each call starts a fresh pass.
   */
  *list(
    includeHidden = false,
    filter: DatasetFilter = {},
  ): Generator<DatasetSummary, void, undefined> {
    for (const descriptor of this.ordered) {
      if (descriptor.visibility === "hidden" && !includeHidden) {
        continue;
      }
      if (!matchesFilter(descriptor, filter)) {
        continue;
      }
      yield summarize(descriptor);
    }
  }

  info(id: string): Result<DatasetDescriptor, DatasetError> {
    return this.lookup(id).map((found) => found.descriptor);
  }

  /**
   * Checks the request against the catalog and fills in defaults. Every
   * rejection happens here, before any tier is consulted.
   */
  validate(
    id: string,
    options: ResolveOptions = {},
  ): Result<NormalizedRequest, DatasetError> {
    const found = this.lookup(id);
    if (found.isErr()) {
      return err(found.error);
    }
    const { descriptor } = found.value;

    const parsed = resolveOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
        .join("; ");
      return err(
        validationError(
          `Invalid options for '${descriptor.id}': ${issues}`,
          descriptor.id,
          parsed.error,
        ),
      );
    }
    const params = parsed.data;

    const table = params.table ?? null;
    if (table !== null) {
      const keys = tableKeys(descriptor);
      if (keys.length === 0) {
        return err(
          validationError(
            `Dataset '${descriptor.id}' is a single table; remove the table argument.`,
            descriptor.id,
          ),
        );
      }
      if (!keys.includes(table)) {
        return err(
          validationError(
            `Table '${table}' is not available for '${descriptor.id}'. Available tables: ${keys.join(", ")}.`,
            descriptor.id,
          ),
        );
      }
    }

    if (params.source === "live" && !descriptor.capabilities.liveFetchable) {
      return err(
        validationError(
          `Dataset '${descriptor.id}' is served from the cache tiers only and cannot be fetched live.`,
          descriptor.id,
        ),
      );
    }

    if (params.source === "local" && !params.useCache) {
      return err(
        validationError(
          "Source 'local' reads the cache and cannot be combined with useCache=false.",
          descriptor.id,
        ),
      );
    }

    const dateRange =
      params.dateStart || params.dateEnd
        ? { start: params.dateStart, end: params.dateEnd }
        : null;

    return ok({
      descriptor,
      requestedId: id,
      table,
      source: params.source,
      useCache: params.useCache,
      quiet: params.quiet,
      maxRetries: params.maxRetries,
      acceptStale: params.acceptStale,
      dateRange,
      deadline: params.deadline,
    });
  }
}
