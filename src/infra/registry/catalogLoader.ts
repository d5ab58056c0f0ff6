import { z } from "zod";
import type { DatasetDescriptor } from "../../core/entities/dataset";
import bundledCatalogJson from "./datasets.json";

const identifier = z
  .string()
  .regex(/^[a-z][a-z0-9_]*$/, "expected lower_snake_case");

const tableSchema = z.object({
  key: identifier,
  displayName: z.string().min(1),
  requiredColumns: z.array(z.string().min(1)).optional(),
});

const descriptorSchema = z
  .object({
    id: identifier,
    displayName: z.string().min(1),
    description: z.string(),
    source: z.string(),
    geography: z.string(),
    frequency: z.string(),
    coverage: z.string().optional(),
    url: z.string().url().optional(),
    tables: z.array(tableSchema),
    visibility: z.enum(["public", "hidden"]),
    capabilities: z.object({
      cacheOnly: z.boolean(),
      liveFetchable: z.boolean(),
    }),
    legacyAliases: z.array(identifier).default([]),
    updateSchedule: z.enum(["daily", "weekly", "monthly", "manual"]).optional(),
    staleAfterDays: z.number().positive().optional(),
    validation: z.object({
      requiredColumns: z.array(z.string().min(1)).default([]),
      minRows: z.number().int().nonnegative().default(1),
      dateColumn: z.string().min(1).optional(),
    }),
  })
  .refine(
    (descriptor) =>
      !(descriptor.capabilities.cacheOnly && descriptor.capabilities.liveFetchable),
    { message: "cacheOnly and liveFetchable cannot both be true" },
  )
  .refine(
    (descriptor) =>
      new Set(descriptor.tables.map((table) => table.key)).size ===
      descriptor.tables.length,
    { message: "table keys must be unique" },
  );

const catalogSchema = z.object({
  version: z.literal(1),
  datasets: z.array(descriptorSchema),
});

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach((child) => deepFreeze(child));
  }
  return value;
};

/**
 * Parses a catalog document into frozen descriptors. Throws on any layout
 * problem, and when an id or legacy alias is claimed twice.
 */
export const loadCatalog = (raw: unknown): readonly DatasetDescriptor[] => {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Dataset catalog is invalid: ${issues}`);
  }

  const claimed = new Map<string, string>();
  for (const descriptor of parsed.data.datasets) {
    for (const name of [descriptor.id, ...descriptor.legacyAliases]) {
      const owner = claimed.get(name);
      if (owner) {
        throw new Error(
          `Dataset catalog is invalid: '${name}' is claimed by both '${owner}' and '${descriptor.id}'.`,
        );
      }
      claimed.set(name, descriptor.id);
    }
  }

  return deepFreeze(parsed.data.datasets);
};

export const loadBundledCatalog = (): readonly DatasetDescriptor[] =>
  loadCatalog(bundledCatalogJson);
