import { promisify } from "node:util";
import { gunzip, gzip } from "node:zlib";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { CacheFormat } from "../../core/entities/cache";
import type { JsonValue, Table, TierResult } from "../../core/entities/table";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

const PAYLOAD_VERSION = 1;

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

const tableSchema: z.ZodType<Table> = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("tabular"),
    columns: z.array(z.string()),
    rows: z.array(z.record(z.string(), cellSchema)),
  }),
  z.object({
    kind: z.literal("record"),
    value: z.record(z.string(), jsonValueSchema),
  }),
]);

export const tierResultSchema: z.ZodType<TierResult> = z.discriminatedUnion(
  "shape",
  [
    z.object({ shape: z.literal("single"), table: tableSchema }),
    z.object({
      shape: z.literal("multiple"),
      tables: z.record(z.string(), tableSchema),
    }),
  ],
);

const envelopeSchema = z.object({
  version: z.literal(PAYLOAD_VERSION),
  result: tierResultSchema,
});

export type CodecError = {
  message: string;
  cause?: unknown;
};

const GZIP_MAGIC = [0x1f, 0x8b] as const;

export const hasGzipHeader = (bytes: Uint8Array): boolean =>
  bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];

export const encodePayload = async (
  result: TierResult,
  format: CacheFormat,
): Promise<Buffer> => {
  const json = Buffer.from(
    JSON.stringify({ version: PAYLOAD_VERSION, result }),
    "utf8",
  );
  return format === "json.gz" ? gzipAsync(json) : json;
};

export const decodePayload = async (
  bytes: Buffer,
  format: CacheFormat,
): Promise<Result<TierResult, CodecError>> => {
  if (bytes.length === 0) {
    return err({ message: "Payload is empty." });
  }

  let text: string;
  try {
    text =
      format === "json.gz"
        ? (await gunzipAsync(bytes)).toString("utf8")
        : bytes.toString("utf8");
  } catch (error) {
    return err({ message: "Payload could not be decompressed.", cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return err({ message: "Payload is not valid JSON.", cause: error });
  }

  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return err({
      message: `Payload does not match the cache layout: ${envelope.error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ")}`,
      cause: envelope.error,
    });
  }

  return ok(envelope.data.result);
};

/**
 * Splits `abecip.sbpe.json.gz` into its key and format.
 */
export const parsePayloadFileName = (
  fileName: string,
): { key: string; format: CacheFormat } | null => {
  const match = /^(.+)\.(json\.gz|json)$/.exec(fileName);
  if (!match || fileName.endsWith(".meta.json")) {
    return null;
  }

  const [, key, format] = match;
  if (!key || (format !== "json.gz" && format !== "json")) {
    return null;
  }

  return { key, format };
};

export const payloadFileName = (key: string, format: CacheFormat): string =>
  `${key}.${format}`;
