import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  liveFetchError,
  type DatasetError,
} from "../../../core/entities/appError";
import {
  multiple,
  single,
  tabular,
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
import { HttpClient } from "../../http/httpClient";
import { fromHttpFailure } from "../utils/httpErrors";
import { parseSourceDate, toBrDate, toIsoDate } from "../utils/dateUtils";
import seriesCatalogJson from "./bcbSeries.json";

const seriesSchema = z.object({
  code: z.number().int().positive(),
  name: z.string().min(1),
  description: z.string(),
  unit: z.string(),
});

export type BcbSeries = z.infer<typeof seriesSchema>;

export const bcbSeriesCatalog: Readonly<Record<TableKey, readonly BcbSeries[]>> =
  z.record(z.string(), z.array(seriesSchema)).parse(seriesCatalogJson);

const sgsPayloadSchema = z.array(
  z.object({
    data: z.string(),
    valor: z.string(),
  }),
);

export const DEFAULT_SERIES_START = "2010-01-01";

const COLUMNS = ["date", "code_bcb", "name", "value", "unit"] as const;

/**
 * Pulls macro series from the BCB SGS JSON API, one request per series code,
 * grouped into one table per category.
 */
export class BcbSeriesFetcher implements DatasetFetcherPort {
  constructor(
    private readonly baseUrl: string,
    private readonly clock: ClockPort,
    private readonly timeoutMs = 60_000,
    private readonly httpClient = new HttpClient(),
    private readonly catalog = bcbSeriesCatalog,
  ) {}

  async fetch(
    request: LiveFetchRequest,
  ): Promise<Result<TierResult, DatasetError>> {
    const categories = request.table
      ? [request.table]
      : Object.keys(this.catalog).sort();

    const start = request.dateRange?.start ?? DEFAULT_SERIES_START;
    const end = request.dateRange?.end ?? toIsoDate(this.clock.now());

    const tables: Record<TableKey, Table> = {};
    for (const category of categories) {
      const series = this.catalog[category];
      if (!series) {
        return err(
          liveFetchError(`BCB series has no category '${category}'.`, false, {
            datasetId: request.datasetId,
          }),
        );
      }

      const rows: DataRow[] = [];
      for (const entry of series) {
        const fetched = await this.fetchSeries(entry, start, end, request);
        if (fetched.isErr()) {
          return err(fetched.error);
        }
        rows.push(...fetched.value);
      }

      rows.sort((left, right) =>
        String(left.date).localeCompare(String(right.date)),
      );
      tables[category] = tabular(COLUMNS, rows);
    }

    const only = request.table ? tables[request.table] : undefined;
    return ok(only ? single(only) : multiple(tables));
  }

  private async fetchSeries(
    series: BcbSeries,
    start: string,
    end: string,
    request: LiveFetchRequest,
  ): Promise<Result<DataRow[], DatasetError>> {
    const url = new URL(
      `/dados/serie/bcdata.sgs.${series.code}/dados`,
      this.baseUrl,
    );
    url.searchParams.set("formato", "json");
    url.searchParams.set("dataInicial", toBrDate(start));
    url.searchParams.set("dataFinal", toBrDate(end));

    const payload = await this.httpClient.requestJson({
      url: url.toString(),
      headers: { Accept: "application/json" },
      timeoutMs: this.timeoutMs,
      deadline: request.deadline,
    });

    if (payload.isErr()) {
      return err(
        fromHttpFailure(payload.error, request.datasetId, `SGS series ${series.code}`),
      );
    }

    const parsed = sgsPayloadSchema.safeParse(payload.value);
    if (!parsed.success) {
      return err(
        liveFetchError(
          `SGS series ${series.code} response did not match the expected layout.`,
          false,
          { datasetId: request.datasetId, cause: parsed.error },
        ),
      );
    }

    const rows: DataRow[] = [];
    for (const point of parsed.data) {
      const date = parseSourceDate(point.data);
      if (!date) {
        return err(
          liveFetchError(
            `SGS series ${series.code} returned an unreadable date '${point.data}'.`,
            false,
            { datasetId: request.datasetId },
          ),
        );
      }

      const value = Number(point.valor.replace(",", "."));
      rows.push({
        date,
        code_bcb: series.code,
        name: series.name,
        value: point.valor.trim() === "" || Number.isNaN(value) ? null : value,
        unit: series.unit,
      });
    }

    return ok(rows);
  }
}
