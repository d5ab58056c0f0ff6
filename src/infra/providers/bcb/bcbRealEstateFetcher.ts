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
import { HttpClient } from "../../http/httpClient";
import { parseSourceDate } from "../utils/dateUtils";
import { fromHttpFailure } from "../utils/httpErrors";

const olindaSchema = z.object({
  value: z.array(
    z.object({
      Data: z.string(),
      Info: z.string(),
      Valor: z.union([z.string(), z.number(), z.null()]),
    }),
  ),
});

/**
 * Series prefix in the OData feed to the table it lands in.
 */
export const categoryTables: Readonly<Record<string, TableKey>> = {
  contabil: "accounting",
  direcionamento: "application",
  indices: "indices",
  fontes: "sources",
  imoveis: "units",
};

// Multi-word tokens are rejoined with "-" so they survive the split on "_".
const hyphenatedTokens: ReadonlyArray<[string, string]> = [
  ["home_equity", "home-equity"],
  ["risco_operacao", "risco-operacao"],
  ["d_mais", "d-mais"],
  ["ivg_r", "ivg-r"],
  ["mvg_r", "mvg-r"],
];

const STATE_CODES = new Set(
  "br|ro|ac|am|rr|pa|ap|to|ma|pi|ce|rn|pb|pe|al|se|ba|mg|es|rj|sp|pr|sc|rs|ms|mt|go|df".split(
    "|",
  ),
);

const COLUMNS = [
  "date",
  "series_info",
  "category",
  "type",
  "value",
  "abbrev_state",
] as const;

const toNumber = (raw: string | number | null): number | null => {
  if (raw === null) {
    return null;
  }
  if (typeof raw === "number") {
    return raw;
  }
  const trimmed = raw.trim();
  if (!trimmed) {
    return null;
  }
  const parsed = Number(trimmed.replace(",", "."));
  return Number.isNaN(parsed) ? null : parsed;
};

/**
 * Splits one OData `Info` code (e.g. `credito_estoque_carteira_pf_sp`) into
 * the columns the tables carry.
 */
export const describeSeries = (
  info: string,
): { seriesInfo: string; category: string; type: string; state: string } => {
  const seriesInfo = hyphenatedTokens.reduce(
    (current, [from, to]) => current.split(from).join(to),
    info.trim(),
  );
  const parts = seriesInfo.split("_");
  const [category = "", type = ""] = parts;
  const suffix = (parts.length > 2 ? parts[parts.length - 1] ?? "" : "").toLowerCase();

  return {
    seriesInfo,
    category,
    type,
    state: STATE_CODES.has(suffix) ? suffix.toUpperCase() : "BR",
  };
};

/**
 * Reads the BCB real-estate market OData feed and splits it into tables by
 * series category.
 */
export class BcbRealEstateFetcher implements DatasetFetcherPort {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 60_000,
    private readonly httpClient = new HttpClient(),
  ) {}

  async fetch(
    request: LiveFetchRequest,
  ): Promise<Result<TierResult, DatasetError>> {
    if (
      request.table &&
      !Object.values(categoryTables).includes(request.table)
    ) {
      return err(
        liveFetchError(
          `BCB real-estate feed has no table '${request.table}'.`,
          false,
          { datasetId: request.datasetId },
        ),
      );
    }

    const url = new URL(
      "/olinda/servico/MercadoImobiliario/versao/v1/odata/mercadoimobiliario",
      this.baseUrl,
    );
    url.searchParams.set("$format", "json");
    url.searchParams.set("$select", "Data,Info,Valor");

    const payload = await this.httpClient.requestJson({
      url: url.toString(),
      headers: { Accept: "application/json" },
      timeoutMs: this.timeoutMs,
      deadline: request.deadline,
    });

    if (payload.isErr()) {
      return err(
        fromHttpFailure(payload.error, request.datasetId, "BCB real-estate feed"),
      );
    }

    const parsed = olindaSchema.safeParse(payload.value);
    if (!parsed.success) {
      return err(
        liveFetchError(
          "BCB real-estate feed did not match the expected layout.",
          false,
          { datasetId: request.datasetId, cause: parsed.error },
        ),
      );
    }

    const grouped = new Map<TableKey, DataRow[]>();
    for (const item of parsed.data.value) {
      const date = parseSourceDate(item.Data);
      if (!date) {
        return err(
          liveFetchError(
            `BCB real-estate feed returned an unreadable date '${item.Data}'.`,
            false,
            { datasetId: request.datasetId },
          ),
        );
      }

      const series = describeSeries(item.Info);
      const table = categoryTables[series.category];
      if (!table) {
        continue;
      }

      const rows = grouped.get(table) ?? [];
      rows.push({
        date,
        series_info: series.seriesInfo,
        category: series.category,
        type: series.type,
        value: toNumber(item.Valor),
        abbrev_state: series.state,
      });
      grouped.set(table, rows);
    }

    const tables: Record<TableKey, Table> = {};
    for (const table of [...grouped.keys()].sort()) {
      const rows = (grouped.get(table) ?? []).sort(
        (left, right) =>
          String(left.date).localeCompare(String(right.date)) ||
          String(left.series_info).localeCompare(String(right.series_info)),
      );
      tables[table] = tabular(COLUMNS, rows);
    }

    if (request.table) {
      return ok(single(tables[request.table] ?? tabular(COLUMNS, [])));
    }

    return ok(multiple(tables));
  }
}
