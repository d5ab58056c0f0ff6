import type { TierName } from "./dataset";
import type { TableKey, TierResult } from "./table";

/**
 * How a resolved result was obtained. Carried beside the data, never inside it.
 */
export type Provenance = {
  source: TierName;
  fetchedAt: Date;
  table: TableKey | null;
  retries: number;
  notes: string[];
};

export type ResolvedDataset = {
  data: TierResult;
  provenance: Provenance;
};
