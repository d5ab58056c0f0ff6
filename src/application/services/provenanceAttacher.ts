import type { TierName } from "../../core/entities/dataset";
import type { ResolvedDataset } from "../../core/entities/provenance";
import type { TableKey, TierResult } from "../../core/entities/table";
import type { ClockPort } from "../../core/ports/outboundPorts";

/**
 * Pairs a result with how it was obtained. The data is handed back as-is.
 */
export const annotate = (
  result: TierResult,
  tier: TierName,
  tableKey: TableKey | null,
  retries: number,
  notes: readonly string[],
  clock: ClockPort,
): ResolvedDataset => ({
  data: result,
  provenance: {
    source: tier,
    fetchedAt: clock.now(),
    table: tableKey,
    retries: Math.max(0, retries),
    notes: [...notes],
  },
});
