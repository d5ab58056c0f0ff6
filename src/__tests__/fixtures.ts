import type { DatasetDescriptor } from "../core/entities/dataset";
import type { ClockPort, SleepPort } from "../core/ports/outboundPorts";

export const descriptorFixture = (
  overrides: Partial<DatasetDescriptor> = {},
): DatasetDescriptor => ({
  id: "abecip",
  displayName: "ABECIP housing credit",
  description: "Housing credit indicators",
  source: "ABECIP",
  geography: "Brazil",
  frequency: "monthly",
  tables: [
    { key: "sbpe", displayName: "SBPE flows" },
    { key: "units", displayName: "Financed units" },
    { key: "cgi", displayName: "Home equity" },
  ],
  visibility: "public",
  capabilities: { cacheOnly: true, liveFetchable: false },
  legacyAliases: ["abecip_indicators"],
  updateSchedule: "monthly",
  validation: { requiredColumns: ["date"], minRows: 1, dateColumn: "date" },
  ...overrides,
});

export const fixedClock = (iso: string): ClockPort => {
  const now = new Date(iso);
  return { now: () => now };
};

export const recordingSleeper = (): SleepPort & { delays: number[] } => {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
};
