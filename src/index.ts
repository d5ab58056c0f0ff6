export {
  createRuntime,
  type Runtime,
  type RuntimeOverrides,
} from "./application/bootstrap/runtimeFactory";
export type {
  DatasetCacheStatus,
  DatasetUpdateReport,
} from "./application/services/cacheMaintenanceService";
export {
  formatErrorChain,
  type DatasetError,
  type DatasetErrorCode,
} from "./core/entities/appError";
export type {
  DatasetDescriptor,
  DatasetFilter,
  DatasetSummary,
  ResolveOptions,
  SourcePreference,
  TierName,
} from "./core/entities/dataset";
export type { Provenance, ResolvedDataset } from "./core/entities/provenance";
export type {
  CellValue,
  DataRow,
  Table,
  TierResult,
} from "./core/entities/table";
export type { DatasetFetcherPort } from "./core/ports/inboundPorts";
