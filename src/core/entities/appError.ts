import type { TierName } from "./dataset";

/**
 * Canonical error categories surfaced by the resolver and its tiers.
 */
export type DatasetErrorCode =
  | "not_found"
  | "validation_error"
  | "cache_miss"
  | "network_error"
  | "live_fetch_error"
  | "structural_validation_error";

/**
 * Normalized failure carried in `Result`s across every boundary.
 * `causes` lists earlier tier failures when the auto chain is exhausted.
 */
export type DatasetError = {
  code: DatasetErrorCode;
  message: string;
  retryable: boolean;
  datasetId?: string;
  tier?: TierName;
  attempts?: number;
  httpStatus?: number;
  causes?: DatasetError[];
  cause?: unknown;
};

/**
 * Identical wording for unknown and hidden ids.
 */
export const notFoundError = (datasetId: string): DatasetError => ({
  code: "not_found",
  message: `Dataset '${datasetId}' is not available.`,
  retryable: false,
  datasetId,
});

export const validationError = (
  message: string,
  datasetId?: string,
  cause?: unknown,
): DatasetError => ({
  code: "validation_error",
  message,
  retryable: false,
  datasetId,
  cause,
});

export const cacheMissError = (
  message: string,
  tier: TierName,
  datasetId?: string,
): DatasetError => ({
  code: "cache_miss",
  message,
  retryable: false,
  tier,
  datasetId,
});

export const networkError = (
  message: string,
  retryable: boolean,
  details: Partial<Pick<DatasetError, "httpStatus" | "cause" | "datasetId">> = {},
): DatasetError => ({
  code: "network_error",
  message,
  retryable,
  tier: "remote",
  ...details,
});

export const liveFetchError = (
  message: string,
  retryable: boolean,
  details: Partial<Pick<DatasetError, "httpStatus" | "cause" | "datasetId">> = {},
): DatasetError => ({
  code: "live_fetch_error",
  message,
  retryable,
  tier: "live",
  ...details,
});

export const structuralValidationError = (
  message: string,
  datasetId: string,
  tier: TierName,
): DatasetError => ({
  code: "structural_validation_error",
  message,
  retryable: false,
  datasetId,
  tier,
});

/**
 * Renders an error and its tier causes as indented lines for terminal output.
 */
export const formatErrorChain = (error: DatasetError): string => {
  const describe = (item: DatasetError): string => {
    const where = item.tier ? `[${item.tier}] ` : "";
    const attempts =
      typeof item.attempts === "number" && item.attempts > 1
        ? ` (after ${item.attempts} attempts)`
        : "";
    return `${where}${item.code}: ${item.message}${attempts}`;
  };

  const lines = [describe(error)];
  const causes = error.causes ?? [];
  if (causes.length > 0) {
    lines.push("Tiers tried before the final failure:");
    causes.forEach((cause) => lines.push(`  - ${describe(cause)}`));
  }

  return lines.join("\n");
};
