import {
  liveFetchError,
  type DatasetError,
} from "../../../core/entities/appError";
import type { HttpClientError } from "../../http/httpClient";

/**
 * Carries the transport's retry classification into the live-fetch vocabulary.
 */
export const fromHttpFailure = (
  failure: HttpClientError,
  datasetId: string,
  source: string,
): DatasetError =>
  liveFetchError(`${source}: ${failure.message}`, failure.retryable, {
    httpStatus: failure.httpStatus,
    cause: failure.cause,
    datasetId,
  });
