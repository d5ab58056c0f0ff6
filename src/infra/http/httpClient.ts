import { err, ok, type Result } from "neverthrow";

type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  deadline?: Date;
};

export type HttpClientError = {
  code:
    | "timeout"
    | "transport_error"
    | "non_success_status"
    | "invalid_json"
    | "deadline_exceeded";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

const isAbortError = (error: unknown): boolean =>
  error instanceof Error &&
  (error.name === "AbortError" || error.name === "TimeoutError");

/**
 * Single-attempt HTTP over global fetch with timeout and status
 * classification. Retries belong to the caller.
 */
export class HttpClient {
  /**
   * Parsed body is left as `unknown`; callers validate its shape.
   */
  async requestJson(
    request: HttpRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const response = await this.perform(request);
    if (response.isErr()) {
      return err(response.error);
    }

    try {
      const body: unknown = await response.value.json();
      return ok(body);
    } catch (jsonError) {
      return err({
        code: "invalid_json",
        message: "HTTP response body was not valid JSON.",
        retryable: false,
        cause: jsonError,
      });
    }
  }

  async requestBytes(
    request: HttpRequest,
  ): Promise<Result<Buffer, HttpClientError>> {
    const response = await this.perform(request);
    if (response.isErr()) {
      return err(response.error);
    }

    try {
      return ok(Buffer.from(await response.value.arrayBuffer()));
    } catch (error) {
      return err({
        code: "transport_error",
        message:
          error instanceof Error
            ? error.message
            : "HTTP body could not be read.",
        retryable: true,
        cause: error,
      });
    }
  }

  /**
   * Time budget for one attempt: the request timeout, shortened by the deadline.
   */
  private effectiveTimeout(request: HttpRequest): number {
    if (!request.deadline) {
      return request.timeoutMs;
    }

    return Math.min(request.timeoutMs, request.deadline.getTime() - Date.now());
  }

  private async perform(
    request: HttpRequest,
  ): Promise<Result<Response, HttpClientError>> {
    const timeoutMs = this.effectiveTimeout(request);
    if (timeoutMs <= 0) {
      return err({
        code: "deadline_exceeded",
        message: "Deadline passed before the HTTP request could start.",
        retryable: true,
      });
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method ?? "GET",
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      return ok(response);
    } catch (error) {
      if (isAbortError(error)) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${timeoutMs}ms.`,
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
