import { createHash } from "node:crypto";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  networkError,
  type DatasetError,
} from "../../core/entities/appError";
import type { RemoteAsset } from "../../core/entities/cache";
import type { RetryTiming } from "../../core/entities/retry";
import type {
  ClockPort,
  DownloadedAsset,
  RemoteStorePort,
  SleepPort,
} from "../../core/ports/outboundPorts";
import { logger, type Logger } from "../../shared/logger/logger";
import { retryWithBackoff } from "../../shared/retry/retryWithBackoff";
import { parsePayloadFileName, hasGzipHeader } from "../cache/payloadCodec";
import { HttpClient, type HttpClientError } from "../http/httpClient";

const releaseSchema = z.object({
  tag_name: z.string(),
  assets: z.array(
    z.object({
      name: z.string(),
      size: z.number().int().nonnegative(),
      updated_at: z.string().datetime(),
      browser_download_url: z.string().url(),
      digest: z.string().nullish(),
    }),
  ),
});

export type GithubReleaseStoreOptions = {
  apiUrl: string;
  repo: string;
  tag: string;
  token: string;
  timeoutMs: number;
};

const toNetworkError = (failure: HttpClientError): DatasetError =>
  networkError(failure.message, failure.retryable, {
    httpStatus: failure.httpStatus,
    cause: failure.cause,
  });

/**
 * Reads versioned cache assets attached to a GitHub release.
 */
export class GithubReleaseStore implements RemoteStorePort {
  constructor(
    private readonly options: GithubReleaseStoreOptions,
    private readonly sleeper: SleepPort,
    private readonly clock: ClockPort,
    private readonly httpClient = new HttpClient(),
    private readonly log: Logger = logger,
  ) {}

  /**
   * Lists payload assets on the release. Sidecars and unrelated files are skipped.
   */
  async listAssets(
    tag = this.options.tag,
    deadline?: Date,
  ): Promise<Result<RemoteAsset[], DatasetError>> {
    const url = `${this.options.apiUrl.replace(/\/+$/, "")}/repos/${this.options.repo}/releases/tags/${encodeURIComponent(tag)}`;

    const payload = await this.httpClient.requestJson({
      url,
      headers: this.headers("application/vnd.github+json"),
      timeoutMs: this.options.timeoutMs,
      deadline,
    });

    if (payload.isErr()) {
      if (payload.error.httpStatus === 404) {
        return err(
          networkError(
            `Release '${tag}' was not found in ${this.options.repo}.`,
            false,
            { httpStatus: 404 },
          ),
        );
      }
      return err(toNetworkError(payload.error));
    }

    const release = releaseSchema.safeParse(payload.value);
    if (!release.success) {
      return err(
        networkError("Release listing did not match the expected layout.", false, {
          cause: release.error,
        }),
      );
    }

    const assets: RemoteAsset[] = [];
    for (const asset of release.data.assets) {
      const parsed = parsePayloadFileName(asset.name);
      if (!parsed) {
        continue;
      }

      assets.push({
        key: parsed.key,
        name: asset.name,
        format: parsed.format,
        sizeBytes: asset.size,
        updatedAt: new Date(asset.updated_at),
        downloadUrl: asset.browser_download_url,
        digest: asset.digest ?? undefined,
      });
    }

    this.log.debug(
      { repo: this.options.repo, tag, assetCount: assets.length },
      "Listed remote cache assets",
    );

    return ok(assets);
  }

  /**
   * Downloads and verifies one asset, retrying transfer failures with backoff.
   */
  async download(
    asset: RemoteAsset,
    retry: RetryTiming,
    deadline?: Date,
  ): Promise<Result<DownloadedAsset, DatasetError>> {
    const outcome = await retryWithBackoff(
      () => this.downloadOnce(asset, deadline),
      { ...retry, isRetryable: (error: DatasetError) => error.retryable },
      {
        sleeper: this.sleeper,
        clock: this.clock,
        deadline,
        onRetry: ({ attempt, delayMs }) =>
          this.log.warn(
            { asset: asset.name, attempt, delayMs },
            "Remote download failed; retrying",
          ),
      },
    );

    if (outcome.isErr()) {
      return err({ ...outcome.error.error, attempts: outcome.error.attempts });
    }

    return ok({ ...outcome.value.value, attempts: outcome.value.attempts });
  }

  private async downloadOnce(
    asset: RemoteAsset,
    deadline?: Date,
  ): Promise<Result<Omit<DownloadedAsset, "attempts">, DatasetError>> {
    const bytes = await this.httpClient.requestBytes({
      url: asset.downloadUrl,
      headers: this.headers("application/octet-stream"),
      timeoutMs: this.options.timeoutMs,
      deadline,
    });

    if (bytes.isErr()) {
      return err(toNetworkError(bytes.error));
    }

    const verified = verifyAsset(asset, bytes.value);
    if (verified.isErr()) {
      return err(verified.error);
    }

    const dir = await mkdtemp(join(tmpdir(), "housing-datasets-"));
    const path = join(dir, asset.name);
    try {
      await writeFile(path, bytes.value);
    } catch (error) {
      await rm(dir, { recursive: true, force: true });
      throw error;
    }

    return ok({ path, dir });
  }

  private headers(accept: string): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: accept,
      "User-Agent": "housing-datasets",
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    return headers;
  }
}

/**
 * Integrity checks on downloaded bytes. Truncation and digest mismatches are
 * retryable; a payload in the wrong format is not.
 */
export const verifyAsset = (
  asset: RemoteAsset,
  bytes: Buffer,
): Result<Buffer, DatasetError> => {
  if (bytes.length === 0) {
    return err(networkError(`Asset '${asset.name}' downloaded empty.`, true));
  }

  if (bytes.length !== asset.sizeBytes) {
    return err(
      networkError(
        `Asset '${asset.name}' is ${bytes.length} bytes, expected ${asset.sizeBytes}.`,
        true,
      ),
    );
  }

  if (asset.format === "json.gz" && !hasGzipHeader(bytes)) {
    return err(
      networkError(`Asset '${asset.name}' is not gzip-compressed.`, false),
    );
  }

  if (asset.format === "json") {
    try {
      JSON.parse(bytes.toString("utf8"));
    } catch (error) {
      return err(
        networkError(`Asset '${asset.name}' is not valid JSON.`, false, {
          cause: error,
        }),
      );
    }
  }

  if (asset.digest) {
    const [algorithm, expected] = asset.digest.includes(":")
      ? asset.digest.split(":", 2)
      : ["sha256", asset.digest];
    if (algorithm === "sha256") {
      const actual = createHash("sha256").update(bytes).digest("hex");
      if (actual !== expected?.toLowerCase()) {
        return err(
          networkError(`Asset '${asset.name}' failed its sha256 check.`, true),
        );
      }
    }
  }

  return ok(bytes);
};
