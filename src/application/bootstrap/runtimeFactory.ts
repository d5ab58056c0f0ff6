import { CacheMaintenanceService } from "../services/cacheMaintenanceService";
import { DatasetRegistry } from "../services/datasetRegistry";
import { DatasetResolverService } from "../services/datasetResolverService";
import { DatasetValidator } from "../services/datasetValidator";
import { cacheDir, env, retryDelays, type AppEnv } from "../../shared/config/env";
import { logger, type Logger } from "../../shared/logger/logger";
import type { DatasetDescriptor } from "../../core/entities/dataset";
import type { DatasetFetcherPort } from "../../core/ports/inboundPorts";
import type { ClockPort, SleepPort } from "../../core/ports/outboundPorts";
import { LocalCacheStore } from "../../infra/cache/localCacheStore";
import { HttpClient } from "../../infra/http/httpClient";
import { BcbRealEstateFetcher } from "../../infra/providers/bcb/bcbRealEstateFetcher";
import { BcbSeriesFetcher } from "../../infra/providers/bcb/bcbSeriesFetcher";
import { MockDatasetFetcher } from "../../infra/providers/mocks/mockDatasetFetcher";
import { loadBundledCatalog } from "../../infra/registry/catalogLoader";
import { GithubReleaseStore } from "../../infra/remote/githubReleaseStore";
import { SystemClock, SystemSleeper } from "../../infra/system/systemPorts";
import { LiveFetchTier } from "../../infra/tiers/liveFetchTier";
import { LocalCacheTier } from "../../infra/tiers/localCacheTier";
import { RemoteCacheTier } from "../../infra/tiers/remoteCacheTier";

export type RuntimeOverrides = {
  catalog?: readonly DatasetDescriptor[];
  clock?: ClockPort;
  sleeper?: SleepPort;
  log?: Logger;
};

/**
 * Source collaborators keyed by dataset id. With the mock provider every
 * live-fetchable dataset gets deterministic offline data instead.
 */
const createLiveFetchers = (
  catalog: readonly DatasetDescriptor[],
  appEnv: AppEnv,
  clock: ClockPort,
): Map<string, DatasetFetcherPort> => {
  const liveDatasets = catalog.filter(
    (descriptor) => descriptor.capabilities.liveFetchable,
  );

  if (appEnv.LIVE_FETCH_PROVIDER === "mock") {
    return new Map(
      liveDatasets.map((descriptor): [string, DatasetFetcherPort] => [
        descriptor.id,
        new MockDatasetFetcher(descriptor, clock),
      ]),
    );
  }

  const httpClient = new HttpClient();
  const sourceFetchers: Record<string, DatasetFetcherPort> = {
    bcb_series: new BcbSeriesFetcher(
      appEnv.BCB_SGS_BASE_URL,
      clock,
      appEnv.LIVE_TIMEOUT_MS,
      httpClient,
    ),
    bcb_realestate: new BcbRealEstateFetcher(
      appEnv.BCB_OLINDA_BASE_URL,
      appEnv.LIVE_TIMEOUT_MS,
      httpClient,
    ),
  };

  const fetchers = new Map<string, DatasetFetcherPort>();
  for (const descriptor of liveDatasets) {
    const fetcher = sourceFetchers[descriptor.id];
    if (fetcher) {
      fetchers.set(descriptor.id, fetcher);
    }
  }
  return fetchers;
};

/**
 * Composition root shared by the CLI and library callers.
 */
export const createRuntime = (
  appEnv: AppEnv = env,
  overrides: RuntimeOverrides = {},
) => {
  const clock = overrides.clock ?? new SystemClock();
  const sleeper = overrides.sleeper ?? new SystemSleeper();
  const log = overrides.log ?? logger;
  const catalog = overrides.catalog ?? loadBundledCatalog();

  const registry = new DatasetRegistry(catalog);
  const delays = retryDelays(appEnv);

  const cache = new LocalCacheStore(
    {
      rootDir: cacheDir(appEnv),
      lockTimeoutMs: appEnv.CACHE_LOCK_TIMEOUT_MS,
    },
    clock,
    sleeper,
    log,
  );
  const remoteStore = new GithubReleaseStore(
    {
      apiUrl: appEnv.REMOTE_STORE_API_URL,
      repo: appEnv.REMOTE_STORE_REPO,
      tag: appEnv.REMOTE_STORE_TAG,
      token: appEnv.REMOTE_STORE_TOKEN,
      timeoutMs: appEnv.REMOTE_TIMEOUT_MS,
    },
    sleeper,
    clock,
    new HttpClient(),
    log,
  );

  const localTier = new LocalCacheTier(
    cache,
    clock,
    appEnv.CACHE_DEFAULT_MAX_AGE_DAYS,
    log,
  );
  const remoteTier = new RemoteCacheTier(remoteStore, cache, sleeper, clock, log);
  const liveTier = new LiveFetchTier(
    createLiveFetchers(catalog, appEnv, clock),
    sleeper,
    clock,
    log,
  );

  const resolver = new DatasetResolverService(
    registry,
    { local: localTier, remote: remoteTier, live: liveTier },
    cache,
    new DatasetValidator(appEnv.VALIDATION_MAX_FUTURE_DAYS),
    clock,
    delays,
    log,
  );
  const maintenance = new CacheMaintenanceService(
    registry,
    cache,
    remoteTier,
    appEnv.CACHE_DEFAULT_MAX_AGE_DAYS,
    delays,
    log,
  );

  return { registry, resolver, maintenance, cache };
};

export type Runtime = ReturnType<typeof createRuntime>;
