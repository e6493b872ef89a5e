import { loadConfig } from './config';
import type { AppConfig } from './config';
import { MemoryCacheStore } from './services/CacheStore';
import { QueryGateway } from './services/QueryGateway';
import type { RpcClientFactory } from './services/QueryGateway';
import { ResourceResolver } from './services/ResourceResolver';
import { SourceRegistry } from './services/SourceRegistry';
import type { SourceProvider } from './services/SourceRegistry';
import { logger } from './utils/logger';

export * from './types/TimeSeries';
export * from './types/errors';
export { loadConfig } from './config';
export type { AppConfig } from './config';
export { MemoryCacheStore } from './services/CacheStore';
export type { CacheStore } from './services/CacheStore';
export { QueryGateway, isNetworkError } from './services/QueryGateway';
export type { QueryRunner, RpcClient, RpcClientFactory } from './services/QueryGateway';
export { ResourceResolver, cacheKey } from './services/ResourceResolver';
export { SourceRegistry } from './services/SourceRegistry';
export type { SourceProvider } from './services/SourceRegistry';
export { XmlRpcClient } from './services/XmlRpcClient';
export type { XmlRpcClientOptions } from './services/XmlRpcClient';
export { buildTree } from './utils/treeUtils';
export { dedupRows, namedRows } from './utils/rowUtils';
export { parseJdbcTimestamp } from './utils/timeUtils';

export interface Core {
  sources: SourceProvider;
  gateway: QueryGateway;
  cache: MemoryCacheStore;
  resolver: ResourceResolver;
  close(): Promise<void>;
}

export interface CoreOverrides {
  sources?: SourceProvider;
  clientFactory?: RpcClientFactory;
}

/**
 * Wire the resolver for a hosting service. Call close() on shutdown.
 */
export function createCore(config: AppConfig = loadConfig(), overrides: CoreOverrides = {}): Core {
  logger.info('🚀 Starting JDBC time-series core...');

  const sources = overrides.sources ?? SourceRegistry.fromFile(config.SOURCES_FILE);
  const cache = new MemoryCacheStore({ maxEntries: config.CACHE_MAX_ENTRIES });
  const gateway = new QueryGateway({
    timeoutMs: config.RPC_TIMEOUT_MS,
    clientFactory: overrides.clientFactory,
  });
  const resolver = new ResourceResolver({
    gateway,
    cache,
    ttl: { locations: config.LOCATION_CACHE_TTL_SECONDS },
  });

  logger.info({ sources: sources.listSources().length }, '✅ Core ready');

  return {
    sources,
    gateway,
    cache,
    resolver,
    close: async () => {
      logger.info('🛑 Shutting down...');
      await cache.clear();
    },
  };
}
