import { RemoteQueryError, RemoteUnavailableError, SchemaMismatchError } from '../types/errors';
import { rowsSchema } from '../types/schemas';
import type { QueryStats, Row, SourceConfig } from '../types/TimeSeries';
import { createLogger } from '../utils/logger';
import { XmlRpcClient } from './XmlRpcClient';

/**
 * The calls a Jdbc2Ei bridge answers. Implementations reject with the raw
 * transport error; the gateway decides what it means.
 */
export interface RpcClient {
  ping(): Promise<void>;
  configGet(tag: string): Promise<unknown>;
  configPut(tag: string, value: string): Promise<void>;
  /** Resolves with rows, or with an integer error code */
  execute(statement: string, tags: string[]): Promise<unknown>;
}

export type RpcClientFactory = (endpoint: string) => RpcClient;

/**
 * What the resolver needs from the gateway
 */
export interface QueryRunner {
  query(source: SourceConfig, statement: string): Promise<Row[]>;
}

export interface QueryGatewayOptions {
  timeoutMs?: number;
  clientFactory?: RpcClientFactory;
}

// Socket-level failures: the host could not be reached at all
const NETWORK_ERROR_CODES = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  // Request aborted by the transport's own deadline
  'ABORT_ERR',
]);

class RpcTimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(method: string, timeoutMs: number) {
    super(`${method} timed out after ${timeoutMs}ms`);
    this.name = 'RpcTimeoutError';
  }
}

export function isNetworkError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    NETWORK_ERROR_CODES.has(error.code)
  );
}

function faultCodeOf(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'faultCode' in error && typeof error.faultCode === 'number') {
    return error.faultCode;
  }
  return null;
}

/**
 * Runs statements against a source's Jdbc2Ei bridge:
 * ping, make sure the source's tag is registered, execute, classify.
 */
export class QueryGateway implements QueryRunner {
  private static readonly DEFAULT_TIMEOUT_MS = 10000;
  private readonly clients: Map<string, RpcClient> = new Map();
  // One in-flight or settled registration per endpoint+tag
  private readonly registrations: Map<string, Promise<void>> = new Map();
  private readonly timeoutMs: number;
  private readonly clientFactory: RpcClientFactory;
  private readonly stats: QueryStats = {
    totalQueries: 0,
    errors: 0,
    isHealthy: true,
  };
  private readonly logger = createLogger({ component: 'QueryGateway' });

  constructor(options: QueryGatewayOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? QueryGateway.DEFAULT_TIMEOUT_MS;
    this.clientFactory =
      options.clientFactory ?? ((endpoint) => new XmlRpcClient(endpoint, { timeoutMs: this.timeoutMs }));
  }

  async query(source: SourceConfig, statement: string): Promise<Row[]> {
    if (statement.includes('"')) {
      this.logger.warn({ source: source.slug, statement }, 'Double quotes in query, is that intended?');
    }

    const client = this.getClient(source.jdbcUrl);

    try {
      await this.ping(source, client);
      await this.ensureRegistered(source, client);
      const result = await this.execute(source, client, statement);
      const rows = this.classify(source, result, statement);

      this.updateStats(true);
      this.logger.debug({ source: source.slug, statement, rows: rows.length }, 'Query executed');
      return rows;
    } catch (error) {
      this.updateStats(false);
      throw error;
    }
  }

  /**
   * Get statistics about queries run through this gateway
   */
  getStats(): QueryStats {
    return { ...this.stats };
  }

  private getClient(endpoint: string): RpcClient {
    let client = this.clients.get(endpoint);
    if (!client) {
      client = this.clientFactory(endpoint);
      this.clients.set(endpoint, client);
    }
    return client;
  }

  private async ping(source: SourceConfig, client: RpcClient): Promise<void> {
    try {
      await this.withTimeout(client.ping(), 'Ping.isAlive');
    } catch (error) {
      if (isNetworkError(error)) {
        throw new RemoteUnavailableError(source.jdbcUrl, error);
      }
      // Reachable, but the answer made no sense
      throw new RemoteQueryError(faultCodeOf(error), 'Ping.isAlive', error);
    }
  }

  /**
   * Registration is shared by concurrent callers and remembered afterwards.
   * A failed attempt is forgotten so the next query tries again.
   */
  private ensureRegistered(source: SourceConfig, client: RpcClient): Promise<void> {
    const key = this.registrationKey(source);
    let registration = this.registrations.get(key);
    if (!registration) {
      registration = this.register(source, client).catch((error: unknown) => {
        this.registrations.delete(key);
        throw error;
      });
      this.registrations.set(key, registration);
    }
    return registration;
  }

  private async register(source: SourceConfig, client: RpcClient): Promise<void> {
    try {
      await this.withTimeout(client.configGet(source.tagName), 'Config.get');
      return;
    } catch (error) {
      if (isNetworkError(error)) {
        throw new RemoteUnavailableError(source.jdbcUrl, error);
      }
      // Unreadable config means the tag is not there yet
    }

    this.logger.info({ source: source.slug, tag: source.tagName }, 'Registering tag on Jdbc2Ei bridge');
    try {
      await this.withTimeout(client.configPut(source.tagName, source.connectorString), 'Config.put');
    } catch (error) {
      if (isNetworkError(error)) {
        throw new RemoteUnavailableError(source.jdbcUrl, error);
      }
      throw new RemoteQueryError(faultCodeOf(error), `Config.put ${source.tagName}`, error);
    }
  }

  private async execute(source: SourceConfig, client: RpcClient, statement: string): Promise<unknown> {
    try {
      return await this.withTimeout(client.execute(statement, [source.tagName]), 'Query.execute');
    } catch (error) {
      if (isNetworkError(error)) {
        throw new RemoteUnavailableError(source.jdbcUrl, error);
      }
      // The bridge may have lost our tag; check again next time
      this.registrations.delete(this.registrationKey(source));
      throw new RemoteQueryError(faultCodeOf(error), statement, error);
    }
  }

  private classify(source: SourceConfig, result: unknown, statement: string): Row[] {
    if (typeof result === 'number' && Number.isInteger(result)) {
      // A lost tag is reported as a sentinel too
      this.registrations.delete(this.registrationKey(source));
      throw new RemoteQueryError(result, statement);
    }
    const parsed = rowsSchema.safeParse(result);
    if (!parsed.success) {
      throw new SchemaMismatchError(`Query [${statement}] did not return a table: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async withTimeout<T>(operation: Promise<T>, method: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new RpcTimeoutError(method, this.timeoutMs)), this.timeoutMs);
    });
    try {
      return await Promise.race([operation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private registrationKey(source: SourceConfig): string {
    return `${source.jdbcUrl}::${source.tagName}`;
  }

  private updateStats(success: boolean): void {
    this.stats.lastQueryTime = new Date();
    this.stats.totalQueries += 1;
    if (success) {
      this.stats.isHealthy = true;
    } else {
      this.stats.errors += 1;
      this.stats.isHealthy = false;
    }
  }
}
