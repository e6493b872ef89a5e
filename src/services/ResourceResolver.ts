import { z } from 'zod';
import { InvalidRangeError, NotFoundError, RemoteQueryError, RemoteUnavailableError } from '../types/errors';
import {
  filterNodesSchema,
  locationsSchema,
  parametersSchema,
} from '../types/schemas';
import { JDBC_NONE } from '../types/TimeSeries';
import type {
  FilterNode,
  FilterRecord,
  FilterTree,
  Location,
  LookupOptions,
  Parameter,
  Row,
  SourceConfig,
  TimeSeriesPoint,
  TimeSeriesQuery,
} from '../types/TimeSeries';
import { createLogger } from '../utils/logger';
import {
  dedupBy,
  dedupRows,
  namedRows,
  toNumber,
  toOptionalNumber,
  toOptionalText,
  toText,
} from '../utils/rowUtils';
import { formatJdbcDate, toTimestamp } from '../utils/timeUtils';
import { buildTree, walkTree } from '../utils/treeUtils';
import type { CacheStore } from './CacheStore';
import type { QueryRunner } from './QueryGateway';

const EIGHT_HOURS = 8 * 60 * 60;

export const CACHE_NAMESPACES = {
  filterTree: 'jdbc.filter-tree',
  parameters: 'jdbc.parameters',
  parameterName: 'jdbc.parameter-name',
  locations: 'jdbc.locations',
} as const;

export interface ResolverTtls {
  filterTree: number;
  parameters: number;
  parameterName: number;
  /** undefined keeps locations until the cache store evicts them */
  locations?: number;
}

export interface ResourceResolverOptions {
  gateway: QueryRunner;
  cache: CacheStore;
  ttl?: Partial<ResolverTtls>;
}

/**
 * Deterministic cache key. Parts are URI-encoded so a "::" inside an id
 * cannot make two different lookups share a key.
 */
export function cacheKey(namespace: string, ...parts: string[]): string {
  return [namespace, ...parts.map((part) => encodeURIComponent(part))].join('::');
}

/**
 * Single-quoted SQL literal with embedded quotes doubled
 */
export function sqlLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Serves the filter → parameter → location → time series hierarchy of a
 * source, caching the slowly changing lookups.
 */
export class ResourceResolver {
  private readonly gateway: QueryRunner;
  private readonly cache: CacheStore;
  private readonly ttl: ResolverTtls;
  private readonly logger = createLogger({ component: 'ResourceResolver' });

  constructor(options: ResourceResolverOptions) {
    this.gateway = options.gateway;
    this.cache = options.cache;
    this.ttl = {
      filterTree: EIGHT_HOURS,
      parameters: EIGHT_HOURS,
      parameterName: EIGHT_HOURS,
      ...options.ttl,
    };
  }

  /**
   * Filter hierarchy of a source. Leaves carry a lookup for their parameters.
   *
   * When the bridge is down or rejects the query this resolves to a single
   * diagnostic node instead of rejecting; such results are not cached.
   */
  async getFilterTree(source: SourceConfig, options: LookupOptions = {}): Promise<FilterTree> {
    const key = cacheKey(CACHE_NAMESPACES.filterTree, source.slug);
    const cached = await this.readCache(key, filterNodesSchema, options);
    if (cached) {
      return { status: 'ok', nodes: cached };
    }

    let records: FilterRecord[];
    let rootParent: string | null;

    if (source.customFilter) {
      records = dedupBy(source.customFilter, ({ id, name, parentId }) => [id, name, parentId]);
      rootParent = null;
    } else {
      try {
        records = await this.queryFilterRecords(source);
      } catch (error) {
        if (error instanceof RemoteUnavailableError) {
          return { status: 'degraded', nodes: [{ name: 'Jdbc2Ei server not available.', error }] };
        }
        if (error instanceof RemoteQueryError) {
          this.logger.error({ source: source.slug, error: error.message }, 'JdbcSource returned an error');
          return { status: 'degraded', nodes: [{ name: 'Jdbc data source not available.', error }] };
        }
        throw error;
      }
      rootParent = source.filterTreeRoot || String(JDBC_NONE);
    }

    const nodes = buildTree(records, rootParent);
    this.attachParameterLookups(nodes, source.slug);

    await this.store(key, nodes, this.ttl.filterTree);
    return { status: 'ok', nodes };
  }

  /**
   * Parameters available for one filter
   */
  async getParameters(source: SourceConfig, filterId: string, options: LookupOptions = {}): Promise<Parameter[]> {
    const key = cacheKey(CACHE_NAMESPACES.parameters, source.slug, filterId);
    const cached = await this.readCache(key, parametersSchema, options);
    if (cached) {
      return cached;
    }

    const rows = await this.gateway.query(
      source,
      `select name, parameterid, parameter from filters where id=${sqlLiteral(filterId)}`
    );
    const parameters = namedRows(dedupRows(rows), ['name', 'parameterid', 'parameter']).map((row) => ({
      parameterId: toText(row.parameterid, 'parameterid'),
      parameter: toText(row.parameter, 'parameter'),
      name: toText(row.name, 'name'),
    }));

    await this.store(key, parameters, this.ttl.parameters);
    return parameters;
  }

  /**
   * Display name of a parameter
   */
  async getParameterName(source: SourceConfig, parameterId: string, options: LookupOptions = {}): Promise<string> {
    const key = cacheKey(CACHE_NAMESPACES.parameterName, source.slug, parameterId);
    const cached = await this.readCache(key, z.string(), options);
    if (cached !== undefined) {
      return cached;
    }

    const rows = await this.gateway.query(
      source,
      `select name from parameters where id=${sqlLiteral(parameterId)}`
    );
    const name = this.firstCell(rows, 'parameter name', parameterId);

    await this.store(key, name, this.ttl.parameterName);
    return name;
  }

  /**
   * Locations measuring a parameter within a filter
   */
  async getLocations(
    source: SourceConfig,
    filterId: string,
    parameterId: string,
    options: LookupOptions = {}
  ): Promise<Location[]> {
    const key = cacheKey(CACHE_NAMESPACES.locations, source.slug, filterId, parameterId);
    const cached = await this.readCache(key, locationsSchema, options);
    if (cached) {
      return cached;
    }

    const rows = await this.gateway.query(
      source,
      'select longitude, latitude, location, locationid from filters ' +
        `where id=${sqlLiteral(filterId)} and parameterid=${sqlLiteral(parameterId)}`
    );
    const locations = namedRows(dedupRows(rows), ['longitude', 'latitude', 'location', 'locationid']).map(
      (row) => ({
        locationId: toText(row.locationid, 'locationid'),
        location: toText(row.location, 'location'),
        longitude: toNumber(row.longitude, 'longitude'),
        latitude: toNumber(row.latitude, 'latitude'),
      })
    );

    await this.store(key, locations, this.ttl.locations);
    return locations;
  }

  /**
   * Measurements between two dates. Always fetched live.
   */
  async getTimeSeries(source: SourceConfig, query: TimeSeriesQuery): Promise<TimeSeriesPoint[]> {
    if (query.startDate.getTime() > query.endDate.getTime()) {
      throw new InvalidRangeError(query.startDate, query.endDate);
    }

    const statement =
      'select time, value, flag, detection, comment from extimeseries ' +
      `where filterid=${sqlLiteral(query.filterId)} ` +
      `and locationid=${sqlLiteral(query.locationId)} ` +
      `and parameterid=${sqlLiteral(query.parameterId)} ` +
      `and time between '${formatJdbcDate(query.startDate)}' and '${formatJdbcDate(query.endDate)}'`;

    const rows = await this.gateway.query(source, statement);
    return namedRows(rows, ['time', 'value', 'flag', 'detection', 'comment']).map((row) => ({
      timestamp: toTimestamp(row.time),
      value: toOptionalNumber(row.value),
      flag: toOptionalNumber(row.flag),
      detectionLimit: toOptionalText(row.detection),
      comment: toOptionalText(row.comment),
    }));
  }

  /**
   * Unit of a parameter (first row, first column)
   */
  async getUnit(source: SourceConfig, parameterId: string): Promise<string> {
    const rows = await this.gateway.query(
      source,
      `select unit from parameters where id=${sqlLiteral(parameterId)}`
    );
    return this.firstCell(rows, 'unit', parameterId);
  }

  private async queryFilterRecords(source: SourceConfig): Promise<FilterRecord[]> {
    const rows = await this.gateway.query(source, 'select id, name, parentid from filters');
    return namedRows(dedupRows(rows), ['id', 'name', 'parentid']).map((row) => ({
      id: toText(row.id, 'id'),
      name: toText(row.name, 'name'),
      parentId: row.parentid === null ? null : toText(row.parentid, 'parentid'),
    }));
  }

  private attachParameterLookups(nodes: FilterNode[], sourceSlug: string): void {
    for (const node of walkTree(nodes)) {
      if (node.isLeaf) {
        node.parameters = { sourceSlug, filterId: node.id };
      }
    }
  }

  private firstCell(rows: Row[], what: string, key: string): string {
    if (rows.length === 0 || rows[0].length === 0) {
      throw new NotFoundError(what, key);
    }
    const [[value]] = rows;
    return toText(value, what);
  }

  /**
   * Callers get the original; the cache keeps its own copy
   */
  private async store(key: string, value: unknown, ttlSeconds: number | undefined): Promise<void> {
    await this.cache.set(key, structuredClone(value), ttlSeconds);
  }

  /**
   * Cached value if present and well-formed; anything else counts as a miss
   */
  private async readCache<T>(
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: LookupOptions
  ): Promise<T | undefined> {
    if (options.ignoreCache) {
      return undefined;
    }
    const parsed = schema.safeParse(await this.cache.get(key));
    if (!parsed.success) {
      return undefined;
    }
    this.logger.debug({ key }, 'Cache hit');
    return parsed.data;
  }
}
