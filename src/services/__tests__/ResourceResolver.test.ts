import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ResourceResolver, cacheKey, sqlLiteral } from '../ResourceResolver';
import { MemoryCacheStore } from '../CacheStore';
import type { QueryRunner } from '../QueryGateway';
import {
  InvalidRangeError,
  MalformedTimestampError,
  NotFoundError,
  RemoteQueryError,
  RemoteUnavailableError,
  SchemaMismatchError,
} from '../../types/errors';
import type { Row, SourceConfig } from '../../types/TimeSeries';

const FILTER_QUERY = 'select id, name, parentid from filters';

// Answers statements from a table of canned results
class FakeQueryRunner implements QueryRunner {
  private readonly responses = new Map<string, Row[] | Error>();

  query = vi.fn(async (_source: SourceConfig, statement: string): Promise<Row[]> => {
    const response = this.responses.get(statement);
    if (response === undefined) {
      throw new Error(`Unexpected statement: ${statement}`);
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });

  respond(statement: string, response: Row[] | Error): void {
    this.responses.set(statement, response);
  }
}

describe('ResourceResolver', () => {
  const source: SourceConfig = {
    slug: 'demo',
    name: 'Demo',
    jdbcUrl: 'http://jdbc.invalid:8080/Jdbc2Ei/test',
    tagName: 'demo_tag',
    connectorString: 'jdbc:vjdbc:rmi://test',
  };

  let now: number;
  let gateway: FakeQueryRunner;
  let cache: MemoryCacheStore;
  let resolver: ResourceResolver;

  beforeEach(() => {
    now = Date.UTC(2024, 0, 1);
    gateway = new FakeQueryRunner();
    cache = new MemoryCacheStore({ now: () => now });
    resolver = new ResourceResolver({ gateway, cache });
  });

  describe('getFilterTree', () => {
    it('should build the tree from the remote filters table', async () => {
      gateway.respond(FILTER_QUERY, [
        ['1', 'Rivers', -999],
        ['2', 'Lake A', '1'],
      ]);

      const tree = await resolver.getFilterTree(source);

      expect(tree).toEqual({
        status: 'ok',
        nodes: [
          {
            id: '1',
            name: 'Rivers',
            isLeaf: false,
            childNodes: [
              {
                id: '2',
                name: 'Lake A',
                isLeaf: true,
                childNodes: [],
                parameters: { sourceSlug: 'demo', filterId: '2' },
              },
            ],
          },
        ],
      });
    });

    it('should de-duplicate repeated filter rows', async () => {
      gateway.respond(FILTER_QUERY, [
        ['1', 'Rivers', '-999'],
        ['1', 'Rivers', '-999'],
        ['2', 'Lake A', '1'],
        ['2', 'Lake A', '1'],
      ]);

      const tree = await resolver.getFilterTree(source);

      expect(tree.status).toBe('ok');
      expect(tree.nodes).toHaveLength(1);
      if (tree.status === 'ok') {
        expect(tree.nodes[0].childNodes).toHaveLength(1);
      }
    });

    it('should start from the configured filter tree root', async () => {
      gateway.respond(FILTER_QUERY, [
        ['top', 'Top', -999],
        ['a', 'A', 'top'],
        ['b', 'B', 'top'],
      ]);

      const tree = await resolver.getFilterTree({ ...source, filterTreeRoot: 'top' });

      expect(tree.status === 'ok' && tree.nodes.map((node) => node.id)).toEqual(['a', 'b']);
    });

    it('should use the custom filter without querying the remote side', async () => {
      const custom: SourceConfig = {
        ...source,
        slug: 'custom',
        customFilter: [
          { id: 'rivers', name: 'Rivers', parentId: null },
          { id: 'levels', name: 'Levels', parentId: 'rivers' },
        ],
      };

      const tree = await resolver.getFilterTree(custom);

      expect(gateway.query).toHaveBeenCalledTimes(0);
      expect(tree).toEqual({
        status: 'ok',
        nodes: [
          {
            id: 'rivers',
            name: 'Rivers',
            isLeaf: false,
            childNodes: [
              {
                id: 'levels',
                name: 'Levels',
                isLeaf: true,
                childNodes: [],
                parameters: { sourceSlug: 'custom', filterId: 'levels' },
              },
            ],
          },
        ],
      });
    });

    it('should drop repeated custom filter entries', async () => {
      const custom: SourceConfig = {
        ...source,
        slug: 'custom',
        customFilter: [
          { id: 'rivers', name: 'Rivers', parentId: null },
          { id: 'rivers', name: 'Rivers', parentId: null },
          { id: 'levels', name: 'Levels', parentId: 'rivers' },
          { id: 'levels', name: 'Levels', parentId: 'rivers' },
        ],
      };

      const tree = await resolver.getFilterTree(custom);

      expect(tree.status === 'ok' && tree.nodes.map((node) => node.id)).toEqual(['rivers']);
      expect(tree.status === 'ok' && tree.nodes[0].childNodes.map((node) => node.id)).toEqual(['levels']);
    });

    it('should degrade instead of throwing when the bridge is unreachable', async () => {
      const unavailable = new RemoteUnavailableError(source.jdbcUrl, new Error('getaddrinfo ENOTFOUND'));
      gateway.respond(FILTER_QUERY, unavailable);

      const tree = await resolver.getFilterTree(source);

      expect(tree).toEqual({
        status: 'degraded',
        nodes: [{ name: 'Jdbc2Ei server not available.', error: unavailable }],
      });
    });

    it('should degrade on a sentinel error code', async () => {
      const queryError = new RemoteQueryError(-2, FILTER_QUERY);
      gateway.respond(FILTER_QUERY, queryError);

      const tree = await resolver.getFilterTree(source);

      expect(tree.status).toBe('degraded');
      expect(tree.nodes).toHaveLength(1);
      expect(tree.nodes[0].name).toBe('Jdbc data source not available.');
      if (tree.status === 'degraded') {
        expect(tree.nodes[0].error).toBe(queryError);
      }
    });

    it('should not cache a degraded tree', async () => {
      gateway.respond(FILTER_QUERY, new RemoteUnavailableError(source.jdbcUrl, new Error('down')));
      await resolver.getFilterTree(source);

      gateway.respond(FILTER_QUERY, [['1', 'Rivers', -999]]);
      const tree = await resolver.getFilterTree(source);

      expect(tree.status).toBe('ok');
      expect(gateway.query).toHaveBeenCalledTimes(2);
    });

    it('should propagate schema problems', async () => {
      gateway.respond(FILTER_QUERY, [['1', 'Rivers']]);

      await expect(resolver.getFilterTree(source)).rejects.toBeInstanceOf(SchemaMismatchError);
    });

    it('should serve the tree from cache for eight hours', async () => {
      gateway.respond(FILTER_QUERY, [['1', 'Rivers', -999]]);

      await resolver.getFilterTree(source);
      now += 8 * 60 * 60 * 1000 - 1;
      await resolver.getFilterTree(source);
      expect(gateway.query).toHaveBeenCalledTimes(1);

      now += 1;
      await resolver.getFilterTree(source);
      expect(gateway.query).toHaveBeenCalledTimes(2);
    });

    it('should keep the cached tree intact when a caller changes its copy', async () => {
      gateway.respond(FILTER_QUERY, [['1', 'Rivers', -999]]);

      const first = await resolver.getFilterTree(source);
      if (first.status === 'ok') {
        first.nodes[0].name = 'Renamed';
        first.nodes.push({ id: 'x', name: 'Extra', childNodes: [], isLeaf: true });
      }
      const second = await resolver.getFilterTree(source);

      expect(gateway.query).toHaveBeenCalledTimes(1);
      expect(second.status === 'ok' && second.nodes.map((node) => node.name)).toEqual(['Rivers']);
    });

    it('should bypass the cache on request', async () => {
      gateway.respond(FILTER_QUERY, [['1', 'Rivers', -999]]);

      await resolver.getFilterTree(source);
      await resolver.getFilterTree(source, { ignoreCache: true });

      expect(gateway.query).toHaveBeenCalledTimes(2);
    });
  });

  describe('getParameters', () => {
    const statement = "select name, parameterid, parameter from filters where id='F1'";

    beforeEach(() => {
      gateway.respond(statement, [
        ['Rivers', 'H.meting', 'Waterlevel'],
        ['Rivers', 'Q.meting', 'Discharge'],
        ['Rivers', 'H.meting', 'Waterlevel'],
      ]);
    });

    it('should return de-duplicated named parameters', async () => {
      const parameters = await resolver.getParameters(source, 'F1');

      expect(parameters).toEqual([
        { parameterId: 'H.meting', parameter: 'Waterlevel', name: 'Rivers' },
        { parameterId: 'Q.meting', parameter: 'Discharge', name: 'Rivers' },
      ]);
    });

    it('should query the gateway only once within the TTL', async () => {
      await resolver.getParameters(source, 'F1');
      const second = await resolver.getParameters(source, 'F1');

      expect(gateway.query).toHaveBeenCalledTimes(1);
      expect(second).toHaveLength(2);
    });

    it('should keep cached parameters intact when a caller changes its copy', async () => {
      const first = await resolver.getParameters(source, 'F1');
      first[0].parameter = 'tampered';
      first.push({ parameterId: 'X', parameter: 'Extra', name: 'Rivers' });

      const second = await resolver.getParameters(source, 'F1');

      expect(gateway.query).toHaveBeenCalledTimes(1);
      expect(second).toEqual([
        { parameterId: 'H.meting', parameter: 'Waterlevel', name: 'Rivers' },
        { parameterId: 'Q.meting', parameter: 'Discharge', name: 'Rivers' },
      ]);
    });

    it('should cache per filter', async () => {
      gateway.respond("select name, parameterid, parameter from filters where id='F2'", []);

      await resolver.getParameters(source, 'F1');
      expect(await resolver.getParameters(source, 'F2')).toEqual([]);

      expect(gateway.query).toHaveBeenCalledTimes(2);
    });

    it('should propagate remote failures unchanged', async () => {
      const unavailable = new RemoteUnavailableError(source.jdbcUrl, new Error('down'));
      gateway.respond("select name, parameterid, parameter from filters where id='F9'", unavailable);

      await expect(resolver.getParameters(source, 'F9')).rejects.toBe(unavailable);
    });

    it('should quote filter ids that contain quotes', async () => {
      gateway.respond("select name, parameterid, parameter from filters where id='it''s'", []);

      expect(await resolver.getParameters(source, "it's")).toEqual([]);
    });
  });

  describe('getParameterName', () => {
    it('should return the first column of the first row', async () => {
      gateway.respond("select name from parameters where id='H.meting'", [['Waterhoogte'], ['ignored']]);

      expect(await resolver.getParameterName(source, 'H.meting')).toBe('Waterhoogte');
      expect(await resolver.getParameterName(source, 'H.meting')).toBe('Waterhoogte');
      expect(gateway.query).toHaveBeenCalledTimes(1);
    });

    it('should raise NotFound when no rows come back', async () => {
      gateway.respond("select name from parameters where id='X'", []);

      await expect(resolver.getParameterName(source, 'X')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('getLocations', () => {
    const statement =
      "select longitude, latitude, location, locationid from filters where id='F1' and parameterid='H.meting'";

    beforeEach(() => {
      gateway.respond(statement, [
        [5.12, 52.09, 'Utrecht', 'L1'],
        ['4.9', '52.37', 'Amsterdam', 'L2'],
        [5.12, 52.09, 'Utrecht', 'L1'],
      ]);
    });

    it('should return de-duplicated locations with numeric coordinates', async () => {
      const locations = await resolver.getLocations(source, 'F1', 'H.meting');

      expect(locations).toEqual([
        { locationId: 'L1', location: 'Utrecht', longitude: 5.12, latitude: 52.09 },
        { locationId: 'L2', location: 'Amsterdam', longitude: 4.9, latitude: 52.37 },
      ]);
    });

    it('should keep locations cached without expiry', async () => {
      await resolver.getLocations(source, 'F1', 'H.meting');
      now += 30 * 24 * 60 * 60 * 1000;
      await resolver.getLocations(source, 'F1', 'H.meting');

      expect(gateway.query).toHaveBeenCalledTimes(1);
    });

    it('should honour a configured location TTL', async () => {
      resolver = new ResourceResolver({ gateway, cache, ttl: { locations: 60 } });

      await resolver.getLocations(source, 'F1', 'H.meting');
      now += 60 * 1000;
      await resolver.getLocations(source, 'F1', 'H.meting');

      expect(gateway.query).toHaveBeenCalledTimes(2);
    });

    it('should key locations by source as well', async () => {
      await resolver.getLocations(source, 'F1', 'H.meting');
      await resolver.getLocations({ ...source, slug: 'other' }, 'F1', 'H.meting');

      expect(gateway.query).toHaveBeenCalledTimes(2);
    });
  });

  describe('getTimeSeries', () => {
    const statement =
      'select time, value, flag, detection, comment from extimeseries ' +
      "where filterid='MFPS' and locationid='BW_NZ_04' and parameterid='H.meting' " +
      "and time between '2007-01-01 13:00:00' and '2008-01-10 13:00:00'";
    const query = {
      filterId: 'MFPS',
      locationId: 'BW_NZ_04',
      parameterId: 'H.meting',
      startDate: new Date('2007-01-01T13:00:00Z'),
      endDate: new Date('2008-01-10T13:00:00Z'),
    };

    it('should parse rows into time series points', async () => {
      gateway.respond(statement, [
        ['20080115130000', 1.25, 0, null, ''],
        ['20080115T14:00:00', '1.5', '2', '<', 'checked'],
      ]);

      const points = await resolver.getTimeSeries(source, query);

      expect(points).toEqual([
        {
          timestamp: new Date('2008-01-15T13:00:00Z'),
          value: 1.25,
          flag: 0,
          detectionLimit: null,
          comment: null,
        },
        {
          timestamp: new Date('2008-01-15T14:00:00Z'),
          value: 1.5,
          flag: 2,
          detectionLimit: '<',
          comment: 'checked',
        },
      ]);
    });

    it('should not cache time series', async () => {
      gateway.respond(statement, []);

      await resolver.getTimeSeries(source, query);
      await resolver.getTimeSeries(source, query);

      expect(gateway.query).toHaveBeenCalledTimes(2);
    });

    it('should raise MalformedTimestamp for an unreadable time', async () => {
      gateway.respond(statement, [['2008-01-15', 1, 0, null, null]]);

      await expect(resolver.getTimeSeries(source, query)).rejects.toBeInstanceOf(MalformedTimestampError);
    });

    it('should reject a start date after the end date without querying', async () => {
      const reversed = { ...query, startDate: query.endDate, endDate: query.startDate };

      const error = await resolver.getTimeSeries(source, reversed).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidRangeError);
      expect(error).toMatchObject({ kind: 'InvalidRange' });
      expect(gateway.query).not.toHaveBeenCalled();
    });

    it('should accept a range that starts and ends at the same instant', async () => {
      const instant = { ...query, endDate: query.startDate };
      gateway.respond(
        'select time, value, flag, detection, comment from extimeseries ' +
          "where filterid='MFPS' and locationid='BW_NZ_04' and parameterid='H.meting' " +
          "and time between '2007-01-01 13:00:00' and '2007-01-01 13:00:00'",
        []
      );

      expect(await resolver.getTimeSeries(source, instant)).toEqual([]);
    });
  });

  describe('getUnit', () => {
    it('should return the unit of a parameter', async () => {
      gateway.respond("select unit from parameters where id='H.meting'", [['m NAP']]);

      expect(await resolver.getUnit(source, 'H.meting')).toBe('m NAP');
    });

    it('should raise NotFound for an unknown parameter', async () => {
      gateway.respond("select unit from parameters where id='nope'", []);

      await expect(resolver.getUnit(source, 'nope')).rejects.toMatchObject({ kind: 'NotFound' });
    });
  });

  describe('cacheKey', () => {
    it('should keep parts containing the separator apart', () => {
      expect(cacheKey('ns', 'a::b', 'c')).not.toBe(cacheKey('ns', 'a', 'b::c'));
      expect(cacheKey('jdbc.parameters', 'demo', 'F 1')).toBe('jdbc.parameters::demo::F%201');
    });
  });

  describe('sqlLiteral', () => {
    it('should double embedded single quotes', () => {
      expect(sqlLiteral("O'Brien")).toBe("'O''Brien'");
    });
  });

  it('should treat a malformed cache entry as a miss', async () => {
    const statement = "select name, parameterid, parameter from filters where id='F1'";
    gateway.respond(statement, [['Rivers', 'H.meting', 'Waterlevel']]);
    await cache.set(cacheKey('jdbc.parameters', 'demo', 'F1'), 'garbage');

    const parameters = await resolver.getParameters(source, 'F1');

    expect(parameters).toHaveLength(1);
    expect(gateway.query).toHaveBeenCalledTimes(1);
  });
});
