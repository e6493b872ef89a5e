import type { ResolverError } from './errors';

/**
 * Core types for FEWS JDBC sources and the hierarchy they expose:
 * filters → parameters → locations → time series
 */

/**
 * A single cell as it comes back from the XML-RPC bridge.
 * dateTime values may already be decoded into a Date by the transport.
 */
export type Scalar = string | number | boolean | Date | null;

export type Row = Scalar[];

export type NamedRow = Record<string, Scalar>;

/**
 * Parent id used by the remote filters table for top-level filters.
 * Shared across the system; never a legitimate filter id.
 */
export const JDBC_NONE = -999;

export interface FilterRecord {
  id: string;
  name: string;
  parentId: string | null; // null is the "none" parent used by custom filters
}

export interface SourceConfig {
  slug: string;
  name: string;
  jdbcUrl: string;
  tagName: string;
  connectorString: string;
  filterTreeRoot?: string | null;
  customFilter?: FilterRecord[] | null;
}

export interface SourceSummary {
  slug: string;
  name: string;
}

/**
 * Everything a caller needs to ask for the parameters of a leaf filter.
 * Turning this into a URL is the presentation layer's job.
 */
export interface ParameterLookup {
  sourceSlug: string;
  filterId: string;
}

export interface FilterNode {
  id: string;
  name: string;
  childNodes: FilterNode[];
  isLeaf: boolean;
  parameters?: ParameterLookup; // only set on leaves
}

export interface DegradedFilterNode {
  name: string; // human-readable diagnostic
  error: ResolverError;
}

export type FilterTree =
  | { status: 'ok'; nodes: FilterNode[] }
  | { status: 'degraded'; nodes: [DegradedFilterNode] };

export interface Parameter {
  parameterId: string;
  parameter: string; // display name
  name: string; // owning filter name
}

export interface Location {
  locationId: string;
  location: string; // display name
  longitude: number;
  latitude: number;
}

export interface TimeSeriesPoint {
  timestamp: Date;
  value: number | null;
  flag: number | null;
  detectionLimit: string | null;
  comment: string | null;
}

export interface TimeSeriesQuery {
  filterId: string;
  locationId: string;
  parameterId: string;
  startDate: Date;
  endDate: Date;
}

export interface LookupOptions {
  /** Recompute and overwrite the cache entry */
  ignoreCache?: boolean;
}

export interface QueryStats {
  totalQueries: number;
  lastQueryTime?: Date;
  errors: number;
  isHealthy: boolean;
}
