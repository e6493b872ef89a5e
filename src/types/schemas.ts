import { z } from 'zod';
import type { FilterNode } from './TimeSeries';

export const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.date(), z.null()]);

/** Tabular result of Query.execute */
export const rowsSchema = z.array(z.array(scalarSchema));

export const filterRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  parentId: z.string().nullable(),
});

export const sourceConfigSchema = z.object({
  slug: z.string().regex(/^[-a-zA-Z0-9_]+$/, 'slug may only contain letters, digits, "-" and "_"'),
  name: z.string().min(1),
  jdbcUrl: z.string().url(),
  tagName: z.string().min(1),
  connectorString: z.string().min(1),
  filterTreeRoot: z.string().min(1).nullish(),
  customFilter: z.array(filterRecordSchema).nullish(),
});

export const sourceListSchema = z.array(sourceConfigSchema);

// Cached payloads are re-validated on read so a foreign or stale entry is a miss

const parameterLookupSchema = z.object({
  sourceSlug: z.string(),
  filterId: z.string(),
});

export const filterNodeSchema: z.ZodType<FilterNode> = z.lazy(() =>
  z.object({
    id: z.string(),
    name: z.string(),
    childNodes: z.array(filterNodeSchema),
    isLeaf: z.boolean(),
    parameters: parameterLookupSchema.optional(),
  })
);

export const filterNodesSchema = z.array(filterNodeSchema);

export const parametersSchema = z.array(
  z.object({
    parameterId: z.string(),
    parameter: z.string(),
    name: z.string(),
  })
);

export const locationsSchema = z.array(
  z.object({
    locationId: z.string(),
    location: z.string(),
    longitude: z.number(),
    latitude: z.number(),
  })
);
