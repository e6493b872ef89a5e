import { readFileSync } from 'fs';
import { NotFoundError } from '../types/errors';
import { sourceListSchema } from '../types/schemas';
import type { SourceConfig, SourceSummary } from '../types/TimeSeries';
import { createLogger } from '../utils/logger';

/**
 * Read-only access to configured sources, by slug
 */
export interface SourceProvider {
  getSource(slug: string): SourceConfig;
  listSources(): SourceSummary[];
}

export class SourceRegistry implements SourceProvider {
  private readonly sources: Map<string, SourceConfig> = new Map();
  private readonly logger = createLogger({ component: 'SourceRegistry' });

  /**
   * @param definitions - parsed JSON; validated here
   */
  constructor(definitions: unknown) {
    const parsed = sourceListSchema.safeParse(definitions);
    if (!parsed.success) {
      throw new Error(`Invalid source configuration: ${parsed.error.message}`);
    }

    for (const source of parsed.data) {
      if (this.sources.has(source.slug)) {
        throw new Error(`Duplicate source slug '${source.slug}'`);
      }
      this.sources.set(source.slug, Object.freeze(source));
    }

    this.logger.info({ count: this.sources.size }, 'Loaded JDBC sources');
  }

  /**
   * Load sources from a JSON file: an array of source definitions
   */
  static fromFile(path: string): SourceRegistry {
    const raw = readFileSync(path, 'utf8');
    let definitions: unknown;
    try {
      definitions = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Source configuration ${path} is not valid JSON`, { cause: error });
    }
    return new SourceRegistry(definitions);
  }

  getSource(slug: string): SourceConfig {
    const source = this.sources.get(slug);
    if (!source) {
      throw new NotFoundError('JDBC source', slug);
    }
    return source;
  }

  listSources(): SourceSummary[] {
    return Array.from(this.sources.values()).map(({ slug, name }) => ({ slug, name }));
  }
}
