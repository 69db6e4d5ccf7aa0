import { composeShDataSchema, ShDataSchema } from "../builders/sh-data.schema";
import { SCHEMA_CACHE_PREFIX } from "../constants/ShDataConstant";
import logger from "../utils/logger";

export interface SchemaCacheStats {
  totalCached: number;
  hits: number;
  misses: number;
  cacheKeys: string[];
}

/**
 * Memoizes composed Sh-Data schemas per extension list.
 *
 * Cache keys: "schema:base", "schema:base+service-settings", ...
 * Extension order is part of the key since it decides element order.
 */
export class ShDataSchemaCache {
  private static instance: ShDataSchemaCache;

  private readonly cache = new Map<string, ShDataSchema>();
  private hits = 0;
  private misses = 0;

  public static getInstance(): ShDataSchemaCache {
    if (!ShDataSchemaCache.instance) {
      ShDataSchemaCache.instance = new ShDataSchemaCache();
    }
    return ShDataSchemaCache.instance;
  }

  public static cacheKey(extensions: readonly string[]): string {
    return `${SCHEMA_CACHE_PREFIX}${["base", ...extensions].join("+")}`;
  }

  public getSchema(extensions: readonly string[]): ShDataSchema {
    const key = ShDataSchemaCache.cacheKey(extensions);

    const cached = this.cache.get(key);
    if (cached) {
      this.hits++;
      logger.debug("Schema cache hit", { key });
      return cached;
    }

    this.misses++;
    logger.debug("Schema cache miss, composing schema", { key });

    // composeShDataSchema throws for unknown or repeated extensions; nothing is cached then
    const schema = composeShDataSchema(extensions);
    this.cache.set(key, schema);
    return schema;
  }

  public invalidate(key: string): boolean {
    const removed = this.cache.delete(key);
    if (removed) {
      logger.debug("Schema cache invalidated", { key });
    }
    return removed;
  }

  public invalidateAll(): number {
    const count = this.cache.size;
    this.cache.clear();
    logger.debug(`Schema cache cleared: ${count} schemas invalidated`);
    return count;
  }

  public getCacheStats(): SchemaCacheStats {
    return {
      totalCached: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      cacheKeys: [...this.cache.keys()],
    };
  }
}
