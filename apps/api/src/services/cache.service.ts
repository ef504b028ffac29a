import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import NodeCache from 'node-cache';
import { environment } from '../environments/environment';

@Injectable()
export class CacheService implements OnModuleDestroy {
  private readonly logger = new Logger(CacheService.name);
  private readonly cache: NodeCache;

  constructor() {
    this.cache = new NodeCache({
      stdTTL: environment.cache.analyticsTtl,
      checkperiod: 600, // Check for expired keys every 10 minutes
      useClones: false, // Metric sets are treated as immutable
    });

    this.logger.log('CacheService initialized');
  }

  get<T>(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  set<T>(key: string, value: T, ttlSeconds?: number): boolean {
    if (ttlSeconds) {
      return this.cache.set(key, value, ttlSeconds);
    }
    return this.cache.set(key, value);
  }

  /**
   * Drop every cached entry for one Search Console property
   */
  invalidateSite(siteUrl: string): number {
    const keys = this.cache
      .keys()
      .filter((key) => key.includes(`:${siteUrl}:`));
    return this.cache.del(keys);
  }

  onModuleDestroy() {
    this.cache.close();
  }

  flush(): void {
    this.cache.flushAll();
    this.logger.log('Cache flushed');
  }

  /**
   * Return the cached value, or run fetchFn and cache what it resolves to.
   * Rejections are not cached.
   */
  async getOrSet<T>(
    key: string,
    fetchFn: () => Promise<T>,
    ttlSeconds?: number
  ): Promise<T> {
    const cached = this.get<T>(key);
    if (cached !== undefined) {
      this.logger.debug(`Cache hit for key: ${key}`);
      return cached;
    }

    this.logger.debug(`Cache miss for key: ${key}, fetching...`);
    const value = await fetchFn();
    if (value !== null && value !== undefined) {
      this.set(key, value, ttlSeconds);
    }
    return value;
  }
}
