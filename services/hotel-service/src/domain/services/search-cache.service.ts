import { Injectable, Logger, Inject } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Cache } from 'cache-manager';
import { HotelSearchResultDto, PagedResult } from '@hotel-search/shared';
import type { HotelSearchQuery } from './hotel-search.domain-service';

export const DEFAULT_SEARCH_CACHE_TTL_MS = 120_000;

export type CachedSearchPage = PagedResult<HotelSearchResultDto>;

/**
 * Caches search pages keyed by the cache generation and every query
 * parameter. Any hotel mutation bumps the generation, so pages written
 * before it are unreachable and age out through the store's TTL and
 * capacity limit.
 */
@Injectable()
export class SearchCacheService {
    private readonly logger = new Logger(SearchCacheService.name);
    private readonly ttlMs: number;
    private _generation = 0;

    constructor(
        @Inject(CACHE_MANAGER) private readonly cacheManager: Cache,
        configService: ConfigService
    ) {
        this.ttlMs = configService.get<number>('SEARCH_CACHE_TTL_MS', DEFAULT_SEARCH_CACHE_TTL_MS);
    }

    get generation(): number {
        return this._generation;
    }

    async get(query: HotelSearchQuery): Promise<CachedSearchPage | null> {
        const cacheKey = this.getSearchCacheKey(query);
        try {
            const cached = await this.cacheManager.get<CachedSearchPage>(cacheKey);
            if (cached) {
                this.logger.debug(`Search cache hit: ${cacheKey}`);
                return cached;
            }
            return null;
        } catch (error) {
            this.logger.error(`Error reading search cache ${cacheKey}:`, error);
            return null;
        }
    }

    /** Stores a page computed while `generation` was current. */
    async set(query: HotelSearchQuery, page: CachedSearchPage, generation: number): Promise<void> {
        if (generation !== this._generation) {
            this.logger.debug('Skipping cache write for a search computed before the last mutation');
            return;
        }

        const cacheKey = this.buildKey(query, generation);
        try {
            await this.cacheManager.set(cacheKey, page, this.ttlMs);

            // a mutation landed during the write: the entry is unreachable, free its slot
            if (generation !== this._generation) {
                await this.cacheManager.del(cacheKey);
            }
        } catch (error) {
            this.logger.error(`Error writing search cache ${cacheKey}:`, error);
        }
    }

    async invalidateAll(): Promise<void> {
        this._generation++;
        this.logger.debug(`Search cache invalidated (generation ${this._generation})`);
    }

    getSearchCacheKey(query: HotelSearchQuery): string {
        return this.buildKey(query, this._generation);
    }

    private buildKey(query: HotelSearchQuery, generation: number): string {
        const radius = query.radiusKm === undefined ? 'all' : String(query.radiusKm);
        return `search:g${generation}:${query.latitude}:${query.longitude}:${radius}:${query.page}:${query.pageSize}`;
    }
}
