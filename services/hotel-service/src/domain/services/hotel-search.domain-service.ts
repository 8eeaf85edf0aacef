import { Injectable, Logger, Inject } from '@nestjs/common';
import {
    Coordinate,
    HOTEL_REPOSITORY,
    HotelRepository,
    HotelSearchResultDto,
    PagedResult,
    DEFAULT_PAGE,
    DEFAULT_PAGE_SIZE,
    assertPagination,
    paginate
} from '@hotel-search/shared';
import { GeoSearchService, HotelSearchResultItem } from './geo-search.service';
import { SearchCacheService } from './search-cache.service';

export interface HotelSearchQuery {
    latitude: number;
    longitude: number;
    page: number;
    pageSize: number;
    radiusKm?: number;
}

export interface HotelSearchRequest {
    latitude: number;
    longitude: number;
    page?: number;
    pageSize?: number;
    radiusKm?: number;
}

@Injectable()
export class HotelSearchDomainService {
    private readonly logger = new Logger(HotelSearchDomainService.name);

    constructor(
        @Inject(HOTEL_REPOSITORY) private readonly hotelRepository: HotelRepository,
        private readonly geoSearchService: GeoSearchService,
        private readonly searchCacheService: SearchCacheService
    ) { }

    async searchHotels(request: HotelSearchRequest): Promise<PagedResult<HotelSearchResultDto>> {
        const query: HotelSearchQuery = {
            latitude: request.latitude,
            longitude: request.longitude,
            page: request.page ?? DEFAULT_PAGE,
            pageSize: request.pageSize ?? DEFAULT_PAGE_SIZE,
            radiusKm: request.radiusKm
        };

        // Invalid input is rejected before the store is read
        const origin = new Coordinate(query.latitude, query.longitude);
        this.geoSearchService.resolveRadius(query.radiusKm);
        assertPagination(query);

        const cached = await this.searchCacheService.get(query);
        if (cached) {
            return cached;
        }

        const generation = this.searchCacheService.generation;
        const hotels = await this.hotelRepository.getAll();

        this.logger.debug(`Searching ${hotels.length} hotels around ${origin.toString()}`);

        const ranked = this.geoSearchService.search(hotels, query.latitude, query.longitude, query.radiusKm);
        const result = paginate(ranked, query, toSearchResultDto);

        await this.searchCacheService.set(query, result, generation);

        this.logger.debug(`Search returned ${result.items.length} of ${result.totalCount} hotels (page ${result.page}/${result.totalPages})`);
        return result;
    }
}

function toSearchResultDto(item: HotelSearchResultItem): HotelSearchResultDto {
    return {
        id: item.hotel.id,
        name: item.hotel.name,
        pricePerNight: item.hotel.pricePerNight,
        distanceKm: roundTo(item.distanceKm, 2)
    };
}

function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}
