import { Controller, Get, Query, Logger, ValidationPipe, UsePipes } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiQuery } from '@nestjs/swagger';
import { SearchHotelsQueryDto, HotelSearchResultDto, PagedResult } from '@hotel-search/shared';
import { HotelSearchDomainService } from '../../domain/services/hotel-search.domain-service';
import { errorMessage, isClientError, toHttpException } from '../http/domain-error.mapper';

@ApiTags('Search')
@Controller('api/v1/search')
@UsePipes(new ValidationPipe({ transform: true }))
export class SearchController {
    private readonly logger = new Logger(SearchController.name);

    constructor(private readonly hotelSearchDomainService: HotelSearchDomainService) { }

    @Get()
    @ApiOperation({ summary: 'Search hotels ranked by price and distance from a point' })
    @ApiQuery({ name: 'latitude', type: Number, example: 45.815 })
    @ApiQuery({ name: 'longitude', type: Number, example: 15.982 })
    @ApiQuery({ name: 'page', type: Number, required: false, example: 1 })
    @ApiQuery({ name: 'pageSize', type: Number, required: false, example: 10 })
    @ApiQuery({ name: 'radiusKm', type: Number, required: false })
    @ApiResponse({ status: 200, description: 'Ranked, paginated hotels' })
    @ApiResponse({ status: 400, description: 'Invalid coordinates or pagination' })
    async searchHotels(@Query() query: SearchHotelsQueryDto): Promise<PagedResult<HotelSearchResultDto>> {
        try {
            this.logger.debug(`Search request: ${JSON.stringify(query)}`);

            return await this.hotelSearchDomainService.searchHotels({
                latitude: query.latitude,
                longitude: query.longitude,
                page: query.page,
                pageSize: query.pageSize,
                radiusKm: query.radiusKm
            });
        } catch (error) {
            if (isClientError(error)) {
                this.logger.warn(`Rejected search: ${errorMessage(error)}`);
            } else {
                this.logger.error(`Error searching hotels: ${errorMessage(error)}`);
            }
            throw toHttpException(error);
        }
    }
}
