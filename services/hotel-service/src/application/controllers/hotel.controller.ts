import {
    Controller,
    Get,
    Post,
    Put,
    Delete,
    Body,
    Param,
    HttpCode,
    HttpStatus,
    HttpException,
    Logger,
    ParseUUIDPipe,
    ValidationPipe,
    UsePipes
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';
import { CreateHotelDto, UpdateHotelDto, HotelResponseDto } from '@hotel-search/shared';
import { HotelDomainService } from '../../domain/services/hotel.domain-service';
import { errorMessage, isClientError, toHttpException } from '../http/domain-error.mapper';

@ApiTags('Hotels')
@Controller('api/v1/hotels')
@UsePipes(new ValidationPipe({ transform: true }))
export class HotelController {
    private readonly logger = new Logger(HotelController.name);

    constructor(private readonly hotelDomainService: HotelDomainService) { }

    @Post()
    @ApiOperation({ summary: 'Create a new hotel' })
    @ApiResponse({ status: 201, description: 'Hotel created successfully', type: HotelResponseDto })
    @ApiResponse({ status: 400, description: 'Invalid input data' })
    async createHotel(@Body() createHotelDto: CreateHotelDto): Promise<HotelResponseDto> {
        try {
            this.logger.debug(`Creating hotel: ${createHotelDto.name}`);

            const hotel = await this.hotelDomainService.createHotel(
                createHotelDto.name,
                createHotelDto.pricePerNight,
                createHotelDto.latitude,
                createHotelDto.longitude
            );

            return HotelResponseDto.fromDomain(hotel);
        } catch (error) {
            throw this.handleError('creating hotel', error);
        }
    }

    @Get()
    @ApiOperation({ summary: 'List all hotels' })
    @ApiResponse({ status: 200, description: 'All hotels', type: [HotelResponseDto] })
    async getAllHotels(): Promise<HotelResponseDto[]> {
        try {
            const hotels = await this.hotelDomainService.getAllHotels();
            return hotels.map(hotel => HotelResponseDto.fromDomain(hotel));
        } catch (error) {
            throw this.handleError('listing hotels', error);
        }
    }

    @Get(':id')
    @ApiOperation({ summary: 'Get hotel by ID' })
    @ApiParam({ name: 'id', description: 'Hotel ID' })
    @ApiResponse({ status: 200, description: 'Hotel found', type: HotelResponseDto })
    @ApiResponse({ status: 404, description: 'Hotel not found' })
    async getHotelById(@Param('id', ParseUUIDPipe) id: string): Promise<HotelResponseDto> {
        try {
            const hotel = await this.hotelDomainService.getHotelById(id);
            if (!hotel) {
                throw new HttpException(`Hotel with id ${id} not found`, HttpStatus.NOT_FOUND);
            }
            return HotelResponseDto.fromDomain(hotel);
        } catch (error) {
            throw this.handleError('getting hotel', error);
        }
    }

    @Put(':id')
    @ApiOperation({ summary: 'Replace a hotel\'s name, price and location' })
    @ApiParam({ name: 'id', description: 'Hotel ID' })
    @ApiResponse({ status: 200, description: 'Hotel updated', type: HotelResponseDto })
    @ApiResponse({ status: 400, description: 'Invalid input data' })
    @ApiResponse({ status: 404, description: 'Hotel not found' })
    async updateHotel(
        @Param('id', ParseUUIDPipe) id: string,
        @Body() updateHotelDto: UpdateHotelDto
    ): Promise<HotelResponseDto> {
        try {
            const hotel = await this.hotelDomainService.updateHotel(
                id,
                updateHotelDto.name,
                updateHotelDto.pricePerNight,
                updateHotelDto.latitude,
                updateHotelDto.longitude
            );

            return HotelResponseDto.fromDomain(hotel);
        } catch (error) {
            throw this.handleError('updating hotel', error);
        }
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    @ApiOperation({ summary: 'Delete a hotel' })
    @ApiParam({ name: 'id', description: 'Hotel ID' })
    @ApiResponse({ status: 204, description: 'Hotel deleted' })
    @ApiResponse({ status: 404, description: 'Hotel not found' })
    async deleteHotel(@Param('id', ParseUUIDPipe) id: string): Promise<void> {
        try {
            await this.hotelDomainService.deleteHotel(id);
        } catch (error) {
            throw this.handleError('deleting hotel', error);
        }
    }

    private handleError(action: string, error: unknown): HttpException {
        if (isClientError(error)) {
            this.logger.warn(`Rejected ${action}: ${errorMessage(error)}`);
        } else {
            this.logger.error(`Error ${action}: ${errorMessage(error)}`);
        }
        return toHttpException(error);
    }
}
