import { Injectable, Logger, Inject } from '@nestjs/common';
import { Hotel, HOTEL_REPOSITORY, HotelRepository, NotFoundError } from '@hotel-search/shared';
import { SearchCacheService } from './search-cache.service';

@Injectable()
export class HotelDomainService {
    private readonly logger = new Logger(HotelDomainService.name);

    constructor(
        @Inject(HOTEL_REPOSITORY) private readonly hotelRepository: HotelRepository,
        private readonly searchCacheService: SearchCacheService
    ) { }

    async createHotel(name: string, pricePerNight: number, latitude: number, longitude: number): Promise<Hotel> {
        const hotel = Hotel.create(name, pricePerNight, latitude, longitude);

        const savedHotel = await this.hotelRepository.add(hotel);
        await this.searchCacheService.invalidateAll();

        this.logger.log(`Hotel created: ${savedHotel.id} (${savedHotel.name})`);
        return savedHotel;
    }

    async updateHotel(id: string, name: string, pricePerNight: number, latitude: number, longitude: number): Promise<Hotel> {
        const hotel = await this.hotelRepository.getById(id);
        if (!hotel) {
            throw new NotFoundError('Hotel', id);
        }

        hotel.update(name, pricePerNight, latitude, longitude);

        const savedHotel = await this.hotelRepository.update(hotel);
        await this.searchCacheService.invalidateAll();

        this.logger.log(`Hotel updated: ${savedHotel.id}`);
        return savedHotel;
    }

    async deleteHotel(id: string): Promise<void> {
        const removed = await this.hotelRepository.delete(id);
        if (!removed) {
            throw new NotFoundError('Hotel', id);
        }

        await this.searchCacheService.invalidateAll();
        this.logger.log(`Hotel deleted: ${id}`);
    }

    /** Resolves to `null` for an unknown id. */
    async getHotelById(id: string): Promise<Hotel | null> {
        return this.hotelRepository.getById(id);
    }

    async getAllHotels(): Promise<Hotel[]> {
        return this.hotelRepository.getAll();
    }

    async countHotels(): Promise<number> {
        return this.hotelRepository.count();
    }
}
