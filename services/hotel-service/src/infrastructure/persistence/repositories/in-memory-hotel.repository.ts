import { Injectable, Logger } from '@nestjs/common';
import { ConflictError, Hotel, HotelRepository, NotFoundError } from '@hotel-search/shared';

/** Persistence shape of a hotel; frozen so stored rows are never mutated in place. */
interface HotelRecord {
    readonly id: string;
    readonly name: string;
    readonly pricePerNight: number;
    readonly latitude: number;
    readonly longitude: number;
    readonly createdAt: number;
    readonly updatedAt?: number;
}

/**
 * Process-wide hotel store. Each operation is a single synchronous `Map` step,
 * so it completes within one event-loop turn: concurrent callers cannot see a
 * half-written row, and writes to the same id are last-write-wins.
 *
 * Rows are stored as immutable records and hydrated into fresh entities on
 * read; changes reach the store only through `add`/`update`.
 */
@Injectable()
export class InMemoryHotelRepository implements HotelRepository {
    private readonly logger = new Logger(InMemoryHotelRepository.name);
    private readonly hotels = new Map<string, HotelRecord>();

    async getById(id: string): Promise<Hotel | null> {
        const record = this.hotels.get(id);
        return record ? this.toDomain(record) : null;
    }

    async getAll(): Promise<Hotel[]> {
        // Array.from copies the current rows before any later write lands
        return Array.from(this.hotels.values(), record => this.toDomain(record));
    }

    async add(hotel: Hotel): Promise<Hotel> {
        if (this.hotels.has(hotel.id)) {
            throw new ConflictError('Hotel', hotel.id);
        }
        this.hotels.set(hotel.id, this.toRecord(hotel));
        this.logger.debug(`Hotel added: ${hotel.id}`);
        return hotel;
    }

    async update(hotel: Hotel): Promise<Hotel> {
        if (!this.hotels.has(hotel.id)) {
            throw new NotFoundError('Hotel', hotel.id);
        }
        this.hotels.set(hotel.id, this.toRecord(hotel));
        this.logger.debug(`Hotel updated: ${hotel.id}`);
        return hotel;
    }

    async delete(id: string): Promise<boolean> {
        const removed = this.hotels.delete(id);
        if (removed) {
            this.logger.debug(`Hotel deleted: ${id}`);
        }
        return removed;
    }

    async exists(id: string): Promise<boolean> {
        return this.hotels.has(id);
    }

    async count(): Promise<number> {
        return this.hotels.size;
    }

    private toDomain(record: HotelRecord): Hotel {
        return Hotel.createWithIdentity(
            record.id,
            record.name,
            record.pricePerNight,
            record.latitude,
            record.longitude,
            new Date(record.createdAt),
            record.updatedAt === undefined ? undefined : new Date(record.updatedAt)
        );
    }

    private toRecord(hotel: Hotel): HotelRecord {
        return Object.freeze({
            id: hotel.id,
            name: hotel.name,
            pricePerNight: hotel.pricePerNight,
            latitude: hotel.location.latitude,
            longitude: hotel.location.longitude,
            createdAt: hotel.createdAt.getTime(),
            updatedAt: hotel.updatedAt?.getTime()
        });
    }
}
