import { Hotel } from '../entities/hotel.entity';

export const HOTEL_REPOSITORY = Symbol('HOTEL_REPOSITORY');

/**
 * Keyed store of live hotels. Implementations must be safe to call
 * concurrently; `getAll` returns a point-in-time snapshot.
 */
export interface HotelRepository {
    /** Resolves to `null` when absent; never rejects for a missing id. */
    getById(id: string): Promise<Hotel | null>;
    getAll(): Promise<Hotel[]>;
    /** Rejects with `ConflictError` when the id is already stored. */
    add(hotel: Hotel): Promise<Hotel>;
    /** Rejects with `NotFoundError` when the id is not stored. */
    update(hotel: Hotel): Promise<Hotel>;
    /** Resolves to whether a hotel was actually removed. */
    delete(id: string): Promise<boolean>;
    exists(id: string): Promise<boolean>;
    count(): Promise<number>;
}
