import { ConflictError, Hotel, NotFoundError } from '@hotel-search/shared';
import { InMemoryHotelRepository } from './in-memory-hotel.repository';

describe('InMemoryHotelRepository', () => {
    let repository: InMemoryHotelRepository;

    beforeEach(() => {
        repository = new InMemoryHotelRepository();
    });

    it('stores and reads back a hotel', async () => {
        const hotel = Hotel.create('Harbour View', 95, 43.508, 16.44);

        await repository.add(hotel);
        const found = await repository.getById(hotel.id);

        expect(found).not.toBeNull();
        expect(found?.toObject()).toEqual(hotel.toObject());
    });

    it('resolves to null for an unknown id', async () => {
        await expect(repository.getById('missing')).resolves.toBeNull();
    });

    it('rejects a second add with the same id', async () => {
        const hotel = Hotel.create('Twice', 95, 0, 0);
        await repository.add(hotel);

        await expect(repository.add(hotel)).rejects.toThrow(ConflictError);
        await expect(repository.count()).resolves.toBe(1);
    });

    it('rejects an update of an unknown hotel', async () => {
        const hotel = Hotel.create('Ghost', 95, 0, 0);

        await expect(repository.update(hotel)).rejects.toThrow(NotFoundError);
        await expect(repository.exists(hotel.id)).resolves.toBe(false);
    });

    it('deletes idempotently', async () => {
        const hotel = Hotel.create('Short Stay', 40, 0, 0);
        await repository.add(hotel);

        await expect(repository.delete(hotel.id)).resolves.toBe(true);
        await expect(repository.delete(hotel.id)).resolves.toBe(false);
        await expect(repository.getById(hotel.id)).resolves.toBeNull();
    });

    it('keeps every hotel from concurrent adds', async () => {
        const hotels = Array.from({ length: 50 }, (_, index) => Hotel.create(`Hotel ${index}`, 10 + index, 0, index));

        await Promise.all(hotels.map(hotel => repository.add(hotel)));

        await expect(repository.count()).resolves.toBe(50);
        const storedIds = (await repository.getAll()).map(hotel => hotel.id).sort();
        expect(storedIds).toEqual(hotels.map(hotel => hotel.id).sort());
    });

    it('lets exactly one of two concurrent adds of the same id win', async () => {
        const hotel = Hotel.create('Contested', 70, 0, 0);

        const results = await Promise.allSettled([repository.add(hotel), repository.add(hotel)]);

        expect(results.map(result => result.status).sort()).toEqual(['fulfilled', 'rejected']);
        await expect(repository.count()).resolves.toBe(1);
    });

    it('hands out copies that do not change the store until updated', async () => {
        const hotel = Hotel.create('Original', 100, 10, 10);
        await repository.add(hotel);

        const copy = await repository.getById(hotel.id);
        copy?.update('Edited', 120, 11, 11);
        hotel.update('Also Edited', 130, 12, 12);

        const stored = await repository.getById(hotel.id);
        expect(stored?.name).toBe('Original');
        expect(stored?.pricePerNight).toBe(100);

        if (copy) {
            await repository.update(copy);
        }
        const updated = await repository.getById(hotel.id);
        expect(updated?.name).toBe('Edited');
        expect(updated?.location.toObject()).toEqual({ latitude: 11, longitude: 11 });
        expect(updated?.updatedAt).toBeInstanceOf(Date);
    });

    it('returns a snapshot from getAll that later writes do not touch', async () => {
        await repository.add(Hotel.create('Before', 100, 0, 0));

        const snapshot = await repository.getAll();
        await repository.add(Hotel.create('After', 100, 0, 0));

        expect(snapshot.map(hotel => hotel.name)).toEqual(['Before']);
        await expect(repository.count()).resolves.toBe(2);
    });
});
