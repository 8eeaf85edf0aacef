import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';

const UNKNOWN_ID = '3f1c2a4e-8b7d-4c6e-9a1f-2b3c4d5e6f70';

describe('Hotels API (e2e)', () => {
    let app: INestApplication;

    beforeEach(async () => {
        const moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();
        app = moduleRef.createNestApplication();
        await app.init();
    });

    afterEach(async () => {
        await app.close();
    });

    async function createHotel(body: Record<string, unknown>): Promise<string> {
        const res = await request(app.getHttpServer()).post('/api/v1/hotels').send(body).expect(201);
        return res.body.id;
    }

    it('creates a hotel and reads it back', async () => {
        const res = await request(app.getHttpServer())
            .post('/api/v1/hotels')
            .send({ name: '  Riverside Lodge ', pricePerNight: 120.5, latitude: 45.8, longitude: 15.97 })
            .expect(201);

        expect(res.body).toMatchObject({
            name: 'Riverside Lodge',
            pricePerNight: 120.5,
            latitude: 45.8,
            longitude: 15.97,
            updatedAt: null
        });
        expect(res.body.id).toMatch(/^[0-9a-f-]{36}$/);

        const read = await request(app.getHttpServer()).get(`/api/v1/hotels/${res.body.id}`).expect(200);
        expect(read.body).toEqual(res.body);
    });

    it('lists every hotel', async () => {
        await createHotel({ name: 'First', pricePerNight: 50, latitude: 0, longitude: 0 });
        await createHotel({ name: 'Second', pricePerNight: 60, latitude: 1, longitude: 1 });

        const res = await request(app.getHttpServer()).get('/api/v1/hotels').expect(200);

        expect(res.body.map((hotel: { name: string }) => hotel.name).sort()).toEqual(['First', 'Second']);
    });

    it('rejects an out-of-range latitude in the body', async () => {
        const res = await request(app.getHttpServer())
            .post('/api/v1/hotels')
            .send({ name: 'Nowhere', pricePerNight: 50, latitude: 91, longitude: 0 })
            .expect(400);

        expect(res.body.message).toContain('Latitude must be between -90 and 90 degrees');
    });

    it('maps a blank name to a domain validation error', async () => {
        const res = await request(app.getHttpServer())
            .post('/api/v1/hotels')
            .send({ name: '   ', pricePerNight: 50, latitude: 0, longitude: 0 })
            .expect(400);

        expect(res.body).toEqual({ statusCode: 400, error: 'INVALID_ARGUMENT', message: 'Hotel name cannot be empty' });
    });

    it('returns 404 for an unknown hotel', async () => {
        const res = await request(app.getHttpServer()).get(`/api/v1/hotels/${UNKNOWN_ID}`).expect(404);

        expect(res.body.message).toBe(`Hotel with id ${UNKNOWN_ID} not found`);
    });

    it('returns 400 for an id that is not a uuid', async () => {
        await request(app.getHttpServer()).get('/api/v1/hotels/not-a-uuid').expect(400);
    });

    it('updates a hotel', async () => {
        const id = await createHotel({ name: 'Before', pricePerNight: 50, latitude: 0, longitude: 0 });

        const res = await request(app.getHttpServer())
            .put(`/api/v1/hotels/${id}`)
            .send({ name: 'After', pricePerNight: 75, latitude: 10, longitude: -10 })
            .expect(200);

        expect(res.body).toMatchObject({ id, name: 'After', pricePerNight: 75, latitude: 10, longitude: -10 });
        expect(typeof res.body.updatedAt).toBe('string');
    });

    it('returns 404 when updating an unknown hotel', async () => {
        const res = await request(app.getHttpServer())
            .put(`/api/v1/hotels/${UNKNOWN_ID}`)
            .send({ name: 'Nobody', pricePerNight: 75, latitude: 10, longitude: -10 })
            .expect(404);

        expect(res.body).toEqual({
            statusCode: 404,
            error: 'NOT_FOUND',
            message: `Hotel with id ${UNKNOWN_ID} not found`
        });
    });

    it('deletes a hotel once', async () => {
        const id = await createHotel({ name: 'Temporary', pricePerNight: 50, latitude: 0, longitude: 0 });

        await request(app.getHttpServer()).delete(`/api/v1/hotels/${id}`).expect(204);
        await request(app.getHttpServer()).delete(`/api/v1/hotels/${id}`).expect(404);
        await request(app.getHttpServer()).get(`/api/v1/hotels/${id}`).expect(404);
    });

    it('reports health with the hotel count', async () => {
        await createHotel({ name: 'Counted', pricePerNight: 50, latitude: 0, longitude: 0 });

        const res = await request(app.getHttpServer()).get('/health').expect(200);

        expect(res.body).toMatchObject({ status: 'ok', service: 'hotel-service', hotelCount: 1 });
    });
});
