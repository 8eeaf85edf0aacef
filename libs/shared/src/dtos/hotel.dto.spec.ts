import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { SearchHotelsQueryDto } from './hotel.dto';

function parseQuery(query: Record<string, string>): { dto: SearchHotelsQueryDto; messages: string[] } {
    const dto = plainToInstance(SearchHotelsQueryDto, query);
    const messages = validateSync(dto).flatMap(error => Object.values(error.constraints ?? {}));
    return { dto, messages };
}

describe('SearchHotelsQueryDto', () => {
    it('converts query strings to numbers and applies paging defaults', () => {
        const { dto, messages } = parseQuery({ latitude: '45.815', longitude: '15.982', radiusKm: '12.5' });

        expect(messages).toEqual([]);
        expect(dto.latitude).toBe(45.815);
        expect(dto.longitude).toBe(15.982);
        expect(dto.radiusKm).toBe(12.5);
        expect(dto.page).toBe(1);
        expect(dto.pageSize).toBe(10);
    });

    it('treats empty coordinates as missing rather than zero', () => {
        const { dto, messages } = parseQuery({ latitude: '', longitude: '  ' });

        expect(dto.latitude).toBeUndefined();
        expect(dto.longitude).toBeUndefined();
        expect(messages).toContain('Latitude is required');
        expect(messages).toContain('Longitude is required');
    });

    it('leaves an empty radius unset', () => {
        const { dto, messages } = parseQuery({ latitude: '0', longitude: '0', radiusKm: '' });

        expect(messages).toEqual([]);
        expect(dto.radiusKm).toBeUndefined();
    });

    it('rejects a coordinate that is not a number', () => {
        const { messages } = parseQuery({ latitude: 'north', longitude: '0' });

        expect(messages).toContain('Latitude must be a number');
    });
});
