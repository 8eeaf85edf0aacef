import { IsString, IsNumber, IsInt, IsOptional, IsDefined, IsNotEmpty, MaxLength, Min, Max } from 'class-validator';
import { Transform, TransformFnParams } from 'class-transformer';
import {
    MIN_LATITUDE,
    MAX_LATITUDE,
    MIN_LONGITUDE,
    MAX_LONGITUDE,
    LATITUDE_ERROR_MESSAGE,
    LONGITUDE_ERROR_MESSAGE
} from '../domain/common/geo.constants';
import { Hotel } from '../domain/entities/hotel.entity';
import { DEFAULT_PAGE, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../common/pagination';

const FINITE_NUMBER = { allowNaN: false, allowInfinity: false };

// An empty query parameter (`?latitude=`) is absent, not zero.
function toOptionalNumber({ value }: TransformFnParams): unknown {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value === 'string') {
        return value.trim() === '' ? undefined : Number(value);
    }
    return value;
}

export class CreateHotelDto {
    @IsString({ message: 'Name must be a string' })
    @IsNotEmpty({ message: 'Hotel name is required' })
    @MaxLength(Hotel.MAX_NAME_LENGTH, { message: `Hotel name cannot exceed ${Hotel.MAX_NAME_LENGTH} characters` })
    name!: string;

    @IsNumber(FINITE_NUMBER, { message: 'Price per night must be a number' })
    @Min(Hotel.MIN_PRICE, { message: `Price per night must be at least ${Hotel.MIN_PRICE}` })
    @Max(Hotel.MAX_PRICE, { message: `Price per night cannot exceed ${Hotel.MAX_PRICE}` })
    pricePerNight!: number;

    @IsNumber(FINITE_NUMBER, { message: 'Latitude must be a number' })
    @Min(MIN_LATITUDE, { message: LATITUDE_ERROR_MESSAGE })
    @Max(MAX_LATITUDE, { message: LATITUDE_ERROR_MESSAGE })
    latitude!: number;

    @IsNumber(FINITE_NUMBER, { message: 'Longitude must be a number' })
    @Min(MIN_LONGITUDE, { message: LONGITUDE_ERROR_MESSAGE })
    @Max(MAX_LONGITUDE, { message: LONGITUDE_ERROR_MESSAGE })
    longitude!: number;
}

// An update replaces every mutable field, so it carries the same shape.
export class UpdateHotelDto extends CreateHotelDto { }

export class SearchHotelsQueryDto {
    @IsDefined({ message: 'Latitude is required' })
    @Transform(toOptionalNumber)
    @IsNumber(FINITE_NUMBER, { message: 'Latitude must be a number' })
    @Min(MIN_LATITUDE, { message: LATITUDE_ERROR_MESSAGE })
    @Max(MAX_LATITUDE, { message: LATITUDE_ERROR_MESSAGE })
    latitude!: number;

    @IsDefined({ message: 'Longitude is required' })
    @Transform(toOptionalNumber)
    @IsNumber(FINITE_NUMBER, { message: 'Longitude must be a number' })
    @Min(MIN_LONGITUDE, { message: LONGITUDE_ERROR_MESSAGE })
    @Max(MAX_LONGITUDE, { message: LONGITUDE_ERROR_MESSAGE })
    longitude!: number;

    @IsOptional()
    @Transform(toOptionalNumber)
    @IsInt({ message: 'Page must be an integer' })
    @Min(1, { message: 'Page must be greater than 0' })
    page?: number = DEFAULT_PAGE;

    @IsOptional()
    @Transform(toOptionalNumber)
    @IsInt({ message: 'Page size must be an integer' })
    @Min(1, { message: `Page size must be between 1 and ${MAX_PAGE_SIZE}` })
    @Max(MAX_PAGE_SIZE, { message: `Page size must be between 1 and ${MAX_PAGE_SIZE}` })
    pageSize?: number = DEFAULT_PAGE_SIZE;

    @IsOptional()
    @Transform(toOptionalNumber)
    @IsNumber(FINITE_NUMBER, { message: 'Radius must be a number' })
    @Min(0, { message: 'Radius cannot be negative' })
    radiusKm?: number;
}

export class HotelResponseDto {
    id!: string;
    name!: string;
    pricePerNight!: number;
    latitude!: number;
    longitude!: number;
    createdAt!: string;
    updatedAt!: string | null;

    static fromDomain(hotel: Hotel): HotelResponseDto {
        const dto = new HotelResponseDto();
        dto.id = hotel.id;
        dto.name = hotel.name;
        dto.pricePerNight = hotel.pricePerNight;
        dto.latitude = hotel.location.latitude;
        dto.longitude = hotel.location.longitude;
        dto.createdAt = hotel.createdAt.toISOString();
        dto.updatedAt = hotel.updatedAt ? hotel.updatedAt.toISOString() : null;
        return dto;
    }
}

export class HotelSearchResultDto {
    id!: string;
    name!: string;
    pricePerNight!: number;
    distanceKm!: number;
}
