import { IsNumber, Min, Max, validateSync, ValidationError } from 'class-validator';
import {
    MIN_LATITUDE,
    MAX_LATITUDE,
    MIN_LONGITUDE,
    MAX_LONGITUDE,
    EARTH_RADIUS_KM,
    COORDINATE_EQUALITY_TOLERANCE,
    COORDINATE_QUANTIZATION_SCALE,
    LATITUDE_ERROR_MESSAGE,
    LONGITUDE_ERROR_MESSAGE,
    toRadians
} from '../common/geo.constants';
import { InvalidValueError, NullArgumentError, OutOfRangeError } from '../errors/domain.errors';

export interface CoordinateObject {
    latitude: number;
    longitude: number;
}

const FINITE_NUMBER = { allowNaN: false, allowInfinity: false };

/**
 * Immutable latitude/longitude pair in degrees.
 *
 * Equality is tolerant to {@link COORDINATE_EQUALITY_TOLERANCE}; `hashCode`
 * quantizes to the same step so equal coordinates hash alike.
 */
export class Coordinate {
    @IsNumber(FINITE_NUMBER, { message: 'Latitude must be a finite number' })
    @Min(MIN_LATITUDE, { message: LATITUDE_ERROR_MESSAGE })
    @Max(MAX_LATITUDE, { message: LATITUDE_ERROR_MESSAGE })
    private readonly _latitude: number;

    @IsNumber(FINITE_NUMBER, { message: 'Longitude must be a finite number' })
    @Min(MIN_LONGITUDE, { message: LONGITUDE_ERROR_MESSAGE })
    @Max(MAX_LONGITUDE, { message: LONGITUDE_ERROR_MESSAGE })
    private readonly _longitude: number;

    constructor(latitude: number, longitude: number) {
        this._latitude = latitude;
        this._longitude = longitude;

        const errors = validateSync(this);
        if (errors.length > 0) {
            throw Coordinate.toDomainError(errors, latitude, longitude);
        }
    }

    static create(latitude: number, longitude: number): Coordinate {
        return new Coordinate(latitude, longitude);
    }

    get latitude(): number {
        return this._latitude;
    }

    get longitude(): number {
        return this._longitude;
    }

    /** Great-circle (Haversine) distance in kilometres. */
    distanceTo(other: Coordinate | null | undefined): number {
        if (!other) {
            throw new NullArgumentError('other');
        }
        if (other === this) {
            return 0;
        }

        const originLatRad = toRadians(this._latitude);
        const destinationLatRad = toRadians(other._latitude);
        const sinDeltaLatHalf = Math.sin(toRadians(other._latitude - this._latitude) / 2);
        const sinDeltaLonHalf = Math.sin(toRadians(other._longitude - this._longitude) / 2);

        let a = sinDeltaLatHalf * sinDeltaLatHalf +
            Math.cos(originLatRad) * Math.cos(destinationLatRad) *
            sinDeltaLonHalf * sinDeltaLonHalf;

        // rounding can push a just outside [0, 1], which makes sqrt(1 - a) NaN
        a = Math.min(1, Math.max(0, a));

        const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
        return EARTH_RADIUS_KM * c;
    }

    equals(other: Coordinate | null | undefined): boolean {
        if (!other) {
            return false;
        }
        if (other === this) {
            return true;
        }
        return Math.abs(this._latitude - other._latitude) <= COORDINATE_EQUALITY_TOLERANCE &&
            Math.abs(this._longitude - other._longitude) <= COORDINATE_EQUALITY_TOLERANCE;
    }

    hashCode(): number {
        const latQuant = Math.round(this._latitude * COORDINATE_QUANTIZATION_SCALE);
        const lonQuant = Math.round(this._longitude * COORDINATE_QUANTIZATION_SCALE);

        let hash = 17;
        hash = (Math.imul(hash, 31) + latQuant) | 0;
        hash = (Math.imul(hash, 31) + lonQuant) | 0;
        return hash;
    }

    toString(): string {
        return `(${this._latitude.toFixed(7)}, ${this._longitude.toFixed(7)})`;
    }

    toObject(): CoordinateObject {
        return {
            latitude: this._latitude,
            longitude: this._longitude
        };
    }

    static fromObject(obj: CoordinateObject): Coordinate {
        return new Coordinate(obj.latitude, obj.longitude);
    }

    private static toDomainError(errors: ValidationError[], latitude: number, longitude: number): Error {
        // latitude is reported before longitude
        const ordered = [...errors].sort((a, b) => a.property.localeCompare(b.property));
        const first = ordered[0];
        const isLatitude = first.property === '_latitude';
        const argument = isLatitude ? 'latitude' : 'longitude';
        const value = isLatitude ? latitude : longitude;
        const constraints = first.constraints ?? {};

        if ('isNumber' in constraints) {
            return new InvalidValueError(argument, value);
        }

        const message = Object.values(constraints)[0] ?? (isLatitude ? LATITUDE_ERROR_MESSAGE : LONGITUDE_ERROR_MESSAGE);
        return new OutOfRangeError(`${message} (got ${value})`, argument, value);
    }
}
