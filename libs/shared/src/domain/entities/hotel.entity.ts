import { v4 as uuidv4 } from 'uuid';
import { Coordinate, CoordinateObject } from '../value-objects/coordinate.vo';
import { InvalidArgumentError, InvalidValueError, OutOfRangeError } from '../errors/domain.errors';

export interface HotelProperties {
    id: string;
    name: string;
    pricePerNight: number;
    location: Coordinate;
    createdAt: Date;
    updatedAt?: Date;
}

export interface HotelSnapshot {
    id: string;
    name: string;
    pricePerNight: number;
    location: CoordinateObject;
    createdAt: Date;
    updatedAt?: Date;
}

export class Hotel {
    static readonly MAX_NAME_LENGTH = 200;
    static readonly MIN_PRICE = 0.01;
    static readonly MAX_PRICE = 100_000_000;

    private readonly _id: string;
    private _name: string;
    private _pricePerNight: number;
    private _location: Coordinate;
    private readonly _createdAt: Date;
    private _updatedAt?: Date;

    private constructor(properties: HotelProperties) {
        this._id = properties.id;
        this._name = properties.name;
        this._pricePerNight = properties.pricePerNight;
        this._location = properties.location;
        this._createdAt = properties.createdAt;
        this._updatedAt = properties.updatedAt;
    }

    static create(name: string | null | undefined, pricePerNight: number, latitude: number, longitude: number): Hotel {
        const validName = Hotel.validateName(name);
        Hotel.validatePrice(pricePerNight);
        const location = new Coordinate(latitude, longitude);

        return new Hotel({
            id: uuidv4(),
            name: validName,
            pricePerNight,
            location,
            createdAt: new Date()
        });
    }

    /** Rebuilds a hotel whose identity and timestamps come from a store. */
    static createWithIdentity(
        id: string,
        name: string | null | undefined,
        pricePerNight: number,
        latitude: number,
        longitude: number,
        createdAt: Date,
        updatedAt?: Date
    ): Hotel {
        if (!id || id.trim().length === 0) {
            throw new InvalidArgumentError('Hotel id is required', 'id');
        }
        const validName = Hotel.validateName(name);
        Hotel.validatePrice(pricePerNight);
        const location = new Coordinate(latitude, longitude);

        return new Hotel({
            id,
            name: validName,
            pricePerNight,
            location,
            createdAt,
            updatedAt
        });
    }

    get id(): string {
        return this._id;
    }

    get name(): string {
        return this._name;
    }

    get pricePerNight(): number {
        return this._pricePerNight;
    }

    get location(): Coordinate {
        return this._location;
    }

    get createdAt(): Date {
        return this._createdAt;
    }

    get updatedAt(): Date | undefined {
        return this._updatedAt;
    }

    update(name: string | null | undefined, pricePerNight: number, latitude: number, longitude: number): void {
        // validate everything before touching state
        const validName = Hotel.validateName(name);
        Hotel.validatePrice(pricePerNight);
        const location = new Coordinate(latitude, longitude);

        this._name = validName;
        this._pricePerNight = pricePerNight;
        this._location = location;
        this._updatedAt = new Date();
    }

    distanceTo(coordinate: Coordinate): number {
        return this._location.distanceTo(coordinate);
    }

    toObject(): HotelSnapshot {
        return {
            id: this._id,
            name: this._name,
            pricePerNight: this._pricePerNight,
            location: this._location.toObject(),
            createdAt: this._createdAt,
            updatedAt: this._updatedAt
        };
    }

    private static validateName(name: string | null | undefined): string {
        const trimmed = typeof name === 'string' ? name.trim() : '';
        if (trimmed.length === 0) {
            throw new InvalidArgumentError('Hotel name cannot be empty', 'name');
        }
        if (trimmed.length > Hotel.MAX_NAME_LENGTH) {
            throw new InvalidArgumentError(`Hotel name cannot exceed ${Hotel.MAX_NAME_LENGTH} characters`, 'name');
        }
        return trimmed;
    }

    private static validatePrice(pricePerNight: number): void {
        if (!Number.isFinite(pricePerNight)) {
            throw new InvalidValueError('pricePerNight', pricePerNight);
        }
        if (pricePerNight < Hotel.MIN_PRICE) {
            throw new OutOfRangeError(`Price per night must be at least ${Hotel.MIN_PRICE}`, 'pricePerNight', pricePerNight);
        }
        if (pricePerNight > Hotel.MAX_PRICE) {
            throw new OutOfRangeError(`Price per night cannot exceed ${Hotel.MAX_PRICE}`, 'pricePerNight', pricePerNight);
        }
    }
}
