/**
 * Geographic and scoring constants. Coordinate validation, distance math and
 * ranking all read from here.
 */

// Coordinate bounds
export const MIN_LATITUDE = -90;
export const MAX_LATITUDE = 90;
export const MIN_LONGITUDE = -180;
export const MAX_LONGITUDE = 180;

// Earth measurements
export const EARTH_RADIUS_KM = 6371; // mean radius
export const KM_PER_DEGREE_LAT = 111;
export const EARTH_CIRCUMFERENCE_KM = 40075;

// Search defaults
// Larger than the antipodal distance (pi * R): no hotel is out of reach
export const DEFAULT_SEARCH_RADIUS_KM = EARTH_CIRCUMFERENCE_KM / 2;
export const POLAR_COSINE_THRESHOLD = 1e-4;
export const POLAR_LONGITUDE_RANGE = 180;

// Ranking weights (sum to 1)
export const PRICE_WEIGHT = 0.5;
export const DISTANCE_WEIGHT = 0.5;

// Two coordinates closer than this (per component, degrees) are equal
export const COORDINATE_EQUALITY_TOLERANCE = 1e-7;
export const COORDINATE_QUANTIZATION_SCALE = 1e7;

export const LATITUDE_ERROR_MESSAGE = `Latitude must be between ${MIN_LATITUDE} and ${MAX_LATITUDE} degrees`;
export const LONGITUDE_ERROR_MESSAGE = `Longitude must be between ${MIN_LONGITUDE} and ${MAX_LONGITUDE} degrees`;

export function isValidLatitude(latitude: number): boolean {
    return Number.isFinite(latitude) && latitude >= MIN_LATITUDE && latitude <= MAX_LATITUDE;
}

export function isValidLongitude(longitude: number): boolean {
    return Number.isFinite(longitude) && longitude >= MIN_LONGITUDE && longitude <= MAX_LONGITUDE;
}

export function toRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
}

export function toDegrees(radians: number): number {
    return radians * (180 / Math.PI);
}
