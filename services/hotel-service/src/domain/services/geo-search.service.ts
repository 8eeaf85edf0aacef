import { Injectable } from '@nestjs/common';
import {
    Coordinate,
    Hotel,
    OutOfRangeError,
    DEFAULT_SEARCH_RADIUS_KM,
    DISTANCE_WEIGHT,
    EARTH_RADIUS_KM,
    KM_PER_DEGREE_LAT,
    MAX_LATITUDE,
    MAX_LONGITUDE,
    MIN_LONGITUDE,
    POLAR_COSINE_THRESHOLD,
    POLAR_LONGITUDE_RANGE,
    PRICE_WEIGHT,
    toDegrees,
    toRadians
} from '@hotel-search/shared';

export interface HotelSearchResultItem {
    hotel: Hotel;
    distanceKm: number;
}

export interface BoundingBox {
    minLat: number;
    maxLat: number;
    minLon: number;
    maxLon: number;
}

const FULL_CIRCLE_DEGREES = 360;

/**
 * Ranks hotels around a query point.
 *
 * 1. Bounding box pre-filter: cheap comparisons that drop hotels which cannot
 *    be within the radius. The box may admit extra hotels near its corners but
 *    never rejects one that is inside the radius.
 * 2. Haversine distance for the surviving candidates, dropping those beyond
 *    the radius.
 * 3. Min/max normalized price and distance combined into a weighted score,
 *    lowest first.
 *
 * Stateless: safe to call concurrently over a shared snapshot.
 */
@Injectable()
export class GeoSearchService {
    search(
        hotels: readonly Hotel[],
        latitude: number,
        longitude: number,
        radiusKm?: number
    ): HotelSearchResultItem[] {
        // fail before scanning anything
        const origin = new Coordinate(latitude, longitude);
        const effectiveRadius = this.resolveRadius(radiusKm);

        const box = this.calculateBoundingBox(latitude, longitude, effectiveRadius);

        const candidates: HotelSearchResultItem[] = [];
        for (const hotel of hotels) {
            if (!this.isInBoundingBox(hotel.location, box)) {
                continue;
            }
            const distanceKm = hotel.distanceTo(origin);
            if (distanceKm <= effectiveRadius) {
                candidates.push({ hotel, distanceKm });
            }
        }

        if (candidates.length <= 1) {
            return candidates;
        }

        return this.rankByPriceAndDistance(candidates);
    }

    calculateDistanceKm(
        originLatitude: number,
        originLongitude: number,
        destinationLatitude: number,
        destinationLongitude: number
    ): number {
        const origin = new Coordinate(originLatitude, originLongitude);
        return origin.distanceTo(new Coordinate(destinationLatitude, destinationLongitude));
    }

    /**
     * Lat/lon rectangle around a center. `minLon > maxLon` means the box
     * wraps across the antimeridian.
     */
    calculateBoundingBox(centerLat: number, centerLon: number, radiusKm: number): BoundingBox {
        // 1 degree of latitude is ~111.2 km, so r / 111 is never short
        const deltaLat = radiusKm / KM_PER_DEGREE_LAT;
        const minLat = centerLat - deltaLat;
        const maxLat = centerLat + deltaLat;

        const deltaLon = this.calculateLongitudeDelta(centerLat, radiusKm, deltaLat);
        if (deltaLon >= POLAR_LONGITUDE_RANGE) {
            return { minLat, maxLat, minLon: MIN_LONGITUDE, maxLon: MAX_LONGITUDE };
        }

        let minLon = centerLon - deltaLon;
        let maxLon = centerLon + deltaLon;
        if (minLon < MIN_LONGITUDE) {
            minLon += FULL_CIRCLE_DEGREES;
        }
        if (maxLon > MAX_LONGITUDE) {
            maxLon -= FULL_CIRCLE_DEGREES;
        }

        return { minLat, maxLat, minLon, maxLon };
    }

    isInBoundingBox(location: Coordinate, box: BoundingBox): boolean {
        const { latitude, longitude } = location;

        if (latitude < box.minLat || latitude > box.maxLat) {
            return false;
        }

        if (box.minLon <= box.maxLon) {
            return longitude >= box.minLon && longitude <= box.maxLon;
        }

        // wraps across ±180°: western part OR eastern part
        return longitude >= box.minLon || longitude <= box.maxLon;
    }

    private calculateLongitudeDelta(centerLat: number, radiusKm: number, deltaLat: number): number {
        const cosLat = Math.cos(toRadians(centerLat));

        // longitude is meaningless at the pole
        if (cosLat <= POLAR_COSINE_THRESHOLD) {
            return POLAR_LONGITUDE_RANGE;
        }

        // a band that reaches a pole touches every meridian
        if (Math.abs(centerLat) + deltaLat >= MAX_LATITUDE) {
            return POLAR_LONGITUDE_RANGE;
        }

        const flatDelta = radiusKm / (KM_PER_DEGREE_LAT * cosLat);

        // widest longitude reached by a spherical cap that stays off the poles
        const ratio = Math.sin(radiusKm / EARTH_RADIUS_KM) / cosLat;
        const sphericalDelta = ratio >= 1 ? POLAR_LONGITUDE_RANGE : toDegrees(Math.asin(ratio));

        return Math.max(flatDelta, sphericalDelta);
    }

    /** Absent means {@link DEFAULT_SEARCH_RADIUS_KM}; `Infinity` is unlimited. */
    resolveRadius(radiusKm: number | undefined): number {
        if (radiusKm === undefined) {
            return DEFAULT_SEARCH_RADIUS_KM;
        }
        if (Number.isNaN(radiusKm) || radiusKm < 0) {
            throw new OutOfRangeError('Search radius must be a non-negative number', 'radiusKm', radiusKm);
        }
        return radiusKm;
    }

    private rankByPriceAndDistance(items: HotelSearchResultItem[]): HotelSearchResultItem[] {
        let minPrice = Number.POSITIVE_INFINITY;
        let maxPrice = Number.NEGATIVE_INFINITY;
        let minDistance = Number.POSITIVE_INFINITY;
        let maxDistance = Number.NEGATIVE_INFINITY;

        for (const { hotel, distanceKm } of items) {
            minPrice = Math.min(minPrice, hotel.pricePerNight);
            maxPrice = Math.max(maxPrice, hotel.pricePerNight);
            minDistance = Math.min(minDistance, distanceKm);
            maxDistance = Math.max(maxDistance, distanceKm);
        }

        const priceRange = maxPrice - minPrice;
        const distanceRange = maxDistance - minDistance;

        const scored = items.map(item => {
            const normalizedPrice = priceRange > 0 ? (item.hotel.pricePerNight - minPrice) / priceRange : 0;
            const normalizedDistance = distanceRange > 0 ? (item.distanceKm - minDistance) / distanceRange : 0;
            return {
                item,
                score: normalizedPrice * PRICE_WEIGHT + normalizedDistance * DISTANCE_WEIGHT
            };
        });

        scored.sort((a, b) => a.score - b.score || compareIds(a.item.hotel.id, b.item.hotel.id));

        return scored.map(({ item }) => item);
    }
}

function compareIds(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
