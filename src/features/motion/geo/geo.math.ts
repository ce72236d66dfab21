// Spherical-earth geodesy for route generation.
// Keep this file pure (no fs, no logging).

import { LocationInputSchema, parseOrThrow, type LocationInput } from "../motion.schemas";
import type { Location } from "./geo.types";

/**
 * Mean earth radius in meters.
 */
export const EARTH_RADIUS_M = 6371000;

/**
 * Coordinates closer than this (degrees, per axis) count as the same point.
 */
export const SAME_POINT_EPSILON_DEG = 1e-9;

export function deg2rad(d: number) {
    return (d * Math.PI) / 180;
}

export function rad2deg(r: number) {
    return (r * 180) / Math.PI;
}

/**
 * Validate and freeze a location. Out-of-range or non-finite coordinates
 * throw InvalidParameter tagged with `field`.
 */
export function toLocation(input: LocationInput, field = "location"): Location {
    const { lat, lon, altitudeM } = parseOrThrow(LocationInputSchema, input, field);
    return Object.freeze({ lat, lon, altitudeM: altitudeM ?? 0 });
}

export function createLocation(lat: number, lon: number, altitudeM = 0): Location {
    return toLocation({ lat, lon, altitudeM });
}

export function isSamePoint(a: Location, b: Location): boolean {
    return (
        Math.abs(a.lat - b.lat) < SAME_POINT_EPSILON_DEG &&
        Math.abs(a.lon - b.lon) < SAME_POINT_EPSILON_DEG
    );
}

/**
 * Haversine great-circle distance in meters. Altitude is ignored.
 */
export function distanceM(a: Location, b: Location): number {
    if (isSamePoint(a, b)) return 0;

    const dLat = deg2rad(b.lat - a.lat);
    const dLon = deg2rad(b.lon - a.lon);

    const h =
        Math.sin(dLat / 2) ** 2 +
        Math.cos(deg2rad(a.lat)) *
        Math.cos(deg2rad(b.lat)) *
        Math.sin(dLon / 2) ** 2;

    return 2 * EARTH_RADIUS_M * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Initial bearing of the great circle from `a` toward `b`, in [0, 360).
 * 0° = North, 90° = East.
 *
 * The bearing between coincident points is undefined; this returns 0 for them.
 */
export function initialBearingDeg(a: Location, b: Location): number {
    if (isSamePoint(a, b)) return 0;

    const φ1 = deg2rad(a.lat);
    const φ2 = deg2rad(b.lat);
    const Δλ = deg2rad(b.lon - a.lon);

    const y = Math.sin(Δλ) * Math.cos(φ2);
    const x = Math.cos(φ1) * Math.sin(φ2) - Math.sin(φ1) * Math.cos(φ2) * Math.cos(Δλ);

    const θ = (rad2deg(Math.atan2(y, x)) + 360) % 360;
    // -0 and values that round up to exactly 360
    return θ >= 360 || Object.is(θ, -0) ? 0 : θ;
}

/**
 * Point reached after `distance` meters along the great circle that leaves
 * `origin` at `bearingDeg`. Altitude is carried over from `origin`.
 */
export function destination(origin: Location, bearingDeg: number, distance: number): Location {
    const δ = distance / EARTH_RADIUS_M;
    const θ = deg2rad(bearingDeg);
    const φ1 = deg2rad(origin.lat);
    const λ1 = deg2rad(origin.lon);

    const sinφ2 = Math.sin(φ1) * Math.cos(δ) + Math.cos(φ1) * Math.sin(δ) * Math.cos(θ);
    const φ2 = Math.asin(Math.min(1, Math.max(-1, sinφ2)));
    const λ2 =
        λ1 +
        Math.atan2(
            Math.sin(θ) * Math.sin(δ) * Math.cos(φ1),
            Math.cos(δ) - Math.sin(φ1) * sinφ2
        );

    return Object.freeze({
        lat: rad2deg(φ2),
        lon: normalizeLon(rad2deg(λ2)),
        altitudeM: origin.altitudeM,
    });
}

/**
 * Wrap a longitude into [-180, 180).
 */
export function normalizeLon(lon: number): number {
    if (lon >= -180 && lon < 180) return lon;
    return ((((lon + 180) % 360) + 360) % 360) - 180;
}

/**
 * Straight linear blend of two locations (fraction 0 → a, 1 → b).
 */
export function lerpLocation(a: Location, b: Location, fraction: number): Location {
    return Object.freeze({
        lat: a.lat + (b.lat - a.lat) * fraction,
        lon: a.lon + (b.lon - a.lon) * fraction,
        altitudeM: a.altitudeM + (b.altitudeM - a.altitudeM) * fraction,
    });
}

/**
 * Sum of great-circle legs along a polyline.
 */
export function pathLengthM(points: readonly Location[]): number {
    let total = 0;
    for (let i = 1; i < points.length; i++) {
        total += distanceM(points[i - 1], points[i]);
    }
    return total;
}
