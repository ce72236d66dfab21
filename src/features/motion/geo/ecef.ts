import type { EcefPoint, Location } from "./geo.types";
import { deg2rad, rad2deg } from "./geo.math";

/** WGS84 semi-major axis (m) */
export const WGS84_EARTH_RADIUS_M = 6378137.0;

/** WGS84 first eccentricity */
export const WGS84_ECCENTRICITY = 0.0818191908426;

const ECCENTRICITY_SQ = WGS84_ECCENTRICITY ** 2;

/** Convergence threshold for the geodetic iteration (m) */
const CONVERGENCE_M = 1e-3;

/**
 * Geodetic (lat, lon, alt) → ECEF x/y/z in meters.
 */
export function geodeticToCartesian(lat: number, lon: number, altitudeM: number): EcefPoint {
    const φ = deg2rad(lat);
    const λ = deg2rad(lon);

    const sinφ = Math.sin(φ);
    const cosφ = Math.cos(φ);
    const n = WGS84_EARTH_RADIUS_M / Math.sqrt(1 - (WGS84_ECCENTRICITY * sinφ) ** 2);

    return {
        x: (n + altitudeM) * cosφ * Math.cos(λ),
        y: (n + altitudeM) * cosφ * Math.sin(λ),
        z: ((1 - ECCENTRICITY_SQ) * n + altitudeM) * sinφ,
    };
}

/**
 * ECEF → geodetic, by fixed-point iteration on the z correction.
 * A vector too short to have a direction maps to (0, 0, -a).
 */
export function cartesianToGeodetic(x: number, y: number, z: number): Location {
    const norm = Math.sqrt(x * x + y * y + z * z);
    if (norm < CONVERGENCE_M) {
        return Object.freeze({ lat: 0, lon: 0, altitudeM: -WGS84_EARTH_RADIUS_M });
    }

    const rhoSq = x * x + y * y;
    let dz = ECCENTRICITY_SQ * z;
    let zdz: number;
    let nh: number;
    let n: number;

    for (;;) {
        zdz = z + dz;
        nh = Math.sqrt(rhoSq + zdz * zdz);
        const sinφ = zdz / nh;
        n = WGS84_EARTH_RADIUS_M / Math.sqrt(1 - ECCENTRICITY_SQ * sinφ * sinφ);
        const dzNext = n * ECCENTRICITY_SQ * sinφ;

        if (Math.abs(dz - dzNext) < CONVERGENCE_M) break;
        dz = dzNext;
    }

    return Object.freeze({
        lat: rad2deg(Math.atan2(zdz, Math.sqrt(rhoSq))),
        lon: rad2deg(Math.atan2(y, x)),
        altitudeM: nh - n,
    });
}

export function locationToEcef(location: Location): EcefPoint {
    return geodeticToCartesian(location.lat, location.lon, location.altitudeM);
}
