/**
 * A point on the globe. Values are frozen once created.
 */
export type Location = Readonly<{
    /** Latitude in decimal degrees (-90..90) */
    lat: number;

    /** Longitude in decimal degrees (-180..180) */
    lon: number;

    /** Altitude in meters, 0 when the source has none */
    altitudeM: number;
}>;

/**
 * Earth-centered, earth-fixed cartesian coordinate (WGS84, meters).
 */
export type EcefPoint = Readonly<{
    x: number;
    y: number;
    z: number;
}>;
