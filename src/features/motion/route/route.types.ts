import type { Location } from "../geo/geo.types";

/**
 * One row of user motion.
 */
export type RouteSample = Readonly<{
    /** Seconds since route start (0 = first sample) */
    tSec: number;

    location: Location;
}>;

/**
 * Fixed-rate position series fed to the simulator. Built once, never mutated.
 */
export type TimedRoute = Readonly<{
    /** Sampling rate; null when read back from a single-row file */
    frequencyHz: number | null;

    /** Strictly increasing in tSec; spacing is 1/frequencyHz except the last step */
    samples: readonly RouteSample[];

    /** tSec of the last sample */
    durationSec: number;

    /** Great-circle length of the source path in meters */
    distanceM: number;
}>;

export type RouteParams = {
    frequencyHz: number;

    /** Required for endpoint tracks; GPX tracks carry their own timing */
    speedMps?: number;
};
