import type { Location } from "../geo/geo.types";

export type ArcTrackPoint = { location: Location; arcM: number };
export type TimedTrackPoint = { location: Location; tSec: number };

/**
 * One raw point produced by a track source, before resampling.
 * Endpoint tracks address points by arc length, GPX tracks by time.
 */
export type RawTrackPoint = ArcTrackPoint | TimedTrackPoint;

/**
 * Straight great-circle track between two coordinates.
 */
export type EndpointTrack = {
    kind: "endpoint";
    start: Location;
    end: Location;

    /** Great-circle length in meters (0 when start and end coincide) */
    lengthM: number;

    /** Initial bearing from start toward end (0 for a zero-length track) */
    bearingDeg: number;

    /** [start @ 0, end @ lengthM]; the builder walks from the first to the last */
    points: ArcTrackPoint[];

    /** Position after `arcM` meters; returns `end` itself at `lengthM` */
    pointAtArc: (arcM: number) => Location;
};

/**
 * Recorded track parsed from a GPX file. Timestamps are the source of truth.
 */
export type GpxTrack = {
    kind: "gpx";

    /** Name of the first track, if the file has one */
    name: string | null;

    /** Number of `<trkseg>` / `<trk>` lines joined into this track */
    segmentCount: number;

    /** ISO timestamp of the first fix */
    startIso: string;

    /** Fixes in document order; tSec is seconds since the first fix */
    points: TimedTrackPoint[];
};

export type TrackSource = EndpointTrack | GpxTrack;
