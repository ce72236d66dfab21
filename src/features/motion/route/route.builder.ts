import { lerpLocation, pathLengthM } from "../geo/geo.math";
import type { Location } from "../geo/geo.types";
import { MotionError, invalidParameter, malformedTrack } from "../motion.errors";
import { FrequencySchema, SpeedSchema, parseOrThrow, type LocationInput } from "../motion.schemas";
import { createEndpointTrack } from "../track/endpoint.track";
import { loadGpxTrack, parseGpxTrack } from "../track/gpx.track";
import type { EndpointTrack, GpxTrack, TrackSource } from "../track/track.types";
import type { RouteParams, RouteSample, TimedRoute } from "./route.types";

// ---- Public API ----

export function buildTimedRoute(source: TrackSource, params: RouteParams): TimedRoute {
    const frequencyHz = parseOrThrow(FrequencySchema, params.frequencyHz, "frequencyHz");

    switch (source.kind) {
        case "endpoint": {
            if (params.speedMps === undefined) {
                throw invalidParameter("speedMps", "required for routes between two coordinates");
            }
            const speedMps = parseOrThrow(SpeedSchema, params.speedMps, "speedMps");
            return resampleEndpointTrack(source, speedMps, frequencyHz);
        }
        case "gpx":
            return resampleGpxTrack(source, frequencyHz);
    }
}

export function buildRouteFromEndpoints(
    start: LocationInput,
    end: LocationInput,
    speedMps: number,
    frequencyHz: number
): TimedRoute {
    return buildTimedRoute(createEndpointTrack(start, end), { speedMps, frequencyHz });
}

export async function buildRouteFromGpx(path: string, frequencyHz: number): Promise<TimedRoute> {
    // fail before touching the file
    parseOrThrow(FrequencySchema, frequencyHz, "frequencyHz");
    const track = await loadGpxTrack(path);
    return buildTimedRoute(track, { frequencyHz });
}

export function buildRouteFromGpxContent(xml: string, frequencyHz: number): TimedRoute {
    parseOrThrow(FrequencySchema, frequencyHz, "frequencyHz");
    return buildTimedRoute(parseGpxTrack(xml), { frequencyHz });
}

// ---- Resampling ----

/**
 * Walk the great circle at constant speed:
 * sample k sits at k/f seconds and k·(speed/f) meters; the last sample is
 * the track's last point at length/speed seconds. The final interval is
 * never longer than 1/f, however short it gets.
 */
function resampleEndpointTrack(track: EndpointTrack, speedMps: number, frequencyHz: number): TimedRoute {
    const first = track.points[0];
    const last = track.points[track.points.length - 1];
    const lengthM = last.arcM - first.arcM;
    const samples: RouteSample[] = [sampleAt(0, first.location)];

    // zero-length: one sample, no division by the length
    if (lengthM === 0) {
        return freezeRoute(frequencyHz, samples, 0);
    }

    const durationSec = lengthM / speedMps;
    const stepM = speedMps / frequencyHz;

    for (let k = 1; k / frequencyHz < durationSec; k++) {
        const arcM = Math.min(first.arcM + k * stepM, last.arcM);
        samples.push(sampleAt(k / frequencyHz, track.pointAtArc(arcM)));
    }
    samples.push(sampleAt(durationSec, last.location));

    return freezeRoute(frequencyHz, samples, lengthM);
}

/**
 * Piecewise-linear resampling of a recorded track onto a 1/f grid,
 * from the first fix to the last. Never reaches past the last fix, and
 * the final interval is at most 1/f.
 */
function resampleGpxTrack(track: GpxTrack, frequencyHz: number): TimedRoute {
    const points = track.points;
    if (points.length < 2) {
        throw new MotionError(
            "InsufficientData",
            `GPX track needs at least 2 points, found ${points.length}`
        );
    }
    for (let i = 1; i < points.length; i++) {
        if (!(points[i].tSec > points[i - 1].tSec)) {
            throw malformedTrack(`timestamps must be strictly increasing at point ${i + 1}`);
        }
    }

    const t0 = points[0].tSec;
    const last = points[points.length - 1];
    const durationSec = last.tSec - t0;

    const samples: RouteSample[] = [sampleAt(0, points[0].location)];
    let cursor = 0;

    for (let k = 1; k / frequencyHz < durationSec; k++) {
        const tSec = k / frequencyHz;
        const target = t0 + tSec;

        // advance to the bracket [cursor, cursor + 1] containing target;
        // the last bracket also takes a target that rounds onto the last fix
        while (cursor + 2 < points.length && points[cursor + 1].tSec <= target) cursor++;

        const a = points[cursor];
        const b = points[cursor + 1];
        const fraction = Math.min(1, (target - a.tSec) / (b.tSec - a.tSec));
        samples.push(sampleAt(tSec, fraction === 0 ? a.location : lerpLocation(a.location, b.location, fraction)));
    }
    samples.push(sampleAt(durationSec, last.location));

    return freezeRoute(
        frequencyHz,
        samples,
        pathLengthM(points.map((p) => p.location))
    );
}

function sampleAt(tSec: number, location: Location): RouteSample {
    return Object.freeze({ tSec, location });
}

function freezeRoute(frequencyHz: number, samples: RouteSample[], distanceM: number): TimedRoute {
    return Object.freeze({
        frequencyHz,
        samples: Object.freeze(samples),
        durationSec: samples[samples.length - 1].tSec,
        distanceM,
    });
}
