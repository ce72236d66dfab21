import { destination, distanceM, initialBearingDeg, toLocation } from "../geo/geo.math";
import type { Location } from "../geo/geo.types";
import type { LocationInput } from "../motion.schemas";
import { invalidParameter } from "../motion.errors";
import type { EndpointTrack } from "./track.types";

/**
 * Great-circle track from `start` to `end`.
 *
 * Altitude is blended linearly along the arc. `pointAtArc(lengthM)` returns
 * the validated `end` object itself, not a re-projected point.
 */
export function createEndpointTrack(startInput: LocationInput, endInput: LocationInput): EndpointTrack {
    const start = toLocation(startInput, "start");
    const end = toLocation(endInput, "end");

    const lengthM = distanceM(start, end);
    const bearingDeg = initialBearingDeg(start, end);

    const pointAtArc = (arcM: number): Location => {
        if (!Number.isFinite(arcM) || arcM < 0 || arcM > lengthM) {
            throw invalidParameter("arcM", `must be within [0, ${lengthM}], got ${arcM}`);
        }
        if (arcM === lengthM) return end;
        if (arcM === 0) return start;

        const p = destination(start, bearingDeg, arcM);
        const fraction = arcM / lengthM;
        return Object.freeze({
            lat: p.lat,
            lon: p.lon,
            altitudeM: start.altitudeM + (end.altitudeM - start.altitudeM) * fraction,
        });
    };

    return {
        kind: "endpoint",
        start,
        end,
        lengthM,
        bearingDeg,
        points: [
            { location: start, arcM: 0 },
            { location: end, arcM: lengthM },
        ],
        pointAtArc,
    };
}
