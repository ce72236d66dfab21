import { describe, it, expect } from "vitest";
import {
    createLocation,
    destination,
    distanceM,
    initialBearingDeg,
    normalizeLon,
    pathLengthM,
} from "./geo.math";
import { MotionError } from "../motion.errors";
import { catchError } from "../../../test/catchError";

const NYC_NORTH = createLocation(40.794195, -73.963177);
const NYC_SOUTH = createLocation(40.731278, -73.999541);

describe("distanceM", () => {
    it("measures one degree of latitude on the mean sphere", () => {
        const d = distanceM(createLocation(0, 0), createLocation(1, 0));
        expect(d).toBeCloseTo(111194.9266, 3);
    });

    it("is symmetric", () => {
        expect(distanceM(NYC_NORTH, NYC_SOUTH)).toBe(distanceM(NYC_SOUTH, NYC_NORTH));
    });

    it("is exactly zero for the same point and ignores altitude", () => {
        const a = createLocation(37.417747, -122.086086, 0);
        const b = createLocation(37.417747, -122.086086, 120);
        expect(distanceM(a, b)).toBe(0);
    });
});

describe("initialBearingDeg", () => {
    const origin = createLocation(0, 0);

    it("returns compass bearings for the four cardinal directions", () => {
        expect(initialBearingDeg(origin, createLocation(1, 0))).toBe(0);
        expect(initialBearingDeg(origin, createLocation(0, 1))).toBeCloseTo(90, 9);
        expect(initialBearingDeg(origin, createLocation(-1, 0))).toBeCloseTo(180, 9);
        expect(initialBearingDeg(origin, createLocation(0, -1))).toBeCloseTo(270, 9);
    });

    it("returns 0 for coincident points", () => {
        expect(initialBearingDeg(NYC_NORTH, NYC_NORTH)).toBe(0);
    });
});

describe("destination", () => {
    it("lands back on the target when following bearing and distance", () => {
        const pairs = [
            [NYC_NORTH, NYC_SOUTH],
            [createLocation(37.417747, -122.086086), createLocation(37.421624, -122.096472)],
            [createLocation(-33.8688, 151.2093), createLocation(-33.9, 151.3)],
        ] as const;

        for (const [a, b] of pairs) {
            const p = destination(a, initialBearingDeg(a, b), distanceM(a, b));
            expect(p.lat).toBeCloseTo(b.lat, 6);
            expect(p.lon).toBeCloseTo(b.lon, 6);
        }
    });

    it("travels the requested distance", () => {
        const p = destination(NYC_NORTH, 200, 1234.5);
        expect(Math.abs(distanceM(NYC_NORTH, p) - 1234.5) / 1234.5).toBeLessThan(1e-6);
    });

    it("keeps the origin altitude", () => {
        const p = destination(createLocation(10, 10, 42), 45, 500);
        expect(p.altitudeM).toBe(42);
    });

    it("wraps across the antimeridian", () => {
        const p = destination(createLocation(0, 179.9999), 90, 50);
        expect(p.lon).toBeLessThan(0);
        expect(p.lon).toBeGreaterThanOrEqual(-180);
    });
});

describe("createLocation", () => {
    it("defaults altitude to 0 and freezes the value", () => {
        const loc = createLocation(1, 2);
        expect(loc).toEqual({ lat: 1, lon: 2, altitudeM: 0 });
        expect(Object.isFrozen(loc)).toBe(true);
    });

    it("rejects out-of-range latitude", () => {
        const err = catchError(() => createLocation(91, 0));
        expect(err).toBeInstanceOf(MotionError);
        expect(err).toMatchObject({ kind: "InvalidParameter", field: "location.lat" });
    });

    it("rejects non-finite longitude", () => {
        const err = catchError(() => createLocation(0, Number.NaN));
        expect(err).toMatchObject({ kind: "InvalidParameter", field: "location.lon" });
    });
});

describe("helpers", () => {
    it("normalizes longitudes into [-180, 180)", () => {
        expect(normalizeLon(190)).toBe(-170);
        expect(normalizeLon(-190)).toBe(170);
        expect(normalizeLon(180)).toBe(-180);
        expect(normalizeLon(12.5)).toBe(12.5);
    });

    it("sums path legs", () => {
        const a = createLocation(0, 0);
        const b = createLocation(1, 0);
        const c = createLocation(2, 0);
        expect(pathLengthM([a, b, c])).toBeCloseTo(distanceM(a, c), 6);
        expect(pathLengthM([a])).toBe(0);
    });
});
