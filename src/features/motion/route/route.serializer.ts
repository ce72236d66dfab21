import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { cartesianToGeodetic, locationToEcef } from "../geo/ecef";
import { pathLengthM } from "../geo/geo.math";
import type { Location } from "../geo/geo.types";
import { MotionError, formatError, invalidParameter, ioFailure } from "../motion.errors";
import { SerializerOptionsSchema, parseOrThrow, type SerializerOptions } from "../motion.schemas";
import type { RouteSample, TimedRoute } from "./route.types";

export const DEFAULT_SERIALIZER_OPTIONS: SerializerOptions = {
    format: "llh",
    timeDecimals: 6,
    coordinateDecimals: 8,
    altitudeDecimals: 3,
};

const FIELDS_PER_ROW = 4;

/**
 * Render a route as motion-file text, one `t,a,b,c` row per sample.
 *
 * llh:  t, latitude, longitude, altitude
 * ecef: t, x, y, z (WGS84 meters, altitude decimals)
 *
 * Throws InvalidParameter when `timeDecimals` prints two consecutive
 * samples at the same time.
 */
export function formatRoute(route: TimedRoute, options: Partial<SerializerOptions> = {}): string {
    const opts = resolveOptions(options);
    let out = "";
    let prevTime: string | null = null;

    for (let i = 0; i < route.samples.length; i++) {
        const sample = route.samples[i];
        const time = sample.tSec.toFixed(opts.timeDecimals);
        if (time === prevTime) {
            throw invalidParameter(
                "options.timeDecimals",
                `${opts.timeDecimals} decimals render samples ${i} and ${i + 1} both at ${time}s`
            );
        }
        prevTime = time;
        out += formatRow(time, sample.location, opts) + "\n";
    }
    return out;
}

/**
 * Parse motion-file text back into a route. Blank lines are skipped;
 * anything else must be 4 numeric fields with increasing time.
 * The rate is read off the first interval, and only from 3 rows up.
 */
export function parseRoute(content: string, options: Partial<SerializerOptions> = {}): TimedRoute {
    const opts = resolveOptions(options);
    const samples: RouteSample[] = [];
    const lines = content.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i].trim();
        if (!line) continue;

        const row = i + 1;
        const fields = line.split(",");
        if (fields.length !== FIELDS_PER_ROW) {
            throw formatError(row, `expected ${FIELDS_PER_ROW} fields, found ${fields.length}`);
        }

        const values = fields.map((f, col) => {
            const text = f.trim();
            const n = text === "" ? Number.NaN : Number(text);
            if (!Number.isFinite(n)) {
                throw formatError(row, `field ${col + 1} is not a number: "${text}"`);
            }
            return n;
        });

        const [tSec, a, b, c] = values;
        const prev = samples[samples.length - 1];
        if (prev && tSec <= prev.tSec) {
            throw formatError(row, `time ${tSec} does not increase after ${prev.tSec}`);
        }
        if (!prev && tSec !== 0) {
            throw formatError(row, `first sample must start at 0, found ${tSec}`);
        }

        const location = opts.format === "ecef" ? cartesianToGeodetic(a, b, c) : toFileLocation(row, a, b, c);
        samples.push(Object.freeze({ tSec, location }));
    }

    if (samples.length === 0) {
        throw new MotionError("FormatError", "motion file has no samples");
    }

    return Object.freeze({
        // with two rows the only interval may be a short final step
        frequencyHz: samples.length > 2 ? 1 / samples[1].tSec : null,
        samples: Object.freeze(samples),
        durationSec: samples[samples.length - 1].tSec,
        distanceM: pathLengthM(samples.map((s) => s.location)),
    });
}

/**
 * Write a motion file all-or-nothing: the full text goes to a temp sibling
 * first and is renamed over `path` only once it is on disk.
 */
export async function writeRoute(
    route: TimedRoute,
    path: string,
    options: Partial<SerializerOptions> = {}
): Promise<void> {
    const text = formatRoute(route, options);
    const tmpPath = join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);

    try {
        await mkdir(dirname(path), { recursive: true });
    } catch (err) {
        throw ioFailure(path, err);
    }

    try {
        await writeFile(tmpPath, text, "utf8");
        await rename(tmpPath, path);
    } catch (err) {
        try {
            await rm(tmpPath, { force: true });
        } catch (cleanupErr) {
            throw ioFailure(
                path,
                new AggregateError([err, cleanupErr], `write failed and ${tmpPath} could not be removed`)
            );
        }
        throw ioFailure(path, err);
    }
}

export async function readRoute(path: string, options: Partial<SerializerOptions> = {}): Promise<TimedRoute> {
    let content: string;
    try {
        content = await readFile(path, "utf8");
    } catch (err) {
        throw ioFailure(path, err);
    }
    return parseRoute(content, options);
}

function resolveOptions(options: Partial<SerializerOptions>): SerializerOptions {
    return parseOrThrow(SerializerOptionsSchema, { ...DEFAULT_SERIALIZER_OPTIONS, ...options }, "options");
}

function formatRow(t: string, location: Location, opts: SerializerOptions): string {
    if (opts.format === "ecef") {
        const { x, y, z } = locationToEcef(location);
        const d = opts.altitudeDecimals;
        return [t, x.toFixed(d), y.toFixed(d), z.toFixed(d)].join(",");
    }

    return [
        t,
        location.lat.toFixed(opts.coordinateDecimals),
        location.lon.toFixed(opts.coordinateDecimals),
        location.altitudeM.toFixed(opts.altitudeDecimals),
    ].join(",");
}

function toFileLocation(row: number, lat: number, lon: number, altitudeM: number): Location {
    if (Math.abs(lat) > 90 || Math.abs(lon) > 180) {
        throw formatError(row, `coordinate out of range: ${lat}, ${lon}`);
    }
    return Object.freeze({ lat, lon, altitudeM });
}
