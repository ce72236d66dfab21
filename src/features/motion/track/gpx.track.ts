import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { gpx as parseGpx } from "@tmcw/togeojson";
import { DOMParser } from "@xmldom/xmldom";
import type { Position } from "geojson";
import { z } from "zod";
import { toLocation } from "../geo/geo.math";
import type { Location } from "../geo/geo.types";
import { MotionError, invalidParameter, ioFailure, malformedTrack } from "../motion.errors";
import type { GpxTrack } from "./track.types";

export const GPX_EXTENSIONS = [".gpx", ".xml"];

// togeojson puts per-fix times under coordinateProperties:
// string[] for a single line, string[][] for a MultiLineString
const TrackPropertiesSchema = z
    .object({
        _gpxType: z.string().optional(),
        name: z.string().optional(),
        coordinateProperties: z
            .object({
                times: z.union([z.array(z.string()), z.array(z.array(z.string()))]).optional(),
            })
            .passthrough()
            .optional(),
    })
    .passthrough();

type Line = { coords: Position[]; times: string[]; segments: number };

/**
 * Read and parse a GPX file. Only .gpx / .xml paths are accepted.
 */
export async function loadGpxTrack(path: string): Promise<GpxTrack> {
    const ext = extname(path).toLowerCase();
    if (!GPX_EXTENSIONS.includes(ext)) {
        throw invalidParameter(
            "path",
            `unsupported GPX file type "${ext || "(none)"}", expected ${GPX_EXTENSIONS.join(" or ")}`
        );
    }

    let content: string;
    try {
        content = await readFile(path, "utf8");
    } catch (err) {
        throw ioFailure(path, err);
    }

    return parseGpxTrack(content);
}

/**
 * GPX text → GpxTrack.
 *
 * All `<trk>` lines are joined in document order. Waypoints and routes are
 * ignored. A fix without `<ele>` keeps the previous fix's altitude (0 for the first).
 */
export function parseGpxTrack(xml: string): GpxTrack {
    const doc = parseXml(xml);
    const collection = parseGpx(doc);

    const lines: Line[] = [];
    let name: string | null = null;

    for (const feature of collection.features) {
        const geometry = feature.geometry;
        if (!geometry) continue;
        if (geometry.type !== "LineString" && geometry.type !== "MultiLineString") continue;

        const props = TrackPropertiesSchema.safeParse(feature.properties ?? {});
        if (!props.success) {
            throw malformedTrack("track properties are not readable");
        }
        if (props.data._gpxType !== undefined && props.data._gpxType !== "trk") continue;

        name = name ?? props.data.name ?? null;
        const times = flattenTimes(props.data.coordinateProperties?.times ?? []);

        if (geometry.type === "LineString") {
            lines.push({ coords: geometry.coordinates, times, segments: 1 });
        } else {
            lines.push({
                coords: geometry.coordinates.flat(),
                times,
                segments: geometry.coordinates.length,
            });
        }
    }

    const coords = lines.flatMap((l) => l.coords);
    const times = lines.flatMap((l) => l.times);

    // togeojson drops one-point segments and fixes without coordinates
    const trkptCount = countTrackPoints(doc);
    if (trkptCount < 2) {
        throw new MotionError(
            "InsufficientData",
            `GPX track needs at least 2 points, found ${trkptCount}`
        );
    }
    if (coords.length !== trkptCount) {
        throw malformedTrack(
            `${trkptCount - coords.length} of ${trkptCount} track points are unusable ` +
                `(single-point <trkseg> or missing coordinates)`
        );
    }
    if (times.length !== coords.length) {
        throw malformedTrack(`missing timestamps: ${times.length} of ${coords.length} points have <time>`);
    }

    const t0 = Date.parse(times[0]);
    const points: GpxTrack["points"] = [];
    let prevAltitude = 0;
    let prevT = Number.NEGATIVE_INFINITY;

    for (let i = 0; i < coords.length; i++) {
        const t = Date.parse(times[i]);
        if (!Number.isFinite(t)) {
            throw malformedTrack(`point ${i + 1} has an unreadable timestamp "${times[i]}"`);
        }
        if (t <= prevT) {
            throw malformedTrack(
                `timestamps must be strictly increasing: point ${i + 1} (${times[i]}) is not after point ${i} (${times[i - 1]})`
            );
        }
        prevT = t;

        const location = positionToLocation(coords[i], prevAltitude, i);
        prevAltitude = location.altitudeM;
        points.push({ location, tSec: (t - t0) / 1000 });
    }

    return {
        kind: "gpx",
        name,
        segmentCount: lines.reduce((n, l) => n + l.segments, 0),
        startIso: new Date(t0).toISOString(),
        points,
    };
}

function parseXml(xml: string): Document {
    const problems: string[] = [];
    const parser = new DOMParser({
        errorHandler: (level: string, msg: unknown) => {
            if (level !== "warning") problems.push(String(msg));
        },
    });

    let doc: Document | undefined;
    try {
        doc = parser.parseFromString(xml, "text/xml");
    } catch (err) {
        throw new MotionError("MalformedTrack", "GPX is not well-formed XML", { cause: err });
    }

    if (!doc || problems.length > 0) {
        throw malformedTrack(`GPX is not well-formed XML: ${problems[0] ?? "empty document"}`);
    }
    return doc;
}

function countTrackPoints(doc: Document): number {
    let count = 0;
    const trkpts = doc.getElementsByTagName("trkpt");
    for (let i = 0; i < trkpts.length; i++) {
        if (hasAncestor(trkpts[i], "trk")) count++;
    }
    return count;
}

function hasAncestor(node: Node, name: string): boolean {
    for (let p = node.parentNode; p; p = p.parentNode) {
        if (p.nodeName === name) return true;
    }
    return false;
}

function flattenTimes(times: string[] | string[][]): string[] {
    const out: string[] = [];
    for (const t of times) {
        if (typeof t === "string") out.push(t);
        else out.push(...t);
    }
    return out;
}

function positionToLocation(position: Position, prevAltitude: number, index: number): Location {
    const [lon, lat] = position;
    const ele = position.length > 2 ? position[2] : undefined;
    return toLocation(
        { lat, lon, altitudeM: ele === undefined ? prevAltitude : ele },
        `trkpt[${index + 1}]`
    );
}
