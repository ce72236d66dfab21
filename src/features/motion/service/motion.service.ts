// src/features/motion/service/motion.service.ts

import { resolve } from "node:path";
import type { LocationInput, SerializerOptions } from "../motion.schemas";
import { FrequencySchema, parseOrThrow } from "../motion.schemas";
import { buildRouteFromEndpoints, buildTimedRoute } from "../route/route.builder";
import { readRoute, writeRoute } from "../route/route.serializer";
import type { TimedRoute } from "../route/route.types";
import { getMotionConfig, resolveSpeed } from "../store/motionConfig.store";
import { loadGpxTrack } from "../track/gpx.track";

export type MotionSource =
    | { kind: "endpoints"; start: LocationInput; end: LocationInput; speed: number | string }
    | { kind: "gpx"; path: string };

export type MotionFileEntry = {
    /** Relative names land in config.outputDir */
    fileName: string;

    /** false: reuse the file already on disk instead of regenerating it */
    createFile: boolean;

    source: MotionSource;
    frequencyHz?: number;
};

export type PreparedMotionFile = {
    path: string;
    route: TimedRoute;
    created: boolean;
};

const log = (msg: string) => console.info(`[motion] ${msg}`);

export const motionApi = {
    async fromEndpoints(
        start: LocationInput,
        end: LocationInput,
        speed: number | string,
        frequencyHz: number = getMotionConfig().frequencyHz
    ): Promise<TimedRoute> {
        return buildRouteFromEndpoints(start, end, resolveSpeed(speed), frequencyHz);
    },

    async fromGpx(path: string, frequencyHz: number = getMotionConfig().frequencyHz): Promise<TimedRoute> {
        parseOrThrow(FrequencySchema, frequencyHz, "frequencyHz");
        const track = await loadGpxTrack(path);
        if (track.segmentCount > 1) {
            console.warn(`[motion] ${path}: joining ${track.segmentCount} track segments into one route`);
        }
        return buildTimedRoute(track, { frequencyHz });
    },

    async write(route: TimedRoute, fileName: string): Promise<string> {
        const path = motionFilePath(fileName);
        await writeRoute(route, path, serializerOptions());
        log(`wrote ${route.samples.length} samples (${route.durationSec.toFixed(1)}s) to ${path}`);
        return path;
    },

    async read(fileName: string): Promise<TimedRoute> {
        return readRoute(motionFilePath(fileName), serializerOptions());
    },

    /**
     * Build + write a motion file for one simulation entry, or load the
     * existing one when `createFile` is off.
     */
    async prepareMotionFile(entry: MotionFileEntry): Promise<PreparedMotionFile> {
        const path = motionFilePath(entry.fileName);

        if (!entry.createFile) {
            const route = await motionApi.read(entry.fileName);
            log(`reusing ${path} (${route.samples.length} samples)`);
            return { path, route, created: false };
        }

        const { source } = entry;
        const route =
            source.kind === "endpoints"
                ? await motionApi.fromEndpoints(source.start, source.end, source.speed, entry.frequencyHz)
                : await motionApi.fromGpx(source.path, entry.frequencyHz);

        await motionApi.write(route, entry.fileName);
        return { path, route, created: true };
    },
};

export function motionFilePath(fileName: string): string {
    return resolve(getMotionConfig().outputDir, fileName);
}

function serializerOptions(): SerializerOptions {
    const { format, timeDecimals, coordinateDecimals, altitudeDecimals } = getMotionConfig();
    return { format, timeDecimals, coordinateDecimals, altitudeDecimals };
}
