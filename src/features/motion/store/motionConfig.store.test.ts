import { afterEach, describe, expect, it } from "vitest";
import {
    TRANSPORT_SPEEDS,
    defaultMotionConfig,
    getMotionConfig,
    isTransportMode,
    loadConfigFromEnv,
    motionConfigStore,
    resolveSpeed,
} from "./motionConfig.store";
import { catchError } from "../../../test/catchError";

afterEach(() => {
    motionConfigStore.getState().resetConfig();
});

describe("motionConfigStore", () => {
    it("starts from the defaults", () => {
        expect(getMotionConfig()).toEqual({
            frequencyHz: 10,
            outputDir: "user_motion_files",
            format: "llh",
            timeDecimals: 6,
            coordinateDecimals: 8,
            altitudeDecimals: 3,
        });
    });

    it("merges partial updates", () => {
        motionConfigStore.getState().setConfig({ frequencyHz: 100, format: "ecef" });

        expect(getMotionConfig()).toEqual({ ...defaultMotionConfig, frequencyHz: 100, format: "ecef" });
    });

    it("rejects an invalid update and keeps the previous config", () => {
        motionConfigStore.getState().setConfig({ frequencyHz: 50 });

        const err = catchError(() => motionConfigStore.getState().setConfig({ frequencyHz: 0 }));

        expect(err).toMatchObject({ kind: "InvalidParameter", field: "config.frequencyHz" });
        expect(getMotionConfig().frequencyHz).toBe(50);
    });

    it("resets to the defaults", () => {
        motionConfigStore.getState().setConfig({ outputDir: "/tmp/elsewhere" });
        motionConfigStore.getState().resetConfig();

        expect(getMotionConfig()).toBe(defaultMotionConfig);
    });
});

describe("loadConfigFromEnv", () => {
    it("applies the MOTION_* overrides", () => {
        const config = loadConfigFromEnv({
            MOTION_FREQUENCY_HZ: "25",
            MOTION_OUTPUT_DIR: "out/motion",
            MOTION_FORMAT: "ecef",
            UNRELATED: "ignored",
        });

        expect(config).toEqual({ ...defaultMotionConfig, frequencyHz: 25, outputDir: "out/motion", format: "ecef" });
        expect(getMotionConfig()).toEqual(config);
    });

    it("leaves the config alone when nothing is set", () => {
        expect(loadConfigFromEnv({})).toEqual(defaultMotionConfig);
    });

    it("names the bad variable", () => {
        expect(catchError(() => loadConfigFromEnv({ MOTION_FORMAT: "csv" }))).toMatchObject({
            kind: "InvalidParameter",
            field: "env.MOTION_FORMAT",
        });
        expect(catchError(() => loadConfigFromEnv({ MOTION_FREQUENCY_HZ: "-1" }))).toMatchObject({
            kind: "InvalidParameter",
            field: "env.MOTION_FREQUENCY_HZ",
        });
    });
});

describe("resolveSpeed", () => {
    it("maps transport presets to m/s", () => {
        expect(resolveSpeed("walking")).toBe(1.4);
        expect(resolveSpeed("running")).toBe(2.5);
        expect(resolveSpeed("biking")).toBe(7);
    });

    it("passes numbers through untouched", () => {
        expect(resolveSpeed(3.3)).toBe(3.3);
        expect(resolveSpeed(-1)).toBe(-1);
    });

    it("rejects unknown presets", () => {
        expect(catchError(() => resolveSpeed("flying"))).toMatchObject({
            kind: "InvalidParameter",
            field: "speed",
        });
        expect(isTransportMode("toString")).toBe(false);
        expect(Object.keys(TRANSPORT_SPEEDS)).toEqual(["walking", "running", "biking"]);
    });
});
