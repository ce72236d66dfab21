import { createStore } from "zustand/vanilla";
import { MotionConfigSchema, MotionEnvSchema, parseOrThrow, type MotionConfig } from "../motion.schemas";
import { invalidParameter } from "../motion.errors";

type MotionConfigState = {
    config: MotionConfig;

    setConfig: (partial: Partial<MotionConfig>) => void;
    resetConfig: () => void;
};

export const defaultMotionConfig: MotionConfig = {
    frequencyHz: 10,                  // nominal simulator user-motion rate
    outputDir: "user_motion_files",
    format: "llh",
    timeDecimals: 6,
    coordinateDecimals: 8,            // ~1 mm at the equator
    altitudeDecimals: 3,
};

/**
 * Meters per second for the usual ways of getting around.
 */
export const TRANSPORT_SPEEDS = {
    walking: 1.4,
    running: 2.5,
    biking: 7,
} as const;

export type TransportMode = keyof typeof TRANSPORT_SPEEDS;

export function isTransportMode(value: string): value is TransportMode {
    return Object.prototype.hasOwnProperty.call(TRANSPORT_SPEEDS, value);
}

/**
 * Preset name or plain m/s → m/s. Unknown names throw InvalidParameter;
 * numbers are passed through and checked by the route builder.
 */
export function resolveSpeed(speed: number | string): number {
    if (typeof speed === "number") return speed;
    if (isTransportMode(speed)) return TRANSPORT_SPEEDS[speed];
    throw invalidParameter(
        "speed",
        `unknown transport mode "${speed}", expected one of ${Object.keys(TRANSPORT_SPEEDS).join(", ")}`
    );
}

export const motionConfigStore = createStore<MotionConfigState>()((set, get) => ({
    config: defaultMotionConfig,

    // validated as a whole so a bad partial never lands in state
    setConfig: (partial) => {
        const next = parseOrThrow(MotionConfigSchema, { ...get().config, ...partial }, "config");
        set({ config: next });
    },

    resetConfig: () =>
        set({
            config: defaultMotionConfig,
        }),
}));

export const getMotionConfig = (): MotionConfig => motionConfigStore.getState().config;

/**
 * Apply MOTION_FREQUENCY_HZ / MOTION_OUTPUT_DIR / MOTION_FORMAT overrides.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): MotionConfig {
    const parsed = parseOrThrow(MotionEnvSchema, env, "env");

    const partial: Partial<MotionConfig> = {};
    if (parsed.MOTION_FREQUENCY_HZ !== undefined) partial.frequencyHz = parsed.MOTION_FREQUENCY_HZ;
    if (parsed.MOTION_OUTPUT_DIR !== undefined) partial.outputDir = parsed.MOTION_OUTPUT_DIR;
    if (parsed.MOTION_FORMAT !== undefined) partial.format = parsed.MOTION_FORMAT;

    motionConfigStore.getState().setConfig(partial);
    return getMotionConfig();
}
