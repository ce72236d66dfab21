import { z, type ZodType, type ZodTypeDef } from "zod";
import { invalidParameter } from "./motion.errors";

export const LocationInputSchema = z.object({
    lat: z.number().finite().min(-90).max(90),
    lon: z.number().finite().min(-180).max(180),
    altitudeM: z.number().finite().optional(),
});

export type LocationInput = z.infer<typeof LocationInputSchema>;

export const SpeedSchema = z.number().finite().positive();
export const FrequencySchema = z.number().finite().positive();

export const MotionFileFormatSchema = z.enum(["llh", "ecef"]);
export type MotionFileFormat = z.infer<typeof MotionFileFormatSchema>;

export const SerializerOptionsSchema = z.object({
    format: MotionFileFormatSchema,
    timeDecimals: z.number().int().min(1).max(9),
    // below 6 digits the simulator sees visible position jumps
    coordinateDecimals: z.number().int().min(6).max(12),
    altitudeDecimals: z.number().int().min(0).max(6),
});

export type SerializerOptions = z.infer<typeof SerializerOptionsSchema>;

export const MotionConfigSchema = SerializerOptionsSchema.extend({
    frequencyHz: FrequencySchema,
    outputDir: z.string().min(1),
});

export type MotionConfig = z.infer<typeof MotionConfigSchema>;

export const MotionEnvSchema = z.object({
    MOTION_FREQUENCY_HZ: z.coerce.number().finite().positive().optional(),
    MOTION_OUTPUT_DIR: z.string().min(1).optional(),
    MOTION_FORMAT: MotionFileFormatSchema.optional(),
});

/**
 * Parse `value` or throw InvalidParameter naming the first bad field.
 */
export function parseOrThrow<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, field: string): T {
    const result = schema.safeParse(value);
    if (result.success) return result.data;

    const issue = result.error.issues[0];
    const path = issue.path.length ? `${field}.${issue.path.join(".")}` : field;
    throw invalidParameter(path, issue.message);
}
