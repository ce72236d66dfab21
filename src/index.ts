export type { Location, EcefPoint } from "./features/motion/geo/geo.types";
export {
    EARTH_RADIUS_M,
    createLocation,
    destination,
    distanceM,
    initialBearingDeg,
    toLocation,
} from "./features/motion/geo/geo.math";
export { cartesianToGeodetic, geodeticToCartesian } from "./features/motion/geo/ecef";

export type {
    ArcTrackPoint,
    EndpointTrack,
    GpxTrack,
    RawTrackPoint,
    TimedTrackPoint,
    TrackSource,
} from "./features/motion/track/track.types";
export { createEndpointTrack } from "./features/motion/track/endpoint.track";
export { loadGpxTrack, parseGpxTrack } from "./features/motion/track/gpx.track";

export type { RouteParams, RouteSample, TimedRoute } from "./features/motion/route/route.types";
export {
    buildRouteFromEndpoints,
    buildRouteFromGpx,
    buildRouteFromGpxContent,
    buildTimedRoute,
} from "./features/motion/route/route.builder";
export { formatRoute, parseRoute, readRoute, writeRoute } from "./features/motion/route/route.serializer";

export type { LocationInput, MotionConfig, MotionFileFormat, SerializerOptions } from "./features/motion/motion.schemas";
export { MotionError, isMotionError, type MotionErrorKind } from "./features/motion/motion.errors";

export {
    TRANSPORT_SPEEDS,
    getMotionConfig,
    loadConfigFromEnv,
    motionConfigStore,
    resolveSpeed,
    type TransportMode,
} from "./features/motion/store/motionConfig.store";
export {
    motionApi,
    motionFilePath,
    type MotionFileEntry,
    type MotionSource,
    type PreparedMotionFile,
} from "./features/motion/service/motion.service";
