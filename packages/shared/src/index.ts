/**
 * @fileoverview Main entry point for the shared package.
 * Re-exports all types, exchange-format schemas, and constants.
 */

// Constants
export {
  DEFAULT_PINCH_THRESHOLD_PX,
  DEFAULT_QUALITY_THRESHOLDS,
  DEFAULT_WINDOW_SECONDS,
  FINGER_COUNT,
  HAND_LANDMARKS,
  LANDMARK_COUNT,
  NAMED_LANDMARKS,
  PRIMITIVES,
  UNKNOWN_PRIMITIVE_PREFIX,
} from './constants.js';
// Exchange format
export {
  FingerFlagSchema,
  FingerFlagsSchema,
  HandednessSchema,
  isPrimitive,
  LandmarkFrameSchema,
  LandmarkPointSchema,
  PointSchema,
  PrimitiveSchema,
  WireFeaturesSchema,
  type WireFrame,
  WireFrameSchema,
  WireLandmarksSchema,
  WireNormalizedLandmarksSchema,
  type WireRecordingManifest,
  WireRecordingManifestSchema,
  type WireSessionMetadata,
  WireSessionMetadataSchema,
  type WireSessionRecord,
  WireSessionRecordSchema,
  WireVelocitySchema,
} from './protocol/index.js';
// Types
export type {
  Clock,
  EmptyStatistics,
  FingerFlag,
  FingerFlags,
  FrameSize,
  Handedness,
  HandFeatures,
  KnownPrimitive,
  LandmarkFrame,
  LandmarkName,
  LandmarkPoint,
  MotionDescriptor,
  MotionStatistics,
  NamedLandmarks,
  NormalizedLandmarks,
  Point2D,
  Primitive,
  SessionMetadata,
  SessionRecord,
  StatisticsResult,
  Velocity,
  VelocityStats,
} from './types/index.js';
