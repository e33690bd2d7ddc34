/**
 * @fileoverview Motion descriptor core.
 *
 * Turns per-frame hand landmarks into immutable motion descriptors,
 * keeps them in a session history, summarizes them, and reads/writes
 * the session exchange format.
 */

export {
  encodeHandshape,
  type ClassificationInput,
  PRIMITIVE_RULES,
  PrimitiveClassifier,
  type PrimitiveClassifierOptions,
  type PrimitiveRule,
} from './classify/PrimitiveClassifier.js';
export {
  clearConfigCache,
  defaultMotionConfig,
  loadMotionConfig,
  type MotionConfig,
  parseMotionConfig,
  type QualityThresholds,
} from './config/motionConfig.js';
export {
  describeIssues,
  EmptyHistoryError,
  InvalidConfigError,
  InvalidFrameError,
  MalformedRecordError,
  MotionDescriptorError,
  OutOfOrderAppendError,
} from './errors.js';
export {
  extractFeatures,
  handOpenness,
  handSpan,
  indexLandmarks,
  type LandmarkLookup,
  palmCenter,
  pinchDistance,
} from './features/FeatureExtractor.js';
export {
  MotionDescriptorBuilder,
  type MotionDescriptorBuilderOptions,
  normalizeLandmarks,
} from './motion/MotionDescriptorBuilder.js';
export { MotionHistory, systemClock } from './motion/MotionHistory.js';
export { estimateVelocity } from './motion/VelocityEstimator.js';
export {
  createRecordingSession,
  RecordingSession,
  type RecordingSessionOptions,
  type SavedSession,
  type SaveOptions,
} from './session/RecordingSession.js';
export {
  type ExportOptions,
  exportSession,
  fromWireFrame,
  fromWireRecord,
  loadSession,
  serializeSession,
  toWireFrame,
  toWireRecord,
} from './session/SessionSerializer.js';
export {
  type ParsedSessionFileName,
  parseSessionFileName,
  readSessionFile,
  type SessionFileNameOptions,
  sessionFileName,
  writeSessionFile,
} from './session/sessionFiles.js';
export {
  aggregateStatistics,
  averageFps,
  countPrimitives,
  sessionDuration,
  velocityStats,
} from './stats/StatisticsAggregator.js';
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';
