/**
 * @fileoverview Core types of the motion descriptor data model.
 */

import type { NAMED_LANDMARKS, PRIMITIVES } from '../constants.js';

// ============ Input ============

/**
 * One detector landmark in pixel coordinates.
 */
export interface LandmarkPoint {
  /** Position in the 21-point topology (0-20) */
  readonly index: number;
  readonly x: number;
  readonly y: number;
}

/**
 * Finger-extension flag: 1 = extended, 0 = folded.
 */
export type FingerFlag = 0 | 1;

/**
 * Extension flags ordered [thumb, index, middle, ring, pinky].
 */
export type FingerFlags = readonly [FingerFlag, FingerFlag, FingerFlag, FingerFlag, FingerFlag];

export type Handedness = 'left' | 'right';

/**
 * Input unit supplied by the hand-tracking collaborator once per tick.
 *
 * `fingers` is typed loosely because detector output is not trusted;
 * the descriptor builder validates it before use.
 */
export interface LandmarkFrame {
  readonly points: readonly LandmarkPoint[];
  readonly fingers: readonly number[];
  /** Hand identity, when the collaborator knows it */
  readonly hand?: Handedness;
}

/**
 * Capture resolution used to normalize coordinates.
 */
export interface FrameSize {
  readonly width: number;
  readonly height: number;
}

// ============ Descriptor ============

export interface Point2D {
  readonly x: number;
  readonly y: number;
}

export type LandmarkName = keyof typeof NAMED_LANDMARKS;

export type NamedLandmarks = Readonly<Record<LandmarkName, Point2D>>;

/**
 * Normalized landmarks also carry the palm center.
 */
export type NormalizedLandmarks = Readonly<Record<LandmarkName | 'palmCenter', Point2D>>;

export interface HandFeatures {
  readonly pinchDistance: number;
  /** Fraction of extended fingers, in [0, 1] */
  readonly handOpenness: number;
  readonly handSpan: number;
  readonly palmCenter: Point2D;
}

export interface Velocity {
  /** px/s */
  readonly vx: number;
  readonly vy: number;
  readonly magnitude: number;
  readonly directionRadians: number;
}

export type KnownPrimitive = (typeof PRIMITIVES)[number];

/**
 * Classifier label. Unmatched handshapes yield `UNKNOWN_<handshape code>`.
 */
export type Primitive = KnownPrimitive | `UNKNOWN_${string}`;

/**
 * Immutable per-frame record of handshape, location, features and motion.
 */
export interface MotionDescriptor {
  /** Wall-clock seconds since the Unix epoch */
  readonly captureTime: number;
  /** Seconds since the first descriptor of the session */
  readonly sessionRelativeTime: number;
  readonly frameIndex: number;
  readonly hand?: Handedness;
  readonly fingersExtended: FingerFlags;
  readonly fingerCount: number;
  readonly handshapeCode: string;
  readonly landmarks: NamedLandmarks;
  readonly features: HandFeatures;
  readonly primitive: Primitive;
  /** Absent for the first frame and when no time elapsed since the previous one */
  readonly velocity?: Velocity;
  readonly normalizedLandmarks?: NormalizedLandmarks;
}

// ============ Statistics ============

export interface VelocityStats {
  readonly mean: number;
  readonly max: number;
  readonly min: number;
}

export interface MotionStatistics {
  readonly kind: 'stats';
  readonly durationSeconds: number;
  readonly totalFrames: number;
  readonly averageFps: number;
  readonly primitiveCounts: Readonly<Record<string, number>>;
  readonly uniquePrimitiveCount: number;
  readonly velocityStats?: VelocityStats;
}

/**
 * Result of aggregating a history with no descriptors.
 */
export interface EmptyStatistics {
  readonly kind: 'empty';
}

export type StatisticsResult = MotionStatistics | EmptyStatistics;

// ============ Session ============

export interface SessionMetadata {
  readonly gestureName: string;
  /** ISO-8601 */
  readonly recordedAt: string;
  readonly durationSeconds: number;
  readonly totalFrames: number;
  readonly averageFps: number;
  readonly primitivesUsed: readonly string[];
  readonly custom: Readonly<Record<string, unknown>>;
}

/**
 * One exported recording session.
 */
export interface SessionRecord {
  readonly metadata: SessionMetadata;
  readonly frames: readonly MotionDescriptor[];
}

/**
 * Source of wall-clock time in seconds.
 */
export interface Clock {
  now(): number;
}
