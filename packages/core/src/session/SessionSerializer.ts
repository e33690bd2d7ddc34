/**
 * @fileoverview Session export and the exchange-format codec.
 *
 * In memory, descriptors use camelCase fields; the persisted format uses the
 * snake_case names of WireSessionRecordSchema. Every documented field survives
 * a serialize/load round trip.
 */

import {
  type MotionDescriptor,
  type NamedLandmarks,
  type NormalizedLandmarks,
  type Point2D,
  type SessionMetadata,
  type SessionRecord,
  type WireFrame,
  type WireSessionRecord,
  WireSessionRecordSchema,
} from '@motion-kit/shared';
import { describeIssues, EmptyHistoryError, MalformedRecordError } from '../errors.js';
import type { MotionHistory } from '../motion/MotionHistory.js';
import { aggregateStatistics } from '../stats/StatisticsAggregator.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('serializer');

type WireLandmarks = WireFrame['landmarks'];
type WireNormalizedLandmarks = NonNullable<WireFrame['normalized_landmarks']>;

// ============ Frame Codec ============

function copyPoint(point: Point2D): Point2D {
  return Object.freeze({ x: point.x, y: point.y });
}

function toWireLandmarks(landmarks: NamedLandmarks): WireLandmarks {
  return {
    wrist: copyPoint(landmarks.wrist),
    thumb_tip: copyPoint(landmarks.thumbTip),
    index_tip: copyPoint(landmarks.indexTip),
    middle_tip: copyPoint(landmarks.middleTip),
    ring_tip: copyPoint(landmarks.ringTip),
    pinky_tip: copyPoint(landmarks.pinkyTip),
  };
}

function fromWireLandmarks(landmarks: WireLandmarks): NamedLandmarks {
  return Object.freeze({
    wrist: copyPoint(landmarks.wrist),
    thumbTip: copyPoint(landmarks.thumb_tip),
    indexTip: copyPoint(landmarks.index_tip),
    middleTip: copyPoint(landmarks.middle_tip),
    ringTip: copyPoint(landmarks.ring_tip),
    pinkyTip: copyPoint(landmarks.pinky_tip),
  });
}

function toWireNormalized(normalized: NormalizedLandmarks): WireNormalizedLandmarks {
  return {
    ...toWireLandmarks(normalized),
    palm_center: copyPoint(normalized.palmCenter),
  };
}

function fromWireNormalized(normalized: WireNormalizedLandmarks): NormalizedLandmarks {
  return Object.freeze({
    ...fromWireLandmarks(normalized),
    palmCenter: copyPoint(normalized.palm_center),
  });
}

/**
 * Encode a descriptor in the exchange format. A missing velocity becomes null.
 */
export function toWireFrame(descriptor: MotionDescriptor): WireFrame {
  const { velocity, normalizedLandmarks, features } = descriptor;
  return {
    capture_time: descriptor.captureTime,
    session_relative_time: descriptor.sessionRelativeTime,
    frame_index: descriptor.frameIndex,
    ...(descriptor.hand ? { hand: descriptor.hand } : {}),
    fingers_extended: [...descriptor.fingersExtended],
    finger_count: descriptor.fingerCount,
    handshape_code: descriptor.handshapeCode,
    landmarks: toWireLandmarks(descriptor.landmarks),
    features: {
      pinch_distance: features.pinchDistance,
      hand_openness: features.handOpenness,
      hand_span: features.handSpan,
      palm_center: copyPoint(features.palmCenter),
    },
    primitive: descriptor.primitive,
    velocity: velocity
      ? {
          vx: velocity.vx,
          vy: velocity.vy,
          magnitude: velocity.magnitude,
          direction_radians: velocity.directionRadians,
        }
      : null,
    ...(normalizedLandmarks ? { normalized_landmarks: toWireNormalized(normalizedLandmarks) } : {}),
  };
}

/**
 * Decode a validated wire frame into an immutable descriptor.
 */
export function fromWireFrame(frame: WireFrame): MotionDescriptor {
  const { velocity, normalized_landmarks: normalized, features } = frame;
  return Object.freeze({
    captureTime: frame.capture_time,
    sessionRelativeTime: frame.session_relative_time,
    frameIndex: frame.frame_index,
    ...(frame.hand ? { hand: frame.hand } : {}),
    fingersExtended: Object.freeze(frame.fingers_extended),
    fingerCount: frame.finger_count,
    handshapeCode: frame.handshape_code,
    landmarks: fromWireLandmarks(frame.landmarks),
    features: Object.freeze({
      pinchDistance: features.pinch_distance,
      handOpenness: features.hand_openness,
      handSpan: features.hand_span,
      palmCenter: copyPoint(features.palm_center),
    }),
    primitive: frame.primitive,
    ...(velocity
      ? {
          velocity: Object.freeze({
            vx: velocity.vx,
            vy: velocity.vy,
            magnitude: velocity.magnitude,
            directionRadians: velocity.direction_radians,
          }),
        }
      : {}),
    ...(normalized ? { normalizedLandmarks: fromWireNormalized(normalized) } : {}),
  });
}

// ============ Record Codec ============

/**
 * Encode a session record in the exchange format.
 */
export function toWireRecord(record: SessionRecord): WireSessionRecord {
  const { metadata } = record;
  return {
    metadata: {
      gesture_name: metadata.gestureName,
      recorded_at: metadata.recordedAt,
      duration_seconds: metadata.durationSeconds,
      total_frames: metadata.totalFrames,
      average_fps: metadata.averageFps,
      primitives_used: [...metadata.primitivesUsed],
      custom: { ...metadata.custom },
    },
    frames: record.frames.map(toWireFrame),
  };
}

/**
 * Decode a validated wire record.
 */
export function fromWireRecord(record: WireSessionRecord): SessionRecord {
  const { metadata } = record;
  const decoded: SessionMetadata = {
    gestureName: metadata.gesture_name,
    recordedAt: metadata.recorded_at,
    durationSeconds: metadata.duration_seconds,
    totalFrames: metadata.total_frames,
    averageFps: metadata.average_fps,
    primitivesUsed: Object.freeze([...metadata.primitives_used]),
    custom: Object.freeze({ ...metadata.custom }),
  };
  return {
    metadata: Object.freeze(decoded),
    frames: Object.freeze(record.frames.map(fromWireFrame)),
  };
}

// ============ Export / Load ============

export interface ExportOptions {
  /** Recording timestamp; defaults to now */
  readonly recordedAt?: Date;
}

/**
 * Build the exchange record of a session.
 * @param history - Session to export; left unchanged
 * @param gestureName - Label of the recorded gesture
 * @param custom - Free-form metadata (signer, attempt number, ...)
 * @throws {EmptyHistoryError} if the history has no descriptors
 */
export function exportSession(
  history: MotionHistory,
  gestureName: string,
  custom: Readonly<Record<string, unknown>> = {},
  options: ExportOptions = {}
): SessionRecord {
  const frames = history.snapshot();
  const stats = aggregateStatistics(frames);
  if (stats.kind === 'empty') {
    throw new EmptyHistoryError();
  }

  const metadata: SessionMetadata = {
    gestureName,
    recordedAt: (options.recordedAt ?? new Date()).toISOString(),
    durationSeconds: stats.durationSeconds,
    totalFrames: stats.totalFrames,
    averageFps: stats.averageFps,
    primitivesUsed: Object.freeze(history.distinctPrimitives()),
    custom: Object.freeze({ ...custom }),
  };

  log.info('Session exported', {
    gestureName,
    totalFrames: metadata.totalFrames,
    durationSeconds: Number(metadata.durationSeconds.toFixed(3)),
    primitives: metadata.primitivesUsed,
  });

  return { metadata: Object.freeze(metadata), frames };
}

/**
 * Serialize a record to UTF-8 JSON text.
 */
export function serializeSession(record: SessionRecord): string {
  return JSON.stringify(toWireRecord(record), null, 2);
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeText(input: string | Uint8Array): string {
  if (typeof input === 'string') return input;
  try {
    return utf8.decode(input);
  } catch (error) {
    throw new MalformedRecordError('content is not valid UTF-8', { cause: error });
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedRecordError('content is not valid JSON', { cause: error });
  }
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate a serialized session.
 * @param input - File contents as bytes or text
 * @throws {MalformedRecordError} if the content is not a complete, valid session record
 */
export function loadSession(input: string | Uint8Array): SessionRecord {
  const raw = parseJson(decodeText(input));
  if (!isRecordObject(raw)) {
    throw new MalformedRecordError('top level must be an object');
  }
  const missing = ['metadata', 'frames'].filter((field) => !(field in raw));
  if (missing.length > 0) {
    throw new MalformedRecordError(`missing ${missing.join(' and ')}`);
  }

  const result = WireSessionRecordSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedRecordError(describeIssues(result.error.issues), { cause: result.error });
  }
  return fromWireRecord(result.data);
}
