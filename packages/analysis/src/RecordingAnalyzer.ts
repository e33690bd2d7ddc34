/**
 * @fileoverview Offline analysis of one exported recording.
 */

import type { LandmarkName, MotionDescriptor, Point2D, Primitive, SessionRecord } from '@motion-kit/shared';

export interface PrimitiveShare {
  readonly primitive: Primitive;
  readonly count: number;
  /** Share of all frames, 0-100 */
  readonly percentage: number;
}

export interface SeriesStats {
  readonly mean: number;
  readonly min: number;
  readonly max: number;
}

export interface VelocitySummary extends SeriesStats {
  /** Population standard deviation */
  readonly stdDev: number;
}

export interface RecordingSummary {
  readonly gestureName: string;
  readonly recordedAt: string;
  readonly durationSeconds: number;
  readonly totalFrames: number;
  readonly averageFps: number;
  /** Sorted by primitive label */
  readonly primitives: readonly PrimitiveShare[];
  readonly uniquePrimitiveCount: number;
  /** Absent when no frame carries a velocity */
  readonly velocity?: VelocitySummary;
  /** Absent for a recording without frames */
  readonly openness?: SeriesStats;
}

function seriesStats(values: readonly number[]): SeriesStats | undefined {
  if (values.length === 0) return undefined;
  let min = Infinity;
  let max = -Infinity;
  let total = 0;
  for (const value of values) {
    min = Math.min(min, value);
    max = Math.max(max, value);
    total += value;
  }
  return { mean: total / values.length, min, max };
}

function velocitySummary(frames: readonly MotionDescriptor[]): VelocitySummary | undefined {
  const magnitudes = frames.flatMap((frame) => (frame.velocity ? [frame.velocity.magnitude] : []));
  const stats = seriesStats(magnitudes);
  if (!stats) return undefined;

  const variance =
    magnitudes.reduce((sum, value) => sum + (value - stats.mean) ** 2, 0) / magnitudes.length;
  return { ...stats, stdDev: Math.sqrt(variance) };
}

function primitiveShares(frames: readonly MotionDescriptor[]): PrimitiveShare[] {
  const counts = new Map<Primitive, number>();
  for (const { primitive } of frames) {
    counts.set(primitive, (counts.get(primitive) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([primitive, count]) => ({
      primitive,
      count,
      percentage: (count / frames.length) * 100,
    }));
}

/**
 * Summarize a recording: metadata, primitive distribution, velocity and openness.
 */
export function summarizeRecording(record: SessionRecord): RecordingSummary {
  const { metadata, frames } = record;
  const primitives = primitiveShares(frames);
  const velocity = velocitySummary(frames);
  const openness = seriesStats(frames.map((frame) => frame.features.handOpenness));

  return {
    gestureName: metadata.gestureName,
    recordedAt: metadata.recordedAt,
    durationSeconds: metadata.durationSeconds,
    totalFrames: metadata.totalFrames,
    averageFps: metadata.averageFps,
    primitives,
    uniquePrimitiveCount: primitives.length,
    ...(velocity ? { velocity } : {}),
    ...(openness ? { openness } : {}),
  };
}

/**
 * Path of one landmark (or the palm center) over the recording, in frame order.
 */
export function extractTrajectory(
  record: SessionRecord,
  landmark: LandmarkName | 'palmCenter' = 'indexTip'
): Point2D[] {
  return record.frames.map((frame) =>
    landmark === 'palmCenter' ? frame.features.palmCenter : frame.landmarks[landmark]
  );
}

/**
 * A run of consecutive frames sharing one primitive.
 */
export interface PrimitiveSegment {
  readonly primitive: Primitive;
  readonly startFrame: number;
  readonly endFrame: number;
  /** Session-relative seconds */
  readonly startTime: number;
  readonly endTime: number;
}

/**
 * Collapse the per-frame primitives into run-length segments.
 */
export function primitiveTimeline(record: SessionRecord): PrimitiveSegment[] {
  const segments: PrimitiveSegment[] = [];
  let current: PrimitiveSegment | undefined;

  for (const frame of record.frames) {
    if (current && current.primitive === frame.primitive) {
      current = { ...current, endFrame: frame.frameIndex, endTime: frame.sessionRelativeTime };
      segments[segments.length - 1] = current;
      continue;
    }
    current = {
      primitive: frame.primitive,
      startFrame: frame.frameIndex,
      endFrame: frame.frameIndex,
      startTime: frame.sessionRelativeTime,
      endTime: frame.sessionRelativeTime,
    };
    segments.push(current);
  }

  return segments;
}

export interface RecordingOverview {
  readonly gestureName: string;
  readonly durationSeconds: number;
  readonly totalFrames: number;
  readonly averageFps: number;
}

export interface RecordingComparison {
  readonly first: RecordingOverview;
  readonly second: RecordingOverview;
  /** second minus first */
  readonly delta: Omit<RecordingOverview, 'gestureName'>;
}

function overview(record: SessionRecord): RecordingOverview {
  return {
    gestureName: record.metadata.gestureName,
    durationSeconds: record.metadata.durationSeconds,
    totalFrames: record.frames.length,
    averageFps: record.metadata.averageFps,
  };
}

/**
 * Side-by-side timing of two recordings, e.g. two attempts at the same sign.
 */
export function compareRecordings(first: SessionRecord, second: SessionRecord): RecordingComparison {
  const a = overview(first);
  const b = overview(second);
  return {
    first: a,
    second: b,
    delta: {
      durationSeconds: b.durationSeconds - a.durationSeconds,
      totalFrames: b.totalFrames - a.totalFrames,
      averageFps: b.averageFps - a.averageFps,
    },
  };
}
