/**
 * @fileoverview Summary statistics over a session's descriptors.
 */

import type { MotionDescriptor, StatisticsResult, VelocityStats } from '@motion-kit/shared';

/**
 * Seconds between the first and last capture, 0 with fewer than two frames.
 */
export function sessionDuration(descriptors: readonly MotionDescriptor[]): number {
  const first = descriptors[0];
  const last = descriptors[descriptors.length - 1];
  if (!first || !last || descriptors.length < 2) return 0;
  return last.captureTime - first.captureTime;
}

/**
 * Frames per second over the session, 0 when the duration is 0.
 */
export function averageFps(frameCount: number, durationSeconds: number): number {
  return durationSeconds > 0 ? frameCount / durationSeconds : 0;
}

/**
 * Occurrences of each primitive label.
 */
export function countPrimitives(descriptors: readonly MotionDescriptor[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const { primitive } of descriptors) {
    counts[primitive] = (counts[primitive] ?? 0) + 1;
  }
  return counts;
}

/**
 * Mean, max and min velocity magnitude over descriptors that carry a velocity.
 */
export function velocityStats(descriptors: readonly MotionDescriptor[]): VelocityStats | undefined {
  const magnitudes = descriptors.flatMap((d) => (d.velocity ? [d.velocity.magnitude] : []));
  if (magnitudes.length === 0) return undefined;

  const total = magnitudes.reduce((sum, value) => sum + value, 0);
  return {
    mean: total / magnitudes.length,
    max: magnitudes.reduce((max, value) => Math.max(max, value), -Infinity),
    min: magnitudes.reduce((min, value) => Math.min(min, value), Infinity),
  };
}

/**
 * Aggregate statistics over a snapshot of a history.
 * An empty snapshot yields `{ kind: 'empty' }` instead of dividing by zero.
 */
export function aggregateStatistics(descriptors: readonly MotionDescriptor[]): StatisticsResult {
  if (descriptors.length === 0) {
    return { kind: 'empty' };
  }

  const durationSeconds = sessionDuration(descriptors);
  const primitiveCounts = countPrimitives(descriptors);
  const velocity = velocityStats(descriptors);

  return {
    kind: 'stats',
    durationSeconds,
    totalFrames: descriptors.length,
    averageFps: averageFps(descriptors.length, durationSeconds),
    primitiveCounts,
    uniquePrimitiveCount: Object.keys(primitiveCounts).length,
    ...(velocity ? { velocityStats: velocity } : {}),
  };
}
