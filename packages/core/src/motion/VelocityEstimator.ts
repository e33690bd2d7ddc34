/**
 * @fileoverview Index-fingertip velocity between consecutive descriptors.
 */

import type { MotionDescriptor, Point2D, Velocity } from '@motion-kit/shared';

/**
 * Estimate velocity (px/s) of the index tip relative to the previous descriptor.
 *
 * Returns undefined rather than a zero vector when velocity cannot be
 * measured: no previous descriptor, or no time elapsed since it.
 */
export function estimateVelocity(
  indexTip: Point2D,
  captureTime: number,
  previous: MotionDescriptor | undefined
): Velocity | undefined {
  if (!previous) return undefined;

  const dt = captureTime - previous.captureTime;
  if (dt === 0) return undefined;

  const vx = (indexTip.x - previous.landmarks.indexTip.x) / dt;
  const vy = (indexTip.y - previous.landmarks.indexTip.y) / dt;

  return {
    vx,
    vy,
    magnitude: Math.hypot(vx, vy),
    directionRadians: Math.atan2(vy, vx),
  };
}
