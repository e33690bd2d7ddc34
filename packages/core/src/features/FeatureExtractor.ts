/**
 * @fileoverview Geometric features derived from one landmark frame.
 */

import {
  FINGER_COUNT,
  HAND_LANDMARKS,
  type HandFeatures,
  type LandmarkPoint,
  type Point2D,
} from '@motion-kit/shared';

/**
 * Landmarks of a frame keyed by topology index.
 */
export type LandmarkLookup = ReadonlyMap<number, Point2D>;

const ORIGIN: Point2D = { x: 0, y: 0 };

/**
 * Index the points of a frame by their `index` field.
 * When an index repeats, the first occurrence wins.
 */
export function indexLandmarks(points: readonly LandmarkPoint[]): LandmarkLookup {
  const lookup = new Map<number, Point2D>();
  for (const point of points) {
    if (!lookup.has(point.index)) {
      lookup.set(point.index, { x: point.x, y: point.y });
    }
  }
  return lookup;
}

function distanceBetween(lookup: LandmarkLookup, from: number, to: number): number {
  const a = lookup.get(from);
  const b = lookup.get(to);
  if (!a || !b) return 0;
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Distance between thumb tip and index tip, 0 when either is missing.
 */
export function pinchDistance(lookup: LandmarkLookup): number {
  return distanceBetween(lookup, HAND_LANDMARKS.THUMB_TIP, HAND_LANDMARKS.INDEX_TIP);
}

/**
 * Distance between thumb tip and pinky tip, 0 when either is missing.
 */
export function handSpan(lookup: LandmarkLookup): number {
  return distanceBetween(lookup, HAND_LANDMARKS.THUMB_TIP, HAND_LANDMARKS.PINKY_TIP);
}

/**
 * Fraction of extended fingers.
 */
export function handOpenness(fingers: readonly number[]): number {
  const extended = fingers.reduce((sum, flag) => sum + flag, 0);
  return extended / FINGER_COUNT;
}

/**
 * Midpoint of the wrist and the middle-finger base, origin when either is missing.
 */
export function palmCenter(lookup: LandmarkLookup): Point2D {
  const wrist = lookup.get(HAND_LANDMARKS.WRIST);
  const middleBase = lookup.get(HAND_LANDMARKS.MIDDLE_BASE);
  if (!wrist || !middleBase) return ORIGIN;
  return {
    x: (wrist.x + middleBase.x) / 2,
    y: (wrist.y + middleBase.y) / 2,
  };
}

/**
 * Compute all derived features of a frame. Never throws on short point lists.
 */
export function extractFeatures(points: readonly LandmarkPoint[], fingers: readonly number[]): HandFeatures {
  const lookup = indexLandmarks(points);
  return {
    pinchDistance: pinchDistance(lookup),
    handOpenness: handOpenness(fingers),
    handSpan: handSpan(lookup),
    palmCenter: palmCenter(lookup),
  };
}
