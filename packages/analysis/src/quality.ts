/**
 * @fileoverview Recording quality heuristics.
 * Thresholds depend on camera frame rate and gesture length, so every
 * function takes them as input; defaults come from the shared constants.
 */

import type { QualityThresholds } from '@motion-kit/core';
import { DEFAULT_QUALITY_THRESHOLDS } from '@motion-kit/shared';

export type QualityBand = 'high' | 'medium' | 'low';

export interface QualityAssessment {
  readonly warnings: readonly string[];
  readonly acceptable: boolean;
}

/**
 * Frame rate and length of a recording.
 */
export interface RecordingTiming {
  readonly averageFps: number;
  readonly totalFrames: number;
}

/**
 * Check a recording against the minimum frame rate and frame count.
 */
export function assessQuality(
  timing: RecordingTiming,
  thresholds: Pick<QualityThresholds, 'minFps' | 'minFrames'> = DEFAULT_QUALITY_THRESHOLDS
): QualityAssessment {
  const warnings: string[] = [];

  if (timing.averageFps < thresholds.minFps) {
    warnings.push(`Low FPS (< ${thresholds.minFps})`);
  }
  if (timing.totalFrames < thresholds.minFrames) {
    warnings.push(`Too few frames (< ${thresholds.minFrames})`);
  }

  return { warnings, acceptable: warnings.length === 0 };
}

/**
 * Whether a take has enough frames to be saved at all.
 */
export function isRecordable(
  frameCount: number,
  minRecordableFrames: number = DEFAULT_QUALITY_THRESHOLDS.minRecordableFrames
): boolean {
  return frameCount >= minRecordableFrames;
}

/**
 * Score in [0, 1]: the mean of fps and frame count, each relative to its target and capped at 1.
 */
export function qualityScore(
  timing: RecordingTiming,
  targets: Pick<QualityThresholds, 'targetFps' | 'targetFrames'> = DEFAULT_QUALITY_THRESHOLDS
): number {
  const fpsScore = Math.min(timing.averageFps / targets.targetFps, 1);
  const frameScore = Math.min(timing.totalFrames / targets.targetFrames, 1);
  return (fpsScore + frameScore) / 2;
}

/**
 * high: > 0.9, medium: 0.7-0.9, low: < 0.7
 */
export function qualityBand(score: number): QualityBand {
  if (score > 0.9) return 'high';
  if (score >= 0.7) return 'medium';
  return 'low';
}
