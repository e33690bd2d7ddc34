/**
 * @fileoverview Assembles one MotionDescriptor per detector frame.
 *
 * The builder is the only writer of its MotionHistory: every successful
 * `build` appends exactly one descriptor and nothing else mutates it.
 */

import {
  type Clock,
  type FrameSize,
  type LandmarkFrame,
  LandmarkFrameSchema,
  type MotionDescriptor,
  NAMED_LANDMARKS,
  type NamedLandmarks,
  type NormalizedLandmarks,
  type Point2D,
} from '@motion-kit/shared';
import { encodeHandshape, PrimitiveClassifier } from '../classify/PrimitiveClassifier.js';
import { describeIssues, InvalidFrameError } from '../errors.js';
import { extractFeatures, indexLandmarks, type LandmarkLookup } from '../features/FeatureExtractor.js';
import { createLogger } from '../utils/logger.js';
import type { MotionHistory } from './MotionHistory.js';
import { estimateVelocity } from './VelocityEstimator.js';

const log = createLogger('builder');

export interface MotionDescriptorBuilderOptions {
  /** Classifier to use; built from `pinchThresholdPx` when omitted */
  readonly classifier?: PrimitiveClassifier;
  readonly pinchThresholdPx?: number;
  /** Source of capture timestamps; defaults to the history's clock */
  readonly clock?: Clock;
}

function namedLandmarks(lookup: LandmarkLookup): NamedLandmarks {
  const pick = (index: number): Point2D => {
    const point = lookup.get(index);
    if (!point) {
      throw new InvalidFrameError(`missing landmark ${index}`);
    }
    return Object.freeze({ x: point.x, y: point.y });
  };

  return Object.freeze({
    wrist: pick(NAMED_LANDMARKS.wrist),
    thumbTip: pick(NAMED_LANDMARKS.thumbTip),
    indexTip: pick(NAMED_LANDMARKS.indexTip),
    middleTip: pick(NAMED_LANDMARKS.middleTip),
    ringTip: pick(NAMED_LANDMARKS.ringTip),
    pinkyTip: pick(NAMED_LANDMARKS.pinkyTip),
  });
}

/**
 * Scale named landmarks and the palm center to [0, 1] by the frame size.
 */
export function normalizeLandmarks(
  landmarks: NamedLandmarks,
  palm: Point2D,
  frameSize: FrameSize
): NormalizedLandmarks {
  const scale = (point: Point2D): Point2D =>
    Object.freeze({ x: point.x / frameSize.width, y: point.y / frameSize.height });

  return Object.freeze({
    wrist: scale(landmarks.wrist),
    thumbTip: scale(landmarks.thumbTip),
    indexTip: scale(landmarks.indexTip),
    middleTip: scale(landmarks.middleTip),
    ringTip: scale(landmarks.ringTip),
    pinkyTip: scale(landmarks.pinkyTip),
    palmCenter: scale(palm),
  });
}

/**
 * Turns detector frames into descriptors and appends them to a history.
 *
 * @example
 * ```typescript
 * const history = new MotionHistory();
 * const builder = new MotionDescriptorBuilder(history);
 *
 * const descriptor = builder.tryBuild(frame, { width: 640, height: 480 });
 * if (descriptor) {
 *   console.log(descriptor.primitive);
 * }
 * ```
 */
export class MotionDescriptorBuilder {
  readonly history: MotionHistory;
  private readonly classifier: PrimitiveClassifier;
  private readonly clock: Clock;

  constructor(history: MotionHistory, options: MotionDescriptorBuilderOptions = {}) {
    this.history = history;
    this.classifier =
      options.classifier ??
      new PrimitiveClassifier(
        options.pinchThresholdPx !== undefined ? { pinchThresholdPx: options.pinchThresholdPx } : {}
      );
    this.clock = options.clock ?? history.clock;
  }

  /**
   * Build the next descriptor of the session and append it to the history.
   * @param frame - Detector output for this tick
   * @param frameSize - Capture resolution; enables normalized landmarks
   * @throws {InvalidFrameError} if the frame is malformed; the history is unchanged
   */
  build(frame: LandmarkFrame, frameSize?: FrameSize): MotionDescriptor {
    const parsed = LandmarkFrameSchema.safeParse(frame);
    if (!parsed.success) {
      throw new InvalidFrameError(describeIssues(parsed.error.issues), { cause: parsed.error });
    }
    if (frameSize && (!(frameSize.width > 0) || !(frameSize.height > 0))) {
      throw new InvalidFrameError(`frame size must be positive, got ${frameSize.width}x${frameSize.height}`);
    }

    const { points, fingers, hand } = parsed.data;
    const lookup = indexLandmarks(points);
    const landmarks = namedLandmarks(lookup);
    const extracted = extractFeatures(points, fingers);
    const features = Object.freeze({ ...extracted, palmCenter: Object.freeze({ ...extracted.palmCenter }) });

    const captureTime = this.clock.now();
    const origin = this.history.first?.captureTime ?? captureTime;
    const velocity = estimateVelocity(landmarks.indexTip, captureTime, this.history.last);

    const descriptor: MotionDescriptor = Object.freeze({
      captureTime,
      sessionRelativeTime: captureTime - origin,
      frameIndex: this.history.size,
      ...(hand ? { hand } : {}),
      fingersExtended: Object.freeze(fingers),
      fingerCount: fingers.reduce<number>((sum, flag) => sum + flag, 0),
      handshapeCode: encodeHandshape(fingers),
      landmarks,
      features,
      primitive: this.classifier.classify(fingers, features.pinchDistance),
      ...(velocity ? { velocity: Object.freeze(velocity) } : {}),
      ...(frameSize ? { normalizedLandmarks: normalizeLandmarks(landmarks, features.palmCenter, frameSize) } : {}),
    });

    this.history.append(descriptor);
    return descriptor;
  }

  /**
   * Like `build`, but returns null for an invalid frame so the caller can skip the tick.
   */
  tryBuild(frame: LandmarkFrame, frameSize?: FrameSize): MotionDescriptor | null {
    try {
      return this.build(frame, frameSize);
    } catch (error) {
      if (error instanceof InvalidFrameError) {
        log.debug('Skipping invalid frame', { reason: error.message, frameIndex: this.history.size });
        return null;
      }
      throw error;
    }
  }
}
