import { createManualClock, createMockFrame, createMockPoints, type ManualClock } from '@motion-kit/testing';
import { beforeEach, describe, expect, it } from 'vitest';
import { PrimitiveClassifier } from '../src/classify/PrimitiveClassifier.js';
import { InvalidFrameError } from '../src/errors.js';
import { extractFeatures } from '../src/features/FeatureExtractor.js';
import { MotionDescriptorBuilder } from '../src/motion/MotionDescriptorBuilder.js';
import { MotionHistory } from '../src/motion/MotionHistory.js';

describe('MotionDescriptorBuilder', () => {
  let clock: ManualClock;
  let history: MotionHistory;
  let builder: MotionDescriptorBuilder;

  beforeEach(() => {
    clock = createManualClock(0);
    history = new MotionHistory(clock);
    builder = new MotionDescriptorBuilder(history, { clock });
  });

  describe('a short session', () => {
    it('should build open hand, open hand, fist', () => {
      const first = builder.build(createMockFrame());
      clock.set(0.1);
      const second = builder.build(createMockFrame({ x: 330 }));
      clock.set(0.2);
      const third = builder.build(createMockFrame({ x: 330, fingers: [0, 0, 0, 0, 0] }));

      expect([first.primitive, second.primitive, third.primitive]).toEqual(['OPEN_HAND', 'OPEN_HAND', 'FIST']);
      expect([first.frameIndex, second.frameIndex, third.frameIndex]).toEqual([0, 1, 2]);
      expect(third.sessionRelativeTime).toBeCloseTo(0.2, 10);
      expect(history.size).toBe(3);
      expect(history.distinctPrimitives()).toEqual(['OPEN_HAND', 'FIST']);
    });

    it('should leave the first descriptor without velocity', () => {
      const first = builder.build(createMockFrame());
      expect(first.velocity).toBeUndefined();
      expect(first.sessionRelativeTime).toBe(0);
    });

    it('should measure index-tip velocity from the previous descriptor', () => {
      builder.build(createMockFrame());
      clock.set(0.1);
      const second = builder.build(createMockFrame({ x: 330 }));

      expect(second.velocity?.vx).toBeCloseTo(100, 6);
      expect(second.velocity?.vy).toBe(0);
      expect(second.velocity?.magnitude).toBeCloseTo(100, 6);
      expect(second.velocity?.directionRadians).toBe(0);
    });

    it('should omit velocity when two frames share a capture time', () => {
      builder.build(createMockFrame());
      const second = builder.build(createMockFrame({ x: 330 }));
      expect(second.velocity).toBeUndefined();
    });
  });

  describe('descriptor fields', () => {
    it('should copy finger flags, handshape and named landmarks', () => {
      const descriptor = builder.build(createMockFrame({ fingers: [0, 1, 1, 0, 0], hand: 'left' }));

      expect(descriptor.fingersExtended).toEqual([0, 1, 1, 0, 0]);
      expect(descriptor.fingerCount).toBe(2);
      expect(descriptor.handshapeCode).toBe('01100');
      expect(descriptor.primitive).toBe('PEACE_V');
      expect(descriptor.hand).toBe('left');
      expect(descriptor.landmarks).toEqual({
        wrist: { x: 320, y: 400 },
        thumbTip: { x: 240, y: 260 },
        indexTip: { x: 280, y: 240 },
        middleTip: { x: 320, y: 220 },
        ringTip: { x: 360, y: 240 },
        pinkyTip: { x: 390, y: 270 },
      });
      expect(descriptor.features.handOpenness).toBe(0.4);
      expect(descriptor.features.palmCenter).toEqual({ x: 320, y: 380 });
    });

    it('should omit hand when the detector does not report it', () => {
      const descriptor = builder.build(createMockFrame());
      expect('hand' in descriptor).toBe(false);
    });

    it('should be deeply immutable', () => {
      const descriptor = builder.build(createMockFrame());
      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(Object.isFrozen(descriptor.landmarks)).toBe(true);
      expect(Object.isFrozen(descriptor.landmarks.indexTip)).toBe(true);
      expect(Object.isFrozen(descriptor.features)).toBe(true);
      expect(Object.isFrozen(descriptor.fingersExtended)).toBe(true);
    });

    it('should normalize landmarks by the frame size', () => {
      const descriptor = builder.build(createMockFrame(), { width: 640, height: 480 });

      expect(descriptor.normalizedLandmarks?.indexTip).toEqual({ x: 0.4375, y: 0.5 });
      expect(descriptor.normalizedLandmarks?.wrist.x).toBe(0.5);
      expect(descriptor.normalizedLandmarks?.palmCenter.y).toBeCloseTo(380 / 480, 10);
    });

    it('should omit normalized landmarks without a frame size', () => {
      expect(builder.build(createMockFrame()).normalizedLandmarks).toBeUndefined();
    });
  });

  describe('clock', () => {
    it("should take capture times from the history's clock by default", () => {
      const own = new MotionDescriptorBuilder(history);
      clock.set(42);
      own.build(createMockFrame());
      clock.set(42.5);

      expect(own.build(createMockFrame()).captureTime).toBe(42.5);
      expect(history.window(1).map((d) => d.captureTime)).toEqual([42, 42.5]);
    });

    it('should prefer an injected clock', () => {
      const fixed = new MotionDescriptorBuilder(history, { clock: createManualClock(7) });
      expect(fixed.build(createMockFrame()).captureTime).toBe(7);
    });
  });

  it('should carry the features extracted from the frame', () => {
    const frame = createMockFrame({ fingers: [1, 1, 0, 0, 0], pinching: true });
    expect(builder.build(frame).features).toEqual(extractFeatures(frame.points, frame.fingers));
  });

  it('should classify POINT wherever the hand is', () => {
    const near = builder.build(createMockFrame({ fingers: [0, 1, 0, 0, 0] }));
    const far = builder.build(createMockFrame({ x: 20, y: 900, fingers: [0, 1, 0, 0, 0], pinching: true }));

    expect(near.primitive).toBe('POINT');
    expect(far.primitive).toBe('POINT');
  });

  describe('pinch threshold', () => {
    it('should classify an open thumb and index as PINCH_READY by default', () => {
      expect(builder.build(createMockFrame({ fingers: [1, 1, 0, 0, 0] })).primitive).toBe('PINCH_READY');
    });

    it('should classify touching tips as OK_SIGN', () => {
      const descriptor = builder.build(createMockFrame({ fingers: [1, 1, 0, 0, 0], pinching: true }));
      expect(descriptor.features.pinchDistance).toBe(20);
      expect(descriptor.primitive).toBe('OK_SIGN');
    });

    it('should apply a configured threshold', () => {
      const wide = new MotionDescriptorBuilder(history, { clock, pinchThresholdPx: 50 });
      expect(wide.build(createMockFrame({ fingers: [1, 1, 0, 0, 0] })).primitive).toBe('OK_SIGN');
    });

    it('should prefer an injected classifier', () => {
      const strict = new MotionDescriptorBuilder(history, {
        clock,
        classifier: new PrimitiveClassifier({ pinchThresholdPx: 10 }),
        pinchThresholdPx: 100,
      });
      const descriptor = strict.build(createMockFrame({ fingers: [1, 1, 0, 0, 0], pinching: true }));
      expect(descriptor.primitive).toBe('PINCH_READY');
    });
  });

  describe('invalid frames', () => {
    it('should reject a frame with fewer than 21 points', () => {
      expect(() => builder.build(createMockFrame({ pointCount: 10 }))).toThrow(InvalidFrameError);
      expect(history.size).toBe(0);
    });

    it('should not consume a frame index for a rejected frame', () => {
      builder.build(createMockFrame());
      expect(builder.tryBuild(createMockFrame({ pointCount: 10 }))).toBeNull();
      clock.set(0.1);
      expect(builder.build(createMockFrame()).frameIndex).toBe(1);
    });

    it('should reject a finger vector that is not five flags', () => {
      expect(() => builder.build({ points: createMockPoints(), fingers: [1, 1, 1] })).toThrow(InvalidFrameError);
      expect(() => builder.build({ points: createMockPoints(), fingers: [2, 0, 0, 0, 0] })).toThrow(
        InvalidFrameError
      );
    });

    it('should reject a frame missing a named landmark', () => {
      const points = createMockPoints().map((point) => (point.index === 20 ? { ...point, index: 19 } : point));
      expect(() => builder.build({ points, fingers: [1, 1, 1, 1, 1] })).toThrow(
        'Invalid landmark frame: missing landmark 20'
      );
    });

    it('should reject a non-positive frame size', () => {
      expect(() => builder.build(createMockFrame(), { width: 0, height: 480 })).toThrow(
        'Invalid landmark frame: frame size must be positive, got 0x480'
      );
      expect(history.size).toBe(0);
    });

    it('should accept extra points beyond 21', () => {
      const points = [...createMockPoints(), { index: 8, x: 0, y: 0 }];
      const descriptor = builder.build({ points, fingers: [1, 1, 1, 1, 1] });
      expect(descriptor.landmarks.indexTip).toEqual({ x: 280, y: 240 });
    });
  });
});
