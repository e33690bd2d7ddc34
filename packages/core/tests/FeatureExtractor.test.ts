import { createMockPoints } from '@motion-kit/testing';
import { describe, expect, it } from 'vitest';
import {
  extractFeatures,
  handOpenness,
  handSpan,
  indexLandmarks,
  palmCenter,
  pinchDistance,
} from '../src/features/FeatureExtractor.js';

describe('FeatureExtractor', () => {
  describe('indexLandmarks', () => {
    it('should key points by their index field', () => {
      const lookup = indexLandmarks([
        { index: 8, x: 1, y: 2 },
        { index: 0, x: 3, y: 4 },
      ]);
      expect(lookup.get(8)).toEqual({ x: 1, y: 2 });
      expect(lookup.get(0)).toEqual({ x: 3, y: 4 });
    });

    it('should keep the first occurrence of a repeated index', () => {
      const lookup = indexLandmarks([
        { index: 4, x: 10, y: 10 },
        { index: 4, x: 99, y: 99 },
      ]);
      expect(lookup.get(4)).toEqual({ x: 10, y: 10 });
    });
  });

  describe('pinchDistance', () => {
    it('should measure thumb tip to index tip', () => {
      const lookup = indexLandmarks(createMockPoints());
      expect(pinchDistance(lookup)).toBeCloseTo(Math.sqrt(2000), 10);
    });

    it('should be 20 px for a pinching hand', () => {
      const lookup = indexLandmarks(createMockPoints({ pinching: true }));
      expect(pinchDistance(lookup)).toBe(20);
    });

    it('should be 0 when a tip is missing', () => {
      const lookup = indexLandmarks(createMockPoints().filter((p) => p.index !== 8));
      expect(pinchDistance(lookup)).toBe(0);
    });
  });

  describe('handSpan', () => {
    it('should measure thumb tip to pinky tip', () => {
      const lookup = indexLandmarks(createMockPoints());
      expect(handSpan(lookup)).toBeCloseTo(Math.sqrt(22600), 10);
    });

    it('should be 0 when the pinky tip is missing', () => {
      const lookup = indexLandmarks(createMockPoints().slice(0, 20));
      expect(handSpan(lookup)).toBe(0);
    });
  });

  describe('handOpenness', () => {
    it('should be the fraction of extended fingers', () => {
      expect(handOpenness([0, 0, 0, 0, 0])).toBe(0);
      expect(handOpenness([0, 1, 1, 0, 0])).toBe(0.4);
      expect(handOpenness([1, 1, 1, 1, 1])).toBe(1);
    });
  });

  describe('palmCenter', () => {
    it('should be the midpoint of wrist and middle-finger base', () => {
      const lookup = indexLandmarks(createMockPoints({ x: 100, y: 200 }));
      expect(palmCenter(lookup)).toEqual({ x: 100, y: 180 });
    });

    it('should fall back to the origin when the wrist is missing', () => {
      const lookup = indexLandmarks(createMockPoints().slice(1));
      expect(palmCenter(lookup)).toEqual({ x: 0, y: 0 });
    });
  });

  describe('extractFeatures', () => {
    it('should compute every feature of a frame', () => {
      const features = extractFeatures(createMockPoints({ pinching: true }), [1, 1, 0, 0, 0]);
      expect(features.pinchDistance).toBe(20);
      expect(features.handOpenness).toBe(0.4);
      // pinched thumb tip (280, 260) to pinky tip (390, 270)
      expect(features.handSpan).toBeCloseTo(Math.hypot(110, 10), 10);
      expect(features.palmCenter).toEqual({ x: 320, y: 380 });
    });

    it('should not throw on an empty point list', () => {
      expect(extractFeatures([], [0, 0, 0, 0, 0])).toEqual({
        pinchDistance: 0,
        handOpenness: 0,
        handSpan: 0,
        palmCenter: { x: 0, y: 0 },
      });
    });
  });
});
