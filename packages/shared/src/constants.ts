/**
 * @fileoverview Shared constants for the motion descriptor toolkit.
 * These are compile-time constants; thresholds that depend on the capture
 * setup are only defaults and can be overridden through configuration.
 */

// ============ Hand Topology ============

/**
 * Number of landmarks the detector reports per hand.
 */
export const LANDMARK_COUNT = 21;

/**
 * Number of finger-extension flags per frame.
 */
export const FINGER_COUNT = 5;

/**
 * Landmark indices in the standard 21-point hand topology.
 */
export const HAND_LANDMARKS = {
  WRIST: 0,
  THUMB_TIP: 4,
  INDEX_TIP: 8,
  MIDDLE_BASE: 9,
  MIDDLE_TIP: 12,
  RING_TIP: 16,
  PINKY_TIP: 20,
} as const;

/**
 * Landmarks copied into every descriptor, keyed by descriptor field name.
 */
export const NAMED_LANDMARKS = {
  wrist: HAND_LANDMARKS.WRIST,
  thumbTip: HAND_LANDMARKS.THUMB_TIP,
  indexTip: HAND_LANDMARKS.INDEX_TIP,
  middleTip: HAND_LANDMARKS.MIDDLE_TIP,
  ringTip: HAND_LANDMARKS.RING_TIP,
  pinkyTip: HAND_LANDMARKS.PINKY_TIP,
} as const;

// ============ Primitives ============

/**
 * Labels the classifier can produce, besides the `UNKNOWN_<code>` fallback.
 */
export const PRIMITIVES = [
  'POINT',
  'PEACE_V',
  'OPEN_HAND',
  'FIST',
  'THUMBS_UP',
  'OK_SIGN',
  'PINCH_READY',
  'THREE',
  'FOUR',
  'PINKY',
] as const;

/**
 * Prefix of the label given to unmatched handshapes.
 */
export const UNKNOWN_PRIMITIVE_PREFIX = 'UNKNOWN_';

// ============ Default Tunables ============

/**
 * Thumb-to-index distance (pixels) below which the fingers count as touching.
 * Resolution-dependent.
 */
export const DEFAULT_PINCH_THRESHOLD_PX = 40;

/**
 * Default look-back for windowed history queries (seconds).
 */
export const DEFAULT_WINDOW_SECONDS = 2;

/**
 * Recording quality defaults used by batch recording and dataset analysis.
 */
export const DEFAULT_QUALITY_THRESHOLDS = {
  minFps: 25,
  minFrames: 30,
  minRecordableFrames: 20,
  targetFps: 30,
  targetFrames: 90,
} as const;
