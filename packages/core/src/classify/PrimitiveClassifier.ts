/**
 * @fileoverview Handshape-to-primitive classification.
 *
 * Rules are evaluated in table order and the first match wins. Several
 * predicates could overlap (FIST is tested before THUMBS_UP, for instance),
 * so the order of PRIMITIVE_RULES is part of the contract.
 */

import {
  DEFAULT_PINCH_THRESHOLD_PX,
  type FingerFlags,
  type Primitive,
  UNKNOWN_PRIMITIVE_PREFIX,
} from '@motion-kit/shared';

/**
 * Input of a classification rule.
 */
export interface ClassificationInput {
  readonly fingers: FingerFlags;
  readonly pinchDistance: number;
  readonly pinchThresholdPx: number;
}

/**
 * One row of the classification table.
 */
export interface PrimitiveRule {
  /** Human-readable name used in diagnostics */
  readonly name: string;
  /** Returns the label when the rule applies, null otherwise */
  readonly apply: (input: ClassificationInput) => Primitive | null;
}

/**
 * Encode the finger vector as a compact string, e.g. [0,1,0,0,0] -> "01000".
 */
export function encodeHandshape(fingers: readonly number[]): string {
  return fingers.join('');
}

function exactly(pattern: string, label: Primitive): PrimitiveRule {
  return {
    name: `${pattern} -> ${label}`,
    apply: ({ fingers }) => (encodeHandshape(fingers) === pattern ? label : null),
  };
}

/**
 * The ordered classification table.
 */
export const PRIMITIVE_RULES: readonly PrimitiveRule[] = [
  exactly('01000', 'POINT'),
  exactly('01100', 'PEACE_V'),
  exactly('11111', 'OPEN_HAND'),
  {
    name: 'no fingers -> FIST',
    apply: ({ fingers }) => (fingers.every((flag) => flag === 0) ? 'FIST' : null),
  },
  exactly('10000', 'THUMBS_UP'),
  {
    name: '11000 -> OK_SIGN | PINCH_READY',
    apply: ({ fingers, pinchDistance, pinchThresholdPx }) => {
      if (encodeHandshape(fingers) !== '11000') return null;
      return pinchDistance < pinchThresholdPx ? 'OK_SIGN' : 'PINCH_READY';
    },
  },
  exactly('01110', 'THREE'),
  exactly('01111', 'FOUR'),
  exactly('00001', 'PINKY'),
];

export interface PrimitiveClassifierOptions {
  /**
   * Thumb/index distance in pixels below which [1,1,0,0,0] is an OK sign.
   * @default 40
   */
  readonly pinchThresholdPx?: number;
}

/**
 * Deterministic, stateless classifier from finger flags to a primitive label.
 */
export class PrimitiveClassifier {
  readonly pinchThresholdPx: number;

  constructor(options: PrimitiveClassifierOptions = {}) {
    this.pinchThresholdPx = options.pinchThresholdPx ?? DEFAULT_PINCH_THRESHOLD_PX;
  }

  /**
   * Classify a handshape. Total: unmatched shapes yield `UNKNOWN_<code>`.
   */
  classify(fingers: FingerFlags, pinchDistance: number): Primitive {
    const input: ClassificationInput = {
      fingers,
      pinchDistance,
      pinchThresholdPx: this.pinchThresholdPx,
    };
    for (const rule of PRIMITIVE_RULES) {
      const label = rule.apply(input);
      if (label !== null) {
        return label;
      }
    }
    return `${UNKNOWN_PRIMITIVE_PREFIX}${encodeHandshape(fingers)}`;
  }
}
