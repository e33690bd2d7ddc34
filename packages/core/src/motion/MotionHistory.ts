import {
  type Clock,
  DEFAULT_WINDOW_SECONDS,
  type MotionDescriptor,
  type Primitive,
} from '@motion-kit/shared';
import { OutOfOrderAppendError } from '../errors.js';

/**
 * Wall clock in seconds since the Unix epoch.
 */
export const systemClock: Clock = {
  now: () => Date.now() / 1000,
};

/**
 * Ordered, append-only descriptors of one recording session.
 *
 * Also maintains the set of distinct primitives seen, kept in step with
 * `append` and `clear`. Descriptors are only ever removed all at once.
 */
export class MotionHistory {
  private descriptors: MotionDescriptor[] = [];
  private primitives = new Set<Primitive>();
  /** Source of "now" for windowed queries */
  readonly clock: Clock;
  private readonly defaultWindowSeconds: number;

  /**
   * @param clock - Source of "now" for windowed queries
   * @param defaultWindowSeconds - Look-back of `window()` when called without an argument
   */
  constructor(clock: Clock = systemClock, defaultWindowSeconds: number = DEFAULT_WINDOW_SECONDS) {
    this.clock = clock;
    this.defaultWindowSeconds = defaultWindowSeconds;
  }

  /**
   * Number of descriptors in the session.
   */
  get size(): number {
    return this.descriptors.length;
  }

  get isEmpty(): boolean {
    return this.descriptors.length === 0;
  }

  /**
   * First descriptor of the session, which defines its time origin.
   */
  get first(): MotionDescriptor | undefined {
    return this.descriptors[0];
  }

  /**
   * Most recent descriptor.
   */
  get last(): MotionDescriptor | undefined {
    return this.descriptors[this.descriptors.length - 1];
  }

  /**
   * Descriptor at a frame index, or undefined if out of range.
   */
  at(frameIndex: number): MotionDescriptor | undefined {
    return this.descriptors[frameIndex];
  }

  /**
   * Append the next descriptor of the session.
   * @throws {OutOfOrderAppendError} if the frame index is not the next one
   *   or the capture time precedes the last descriptor's
   */
  append(descriptor: MotionDescriptor): void {
    if (descriptor.frameIndex !== this.descriptors.length) {
      throw new OutOfOrderAppendError(
        `expected frame index ${this.descriptors.length}, got ${descriptor.frameIndex}`
      );
    }

    const last = this.last;
    if (last && descriptor.captureTime < last.captureTime) {
      throw new OutOfOrderAppendError(
        `capture time ${descriptor.captureTime} precedes ${last.captureTime}`
      );
    }

    this.descriptors.push(descriptor);
    this.primitives.add(descriptor.primitive);
  }

  /**
   * Descriptors captured within the last `seconds` of the current wall clock.
   * The cutoff is measured from now, not from the last descriptor.
   */
  window(seconds: number = this.defaultWindowSeconds): MotionDescriptor[] {
    const cutoff = this.clock.now() - seconds;
    return this.descriptors.filter((descriptor) => descriptor.captureTime > cutoff);
  }

  /**
   * Primitive labels of `window(seconds)`, in capture order.
   */
  primitivesSequence(seconds: number = this.defaultWindowSeconds): Primitive[] {
    return this.window(seconds).map((descriptor) => descriptor.primitive);
  }

  /**
   * Distinct primitives seen in this session, in first-seen order.
   */
  distinctPrimitives(): Primitive[] {
    return [...this.primitives];
  }

  /**
   * Copy of all descriptors, in frame order.
   */
  snapshot(): readonly MotionDescriptor[] {
    return [...this.descriptors];
  }

  /**
   * Discard every descriptor and the primitive set.
   */
  clear(): void {
    this.descriptors = [];
    this.primitives = new Set();
  }
}
