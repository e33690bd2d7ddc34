/**
 * @fileoverview Error taxonomy of the motion descriptor core.
 *
 * - InvalidFrameError: malformed detector frame, the caller skips the tick
 * - OutOfOrderAppendError: history invariant violated, a caller bug
 * - EmptyHistoryError: export attempted with zero frames
 * - MalformedRecordError: a session file that does not match the exchange format
 */

/**
 * Base class for all errors raised by the toolkit.
 */
export class MotionDescriptorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MotionDescriptorError';
  }
}

/**
 * Error thrown when a landmark frame has too few points or a bad finger vector.
 */
export class InvalidFrameError extends MotionDescriptorError {
  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid landmark frame: ${reason}`, options);
    this.name = 'InvalidFrameError';
  }
}

/**
 * Error thrown when a descriptor would break frame-index or capture-time ordering.
 */
export class OutOfOrderAppendError extends MotionDescriptorError {
  constructor(reason: string) {
    super(`Out-of-order append: ${reason}`);
    this.name = 'OutOfOrderAppendError';
  }
}

/**
 * Error thrown when exporting a session that has no descriptors.
 */
export class EmptyHistoryError extends MotionDescriptorError {
  constructor() {
    super('Cannot export an empty motion history');
    this.name = 'EmptyHistoryError';
  }
}

/**
 * Error thrown when a session file cannot be loaded.
 */
export class MalformedRecordError extends MotionDescriptorError {
  constructor(reason: string, options?: ErrorOptions) {
    super(`Malformed session record: ${reason}`, options);
    this.name = 'MalformedRecordError';
  }
}

/**
 * Error thrown when the configuration file fails validation.
 */
export class InvalidConfigError extends MotionDescriptorError {
  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid motion configuration: ${reason}`, options);
    this.name = 'InvalidConfigError';
  }
}

/**
 * Format the issues of a zod error as `path: message` pairs.
 */
export function describeIssues(issues: readonly { path: (string | number)[]; message: string }[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
