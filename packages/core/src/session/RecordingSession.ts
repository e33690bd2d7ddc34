/**
 * @fileoverview Session-scoped recording lifecycle.
 *
 * Replaces a shared, process-wide history with an explicit value that the
 * capture loop creates, feeds one frame per tick, and then either finishes
 * (export) or cancels (clear).
 */

import type {
  Clock,
  FrameSize,
  LandmarkFrame,
  MotionDescriptor,
  SessionRecord,
  StatisticsResult,
} from '@motion-kit/shared';
import type { MotionConfig } from '../config/motionConfig.js';
import { MotionDescriptorBuilder } from '../motion/MotionDescriptorBuilder.js';
import { MotionHistory, systemClock } from '../motion/MotionHistory.js';
import { aggregateStatistics } from '../stats/StatisticsAggregator.js';
import { createLogger } from '../utils/logger.js';
import { type ExportOptions, exportSession } from './SessionSerializer.js';
import { type SessionFileNameOptions, writeSessionFile } from './sessionFiles.js';

const log = createLogger('session');

export interface RecordingSessionOptions {
  readonly pinchThresholdPx?: number;
  /** Default look-back of `history.window()` */
  readonly windowSeconds?: number;
  /** Directory written by `save` (default: motion_data) */
  readonly outputDir?: string;
  readonly clock?: Clock;
}

export interface SaveOptions extends ExportOptions, SessionFileNameOptions {}

export interface SavedSession {
  readonly record: SessionRecord;
  readonly path: string;
}

/**
 * One recording session: a history plus the builder that feeds it.
 *
 * @example
 * ```typescript
 * const session = new RecordingSession();
 * session.start();
 * for (const frame of frames) {
 *   session.record(frame);
 * }
 * const record = session.finish('wave', { attempt: 1 });
 * ```
 */
export class RecordingSession {
  readonly history: MotionHistory;
  readonly outputDir: string;
  private readonly builder: MotionDescriptorBuilder;
  private recording = false;

  constructor(options: RecordingSessionOptions = {}) {
    const clock = options.clock ?? systemClock;
    this.history = new MotionHistory(clock, options.windowSeconds);
    this.outputDir = options.outputDir ?? 'motion_data';
    this.builder = new MotionDescriptorBuilder(this.history, {
      clock,
      ...(options.pinchThresholdPx !== undefined ? { pinchThresholdPx: options.pinchThresholdPx } : {}),
    });
  }

  get isRecording(): boolean {
    return this.recording;
  }

  /**
   * Begin a new session, discarding anything recorded before.
   */
  start(): void {
    this.history.clear();
    this.recording = true;
    log.info('Recording started');
  }

  /**
   * Add one detector frame. Returns null when not recording or when the frame is invalid.
   */
  record(frame: LandmarkFrame, frameSize?: FrameSize): MotionDescriptor | null {
    if (!this.recording) return null;
    return this.builder.tryBuild(frame, frameSize);
  }

  /**
   * Abandon the session and discard its descriptors.
   */
  cancel(): void {
    const discarded = this.history.size;
    this.history.clear();
    this.recording = false;
    log.info('Recording cancelled', { discardedFrames: discarded });
  }

  /**
   * End the session and export it. The history stays available until the next `start`.
   * @throws {EmptyHistoryError} if no frame was recorded
   */
  finish(
    gestureName: string,
    custom: Readonly<Record<string, unknown>> = {},
    options: ExportOptions = {}
  ): SessionRecord {
    this.recording = false;
    return exportSession(this.history, gestureName, custom, options);
  }

  /**
   * Finish the session and write it to `outputDir`.
   * @throws {EmptyHistoryError} if no frame was recorded
   */
  save(
    gestureName: string,
    custom: Readonly<Record<string, unknown>> = {},
    options: SaveOptions = {}
  ): SavedSession {
    const record = this.finish(gestureName, custom, options);
    const path = writeSessionFile(this.outputDir, record, options);
    return { record, path };
  }

  statistics(): StatisticsResult {
    return aggregateStatistics(this.history.snapshot());
  }
}

/**
 * Create a recording session from the classifier, history and recording settings.
 */
export function createRecordingSession(config: MotionConfig, clock?: Clock): RecordingSession {
  return new RecordingSession({
    pinchThresholdPx: config.classifier.pinchThresholdPx,
    windowSeconds: config.history.defaultWindowSeconds,
    outputDir: config.recording.outputDir,
    ...(clock ? { clock } : {}),
  });
}
