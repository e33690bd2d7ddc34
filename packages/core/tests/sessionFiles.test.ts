import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import type { SessionRecord } from '@motion-kit/shared';
import { createManualClock, createMockFrame } from '@motion-kit/testing';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MalformedRecordError } from '../src/errors.js';
import { MotionDescriptorBuilder } from '../src/motion/MotionDescriptorBuilder.js';
import { MotionHistory } from '../src/motion/MotionHistory.js';
import { exportSession } from '../src/session/SessionSerializer.js';
import {
  parseSessionFileName,
  readSessionFile,
  sessionFileName,
  writeSessionFile,
} from '../src/session/sessionFiles.js';

function recordSession(gestureName: string): SessionRecord {
  const clock = createManualClock(50);
  const history = new MotionHistory(clock);
  const builder = new MotionDescriptorBuilder(history, { clock });
  builder.build(createMockFrame());
  clock.advance(0.25);
  builder.build(createMockFrame({ fingers: [0, 1, 0, 0, 0] }));
  return exportSession(history, gestureName, {}, { recordedAt: new Date('2024-02-03T04:05:06.000Z') });
}

describe('sessionFileName', () => {
  it('should combine gesture and timestamp', () => {
    expect(sessionFileName('wave', { timestamp: 1700000000 })).toBe('wave_1700000000.json');
  });

  it('should insert the attempt number', () => {
    expect(sessionFileName('thumbs_up', { attempt: 3, timestamp: 1700000000 })).toBe('thumbs_up_3_1700000000.json');
  });

  it('should replace unsafe characters', () => {
    expect(sessionFileName(' my/gesture name ', { timestamp: 1 })).toBe('my_gesture_name_1.json');
  });
});

describe('parseSessionFileName', () => {
  it('should recover gesture, attempt and timestamp', () => {
    expect(parseSessionFileName('motion_data/thumbs_up_3_1700000000.json')).toEqual({
      gestureName: 'thumbs_up',
      attempt: 3,
      timestamp: 1700000000,
    });
  });

  it('should parse a name without attempt', () => {
    expect(parseSessionFileName('wave_1700000000.json')).toEqual({ gestureName: 'wave', timestamp: 1700000000 });
  });

  it('should return null for other names', () => {
    expect(parseSessionFileName('notes.json')).toBeNull();
  });
});

describe('session files', () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'motion-sessions-'));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('should write and read back a record', () => {
    const record = recordSession('point');
    const path = writeSessionFile(directory, record, { attempt: 1, timestamp: 1700000000 });

    expect(basename(path)).toBe('point_1_1700000000.json');
    expect(readSessionFile(path)).toEqual(record);
  });

  it('should create a missing directory', () => {
    const nested = join(directory, 'nested', 'motion_data');
    const path = writeSessionFile(nested, recordSession('fist'), { timestamp: 1 });

    expect(JSON.parse(readFileSync(path, 'utf8'))).toMatchObject({
      metadata: { gesture_name: 'fist', total_frames: 2, primitives_used: ['OPEN_HAND', 'POINT'] },
    });
  });

  it('should reject a file that is not a session record', () => {
    const path = join(directory, 'broken.json');
    writeFileSync(path, '{"frames": []}', 'utf8');

    expect(() => readSessionFile(path)).toThrow(MalformedRecordError);
    expect(() => readSessionFile(path)).toThrow('Malformed session record: missing metadata');
  });
});
