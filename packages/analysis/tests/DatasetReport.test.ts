import type { SessionRecord } from '@motion-kit/shared';
import { createMockRecord } from '@motion-kit/testing';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { analyzeDataset, renderDatasetReport } from '../src/DatasetReport.js';
import { createManifest } from '../src/manifest.js';

const records = new Map<string, SessionRecord>([
  ['motion_data/wave_1_1700000000.json', createMockRecord({ averageFps: 30, totalFrames: 90, durationSeconds: 3 })],
  ['motion_data/wave_2_1700000020.json', createMockRecord({ averageFps: 15, totalFrames: 90, durationSeconds: 6 })],
  [
    'motion_data/fist_1_1700000030.json',
    createMockRecord({ gestureName: 'fist', averageFps: 30, totalFrames: 45, durationSeconds: 1.5 }),
  ],
]);

function readRecord(path: string): SessionRecord {
  const record = records.get(path);
  if (!record) {
    throw new Error(`ENOENT: ${path}`);
  }
  return record;
}

const manifest = createManifest(
  [
    'motion_data/wave_2_1700000020.json',
    'motion_data/fist_1_1700000030.json',
    'motion_data/broken_1_1700000040.json',
    'motion_data/wave_1_1700000000.json',
  ],
  {},
  new Date(2024, 2, 4, 15, 0, 0)
);

describe('analyzeDataset', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should rank attempts of each gesture by quality score', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const results = analyzeDataset(manifest, { readRecord });

    expect(results.get('wave')?.map((a) => [a.path, a.qualityScore])).toEqual([
      ['motion_data/wave_1_1700000000.json', 1],
      ['motion_data/wave_2_1700000020.json', 0.75],
    ]);
    expect(results.get('fist')?.[0]).toEqual({
      path: 'motion_data/fist_1_1700000030.json',
      durationSeconds: 1.5,
      totalFrames: 45,
      averageFps: 30,
      qualityScore: 0.75,
      primitives: ['OPEN_HAND'],
    });
  });

  it('should log and skip unreadable recordings', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const results = analyzeDataset(manifest, { readRecord });

    expect(results.get('broken')).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toContain(
      'Skipping unreadable recording {"path":"motion_data/broken_1_1700000040.json","error":"ENOENT: motion_data/broken_1_1700000040.json"}'
    );
  });

  it('should score against the given targets', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const results = analyzeDataset(manifest, { readRecord, targets: { targetFps: 60, targetFrames: 45 } });

    expect(results.get('fist')?.[0]?.qualityScore).toBe(0.75);
    expect(results.get('wave')?.[0]?.qualityScore).toBe(0.75);
  });
});

describe('renderDatasetReport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function render(): string[] {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    return renderDatasetReport(analyzeDataset(manifest, { readRecord }), manifest).split('\n');
  }

  it('should open with the session date and total', () => {
    expect(render().slice(0, 5)).toEqual([
      '# Dataset Summary Report',
      '',
      '**Generated:** 2024-03-04 15:00:00',
      '',
      '**Total Recordings:** 4',
    ]);
  });

  it('should list gestures alphabetically in the overview', () => {
    const lines = render();
    const start = lines.indexOf('## Overview');

    expect(lines.slice(start + 2, start + 6)).toEqual([
      '| Gesture | Attempts | Best FPS | Best Frames | Avg Quality |',
      '|---------|----------|----------|-------------|-------------|',
      '| fist | 1 | 30.0 | 45 | 0.75 |',
      '| wave | 2 | 30.0 | 90 | 0.88 |',
    ]);
  });

  it('should detail the best attempt and list all attempts', () => {
    const lines = render();
    const start = lines.indexOf('### wave');

    expect(lines.slice(start, start + 15)).toEqual([
      '### wave',
      '',
      '**Best Attempt:** `wave_1_1700000000.json`',
      '',
      '- Duration: 3.00s',
      '- Frames: 90',
      '- FPS: 30.0',
      '- Primitives: OPEN_HAND',
      '- Quality Score: 1.00/1.00',
      '',
      '**All Attempts:**',
      '',
      '1. `wave_1_1700000000.json` - Quality: 1.00, Frames: 90, FPS: 30.0',
      '2. `wave_2_1700000020.json` - Quality: 0.75, Frames: 90, FPS: 15.0',
      '',
    ]);
  });

  it('should leave out gestures without readable attempts', () => {
    expect(render()).not.toContain('### broken');
  });

  it('should count recordings per quality band', () => {
    const lines = render();
    const start = lines.indexOf('## Quality Assessment');

    expect(lines.slice(start + 2, start + 8)).toEqual([
      '- **Average FPS:** 25.0',
      '- **Average Frames:** 75',
      '- **Average Quality:** 0.83/1.00',
      '- **High Quality (>0.9):** 1 recordings',
      '- **Medium Quality (0.7-0.9):** 2 recordings',
      '- **Low Quality (<0.7):** 0 recordings',
    ]);
  });

  it('should note an empty dataset', () => {
    const empty = createManifest([], {}, new Date(2024, 0, 1, 0, 0, 0));
    const lines = renderDatasetReport(new Map(), empty).split('\n');

    expect(lines[lines.indexOf('## Quality Assessment') + 2]).toBe('No readable recordings.');
  });
});
