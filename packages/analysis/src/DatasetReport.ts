/**
 * @fileoverview Dataset-wide analysis of a recording batch.
 *
 * Ranks every attempt of every gesture by quality score and renders the
 * result as a Markdown summary.
 */

import { basename } from 'node:path';
import { createLogger, type QualityThresholds, readSessionFile } from '@motion-kit/core';
import { DEFAULT_QUALITY_THRESHOLDS, type SessionRecord } from '@motion-kit/shared';
import type { RecordingManifest } from './manifest.js';
import { groupRecordingsByGesture } from './manifest.js';
import { qualityBand, qualityScore } from './quality.js';

const log = createLogger('dataset');

/**
 * One recorded attempt with its quality score.
 */
export interface AttemptResult {
  readonly path: string;
  readonly durationSeconds: number;
  readonly totalFrames: number;
  readonly averageFps: number;
  readonly qualityScore: number;
  readonly primitives: readonly string[];
}

/**
 * Gesture name to attempts, best first.
 */
export type DatasetResults = ReadonlyMap<string, readonly AttemptResult[]>;

export interface AnalyzeDatasetOptions {
  /** Loads one session file (default: read from disk) */
  readonly readRecord?: (path: string) => SessionRecord;
  readonly targets?: Pick<QualityThresholds, 'targetFps' | 'targetFrames'>;
}

/**
 * Score every recording in the manifest, grouped by gesture.
 * Files that cannot be read or validated are logged and left out.
 */
export function analyzeDataset(
  manifest: RecordingManifest,
  options: AnalyzeDatasetOptions = {}
): Map<string, AttemptResult[]> {
  const readRecord = options.readRecord ?? readSessionFile;
  const targets = options.targets ?? DEFAULT_QUALITY_THRESHOLDS;
  const results = new Map<string, AttemptResult[]>();

  for (const [gestureName, paths] of groupRecordingsByGesture(manifest.recordings)) {
    const attempts: AttemptResult[] = [];

    for (const path of paths) {
      let record: SessionRecord;
      try {
        record = readRecord(path);
      } catch (error) {
        log.warn('Skipping unreadable recording', {
          path,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      const { metadata } = record;
      attempts.push({
        path,
        durationSeconds: metadata.durationSeconds,
        totalFrames: metadata.totalFrames,
        averageFps: metadata.averageFps,
        qualityScore: qualityScore(metadata, targets),
        primitives: metadata.primitivesUsed,
      });
    }

    // Array.prototype.sort is stable, so equal scores keep manifest order
    attempts.sort((a, b) => b.qualityScore - a.qualityScore);
    results.set(gestureName, attempts);
  }

  log.info('Dataset analyzed', { gestures: results.size, recordings: manifest.recordings.length });
  return results;
}

// ============ Markdown ============

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function sortedByGesture(results: DatasetResults): Array<[string, readonly AttemptResult[]]> {
  return [...results.entries()]
    .filter(([, attempts]) => attempts.length > 0)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function overviewSection(entries: ReadonlyArray<[string, readonly AttemptResult[]]>): string[] {
  const lines = [
    '## Overview',
    '',
    '| Gesture | Attempts | Best FPS | Best Frames | Avg Quality |',
    '|---------|----------|----------|-------------|-------------|',
  ];
  for (const [gestureName, attempts] of entries) {
    const [best] = attempts;
    if (!best) continue;
    const avgQuality = mean(attempts.map((a) => a.qualityScore));
    lines.push(
      `| ${gestureName} | ${attempts.length} | ${best.averageFps.toFixed(1)} | ${best.totalFrames} | ${avgQuality.toFixed(2)} |`
    );
  }
  lines.push('');
  return lines;
}

function detailSection(entries: ReadonlyArray<[string, readonly AttemptResult[]]>): string[] {
  const lines = ['## Detailed Analysis', ''];
  for (const [gestureName, attempts] of entries) {
    const [best] = attempts;
    if (!best) continue;

    lines.push(
      `### ${gestureName}`,
      '',
      `**Best Attempt:** \`${basename(best.path)}\``,
      '',
      `- Duration: ${best.durationSeconds.toFixed(2)}s`,
      `- Frames: ${best.totalFrames}`,
      `- FPS: ${best.averageFps.toFixed(1)}`,
      `- Primitives: ${best.primitives.join(', ')}`,
      `- Quality Score: ${best.qualityScore.toFixed(2)}/1.00`,
      ''
    );

    if (attempts.length > 1) {
      lines.push('**All Attempts:**', '');
      attempts.forEach((attempt, i) => {
        lines.push(
          `${i + 1}. \`${basename(attempt.path)}\` - Quality: ${attempt.qualityScore.toFixed(2)}, Frames: ${attempt.totalFrames}, FPS: ${attempt.averageFps.toFixed(1)}`
        );
      });
      lines.push('');
    }
  }
  return lines;
}

function qualitySection(all: readonly AttemptResult[]): string[] {
  const lines = ['## Quality Assessment', ''];
  if (all.length === 0) {
    lines.push('No readable recordings.', '');
    return lines;
  }

  const bands = { high: 0, medium: 0, low: 0 };
  for (const attempt of all) {
    bands[qualityBand(attempt.qualityScore)] += 1;
  }

  lines.push(
    `- **Average FPS:** ${mean(all.map((a) => a.averageFps)).toFixed(1)}`,
    `- **Average Frames:** ${mean(all.map((a) => a.totalFrames)).toFixed(0)}`,
    `- **Average Quality:** ${mean(all.map((a) => a.qualityScore)).toFixed(2)}/1.00`,
    `- **High Quality (>0.9):** ${bands.high} recordings`,
    `- **Medium Quality (0.7-0.9):** ${bands.medium} recordings`,
    `- **Low Quality (<0.7):** ${bands.low} recordings`,
    ''
  );
  return lines;
}

/**
 * Render the analysis of a batch as Markdown.
 */
export function renderDatasetReport(results: DatasetResults, manifest: RecordingManifest): string {
  const entries = sortedByGesture(results);
  const all = entries.flatMap(([, attempts]) => attempts);

  const lines = [
    '# Dataset Summary Report',
    '',
    `**Generated:** ${manifest.sessionDate}`,
    '',
    `**Total Recordings:** ${manifest.totalRecordings}`,
    '',
    ...overviewSection(entries),
    ...detailSection(entries),
    ...qualitySection(all),
    '## Recommendations',
    '',
    '1. Use the best attempt of each gesture for documentation and demos',
    '2. Re-record gestures whose quality is below 0.70',
    '',
  ];

  return lines.join('\n');
}
