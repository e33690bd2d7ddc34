/**
 * @fileoverview Batch recording manifest and gesture catalogue.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { describeIssues, MotionDescriptorError, parseSessionFileName } from '@motion-kit/core';
import { type WireRecordingManifest, WireRecordingManifestSchema } from '@motion-kit/shared';
import { z } from 'zod';

/**
 * File name of the manifest inside a recording directory.
 */
export const MANIFEST_FILE_NAME = 'recording_manifest.json';

/**
 * Error thrown when a manifest file fails validation.
 */
export class MalformedManifestError extends MotionDescriptorError {
  constructor(reason: string, options?: ErrorOptions) {
    super(`Malformed recording manifest: ${reason}`, options);
    this.name = 'MalformedManifestError';
  }
}

/**
 * Summary of one batch recording session.
 */
export interface RecordingManifest {
  /** Local time, "YYYY-MM-DD HH:MM:SS" */
  readonly sessionDate: string;
  readonly totalRecordings: number;
  /** Paths of the session files */
  readonly recordings: readonly string[];
  /** Category name to gesture names */
  readonly categories: Readonly<Record<string, readonly string[]>>;
}

// ============ Gesture Catalogue ============

const GestureCatalogSchema = z.record(
  z.array(
    z.object({
      name: z.string().min(1),
      description: z.string(),
    })
  )
);

export type GestureCatalog = z.infer<typeof GestureCatalogSchema>;

const CATALOG_URL = new URL('../data/gesture-catalog.json', import.meta.url);

let cachedCatalog: GestureCatalog | null = null;

/**
 * The default set of gestures recorded in a batch, grouped by category.
 */
export function loadGestureCatalog(): GestureCatalog {
  if (!cachedCatalog) {
    cachedCatalog = GestureCatalogSchema.parse(JSON.parse(readFileSync(CATALOG_URL, 'utf8')));
  }
  return cachedCatalog;
}

/**
 * Reduce a catalogue to category name -> gesture names.
 */
export function catalogCategories(catalog: GestureCatalog): Record<string, string[]> {
  return Object.fromEntries(
    Object.entries(catalog).map(([category, gestures]) => [category, gestures.map((g) => g.name)])
  );
}

// ============ Manifest ============

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as local "YYYY-MM-DD HH:MM:SS".
 */
export function formatSessionDate(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Create the manifest of a finished batch.
 */
export function createManifest(
  recordings: readonly string[],
  categories: Readonly<Record<string, readonly string[]>>,
  date: Date = new Date()
): RecordingManifest {
  return {
    sessionDate: formatSessionDate(date),
    totalRecordings: recordings.length,
    recordings: [...recordings],
    categories,
  };
}

function toWireManifest(manifest: RecordingManifest): WireRecordingManifest {
  return {
    session_date: manifest.sessionDate,
    total_recordings: manifest.totalRecordings,
    recordings: [...manifest.recordings],
    categories: Object.fromEntries(
      Object.entries(manifest.categories).map(([category, names]) => [category, [...names]])
    ),
  };
}

/**
 * Parse and validate manifest JSON text.
 * @throws {MalformedManifestError} if the text is not a valid manifest
 */
export function parseManifest(text: string): RecordingManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new MalformedManifestError('content is not valid JSON', { cause: error });
  }

  const result = WireRecordingManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedManifestError(describeIssues(result.error.issues), { cause: result.error });
  }

  const wire = result.data;
  return {
    sessionDate: wire.session_date,
    totalRecordings: wire.total_recordings,
    recordings: wire.recordings,
    categories: wire.categories,
  };
}

export function serializeManifest(manifest: RecordingManifest): string {
  return JSON.stringify(toWireManifest(manifest), null, 2);
}

/**
 * Write the manifest into a recording directory.
 * @returns Path of the written file
 */
export function writeManifest(directory: string, manifest: RecordingManifest): string {
  const path = join(directory, MANIFEST_FILE_NAME);
  writeFileSync(path, serializeManifest(manifest), 'utf8');
  return path;
}

export function loadManifest(path: string): RecordingManifest {
  return parseManifest(readFileSync(path, 'utf8'));
}

// ============ Grouping ============

/**
 * Gesture name encoded in a session file path; the bare file stem when the
 * name does not follow the session file convention.
 */
export function gestureNameFromPath(path: string): string {
  return parseSessionFileName(path)?.gestureName ?? basename(path, extname(path));
}

/**
 * Group recording paths by gesture name, preserving manifest order.
 */
export function groupRecordingsByGesture(recordings: readonly string[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const path of recordings) {
    const name = gestureNameFromPath(path);
    const group = groups.get(name);
    if (group) {
      group.push(path);
    } else {
      groups.set(name, [path]);
    }
  }
  return groups;
}
