/**
 * @fileoverview Session file naming and persistence.
 *
 * One JSON file per completed session, named
 * `<gesture>_<unix>.json` or `<gesture>_<attempt>_<unix>.json`.
 * The name is informal metadata; only the content schema is a contract.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import type { SessionRecord } from '@motion-kit/shared';
import { createLogger } from '../utils/logger.js';
import { loadSession, serializeSession } from './SessionSerializer.js';

const log = createLogger('session-files');

export interface SessionFileNameOptions {
  /** Attempt number within a batch recording */
  readonly attempt?: number;
  /** Unix timestamp in seconds; defaults to now */
  readonly timestamp?: number;
}

export interface ParsedSessionFileName {
  readonly gestureName: string;
  readonly attempt?: number;
  readonly timestamp: number;
}

const FILE_NAME_PATTERN = /^(.+?)(?:_(\d+))?_(\d+)$/;

/**
 * Replace characters that are unsafe in file names.
 */
function sanitize(gestureName: string): string {
  return gestureName.trim().replace(/[^A-Za-z0-9_-]+/g, '_');
}

/**
 * Build the file name for a session.
 */
export function sessionFileName(gestureName: string, options: SessionFileNameOptions = {}): string {
  const timestamp = options.timestamp ?? Math.floor(Date.now() / 1000);
  const parts = [sanitize(gestureName)];
  if (options.attempt !== undefined) {
    parts.push(String(options.attempt));
  }
  parts.push(String(timestamp));
  return `${parts.join('_')}.json`;
}

/**
 * Recover gesture name, attempt and timestamp from a session file path.
 * Returns null for names that do not follow the convention.
 */
export function parseSessionFileName(path: string): ParsedSessionFileName | null {
  const stem = basename(path, extname(path));
  const match = FILE_NAME_PATTERN.exec(stem);
  if (!match) return null;

  const [, gestureName, attempt, timestamp] = match;
  if (gestureName === undefined || timestamp === undefined) return null;

  return {
    gestureName,
    ...(attempt !== undefined ? { attempt: Number(attempt) } : {}),
    timestamp: Number(timestamp),
  };
}

/**
 * Write a session record into `directory`, creating it if needed.
 * @returns Path of the written file
 */
export function writeSessionFile(
  directory: string,
  record: SessionRecord,
  options: SessionFileNameOptions = {}
): string {
  mkdirSync(directory, { recursive: true });
  const path = join(directory, sessionFileName(record.metadata.gestureName, options));
  writeFileSync(path, serializeSession(record), 'utf8');
  log.info('Session file written', { path, totalFrames: record.metadata.totalFrames });
  return path;
}

/**
 * Read and validate a session file.
 * @throws {MalformedRecordError} if the content is not a valid session record
 */
export function readSessionFile(path: string): SessionRecord {
  return loadSession(readFileSync(path));
}
