/**
 * @fileoverview Motion toolkit configuration loading from YAML.
 * Validates and caches the tunables that depend on the capture setup.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  DEFAULT_PINCH_THRESHOLD_PX,
  DEFAULT_QUALITY_THRESHOLDS,
  DEFAULT_WINDOW_SECONDS,
} from '@motion-kit/shared';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { describeIssues, InvalidConfigError } from '../errors.js';

// Schema for motion configuration; every section falls back to the shared defaults
const MotionConfigSchema = z.object({
  classifier: z
    .object({
      pinchThresholdPx: z.number().positive(),
    })
    .default({ pinchThresholdPx: DEFAULT_PINCH_THRESHOLD_PX }),
  history: z
    .object({
      defaultWindowSeconds: z.number().positive(),
    })
    .default({ defaultWindowSeconds: DEFAULT_WINDOW_SECONDS }),
  quality: z
    .object({
      minFps: z.number().nonnegative(),
      minFrames: z.number().int().nonnegative(),
      minRecordableFrames: z.number().int().nonnegative(),
      targetFps: z.number().positive(),
      targetFrames: z.number().int().positive(),
    })
    .default({ ...DEFAULT_QUALITY_THRESHOLDS }),
  recording: z
    .object({
      outputDir: z.string().min(1),
    })
    .default({ outputDir: 'motion_data' }),
});

export type MotionConfig = z.infer<typeof MotionConfigSchema>;

export type QualityThresholds = MotionConfig['quality'];

let cachedConfig: MotionConfig | null = null;

/**
 * Validate raw configuration data (e.g. parsed YAML).
 * @throws {InvalidConfigError} if the data does not match the schema
 */
export function parseMotionConfig(raw: unknown): MotionConfig {
  const result = MotionConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidConfigError(describeIssues(result.error.issues), { cause: result.error });
  }
  return result.data;
}

/**
 * Configuration with every value at its default.
 */
export function defaultMotionConfig(): MotionConfig {
  return parseMotionConfig({});
}

/**
 * Load and validate motion configuration from a YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - the explicit `path` argument if given
 * - MOTION_CONFIG_PATH environment variable if set
 * - Otherwise from ./config/motion.yaml relative to cwd (project root)
 */
export function loadMotionConfig(path?: string): MotionConfig {
  if (cachedConfig && path === undefined) {
    return cachedConfig;
  }

  const configPath =
    // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
    path ?? process.env['MOTION_CONFIG_PATH'] ?? join(process.cwd(), 'config/motion.yaml');

  const fileContents = readFileSync(configPath, 'utf8');
  const config = parseMotionConfig(parseYaml(fileContents));
  if (path === undefined) {
    cachedConfig = config;
  }
  return config;
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
