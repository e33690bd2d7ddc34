/**
 * @fileoverview Exchange-format definitions.
 * Zod schemas for the session file written after each recording, the batch
 * manifest, and the landmark frames accepted from the detector. Field names
 * of the persisted formats are snake_case and must not change.
 */

import { z } from 'zod';
import { FINGER_COUNT, LANDMARK_COUNT, PRIMITIVES, UNKNOWN_PRIMITIVE_PREFIX } from '../constants.js';
import type { Primitive } from '../types/index.js';

const UNKNOWN_PRIMITIVE_PATTERN = new RegExp(`^${UNKNOWN_PRIMITIVE_PREFIX}[01]{${FINGER_COUNT}}$`);
const KNOWN_PRIMITIVES: ReadonlySet<string> = new Set<string>(PRIMITIVES);

/**
 * Check whether a string is a label the classifier can produce.
 */
export function isPrimitive(value: string): value is Primitive {
  return KNOWN_PRIMITIVES.has(value) || UNKNOWN_PRIMITIVE_PATTERN.test(value);
}

// ============ Shared Schemas ============

/**
 * Schema for a 2D point.
 */
export const PointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

export const FingerFlagSchema = z.union([z.literal(0), z.literal(1)]);

/**
 * Schema for the five finger-extension flags.
 */
export const FingerFlagsSchema = z.tuple([
  FingerFlagSchema,
  FingerFlagSchema,
  FingerFlagSchema,
  FingerFlagSchema,
  FingerFlagSchema,
]);

export const HandednessSchema = z.enum(['left', 'right']);

export const PrimitiveSchema = z.custom<Primitive>(
  (value) => typeof value === 'string' && isPrimitive(value),
  { message: 'Unknown primitive label' }
);

// ============ Detector Input ============

/**
 * Schema for one detector landmark.
 */
export const LandmarkPointSchema = z.object({
  index: z
    .number()
    .int()
    .min(0)
    .max(LANDMARK_COUNT - 1),
  x: z.number().finite(),
  y: z.number().finite(),
});

/**
 * Schema for a landmark frame. Extra points beyond the 21 are tolerated.
 */
export const LandmarkFrameSchema = z.object({
  points: z.array(LandmarkPointSchema).min(LANDMARK_COUNT),
  fingers: FingerFlagsSchema,
  hand: HandednessSchema.optional(),
});

// ============ Session File ============

export const WireLandmarksSchema = z.object({
  wrist: PointSchema,
  thumb_tip: PointSchema,
  index_tip: PointSchema,
  middle_tip: PointSchema,
  ring_tip: PointSchema,
  pinky_tip: PointSchema,
});

export const WireNormalizedLandmarksSchema = WireLandmarksSchema.extend({
  palm_center: PointSchema,
});

export const WireFeaturesSchema = z.object({
  pinch_distance: z.number().nonnegative(),
  hand_openness: z.number().min(0).max(1),
  hand_span: z.number().nonnegative(),
  palm_center: PointSchema,
});

export const WireVelocitySchema = z.object({
  vx: z.number().finite(),
  vy: z.number().finite(),
  magnitude: z.number().nonnegative(),
  direction_radians: z.number().finite(),
});

/**
 * Schema for one serialized motion descriptor.
 * A missing velocity is written as `null`.
 */
export const WireFrameSchema = z.object({
  capture_time: z.number().finite(),
  session_relative_time: z.number().nonnegative(),
  frame_index: z.number().int().nonnegative(),
  hand: HandednessSchema.optional(),
  fingers_extended: FingerFlagsSchema,
  finger_count: z.number().int().min(0).max(FINGER_COUNT),
  handshape_code: z.string().regex(new RegExp(`^[01]{${FINGER_COUNT}}$`)),
  landmarks: WireLandmarksSchema,
  features: WireFeaturesSchema,
  primitive: PrimitiveSchema,
  velocity: WireVelocitySchema.nullable(),
  normalized_landmarks: WireNormalizedLandmarksSchema.optional(),
});

export type WireFrame = z.infer<typeof WireFrameSchema>;

export const WireSessionMetadataSchema = z.object({
  gesture_name: z.string().min(1),
  recorded_at: z.string().datetime({
    offset: true,
    local: true,
    message: 'recorded_at must be an ISO-8601 timestamp',
  }),
  duration_seconds: z.number().nonnegative(),
  total_frames: z.number().int().nonnegative(),
  average_fps: z.number().nonnegative(),
  primitives_used: z.array(z.string()),
  custom: z.record(z.unknown()),
});

export type WireSessionMetadata = z.infer<typeof WireSessionMetadataSchema>;

function checkFrameDerivations(frame: WireFrame, index: number, ctx: z.RefinementCtx): void {
  const count = frame.fingers_extended.reduce<number>((sum, flag) => sum + flag, 0);
  if (frame.finger_count !== count) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['frames', index, 'finger_count'],
      message: `finger_count is ${frame.finger_count} but fingers_extended has ${count}`,
    });
  }
  const code = frame.fingers_extended.join('');
  if (frame.handshape_code !== code) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['frames', index, 'handshape_code'],
      message: `handshape_code is ${frame.handshape_code} but fingers_extended encodes ${code}`,
    });
  }
  const openness = count / FINGER_COUNT;
  if (frame.features.hand_openness !== openness) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['frames', index, 'features', 'hand_openness'],
      message: `hand_openness is ${frame.features.hand_openness} but fingers_extended gives ${openness}`,
    });
  }
}

/**
 * Schema for a complete session file.
 * Frames are numbered 0..n-1 in non-decreasing capture order, their derived
 * finger fields agree with `fingers_extended`, and the metadata agrees with
 * the frames.
 */
export const WireSessionRecordSchema = z
  .object({
    metadata: WireSessionMetadataSchema,
    frames: z.array(WireFrameSchema),
  })
  .superRefine((record, ctx) => {
    const { metadata, frames } = record;
    if (metadata.total_frames !== frames.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['metadata', 'total_frames'],
        message: `total_frames is ${metadata.total_frames} but ${frames.length} frames are present`,
      });
    }

    let previous: WireFrame | undefined;
    for (const [i, frame] of frames.entries()) {
      if (frame.frame_index !== i) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['frames', i, 'frame_index'],
          message: `frame_index is ${frame.frame_index} but the frame is at position ${i}`,
        });
      }
      if (previous && frame.capture_time < previous.capture_time) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['frames', i, 'capture_time'],
          message: `capture_time ${frame.capture_time} precedes ${previous.capture_time}`,
        });
      }
      checkFrameDerivations(frame, i, ctx);
      previous = frame;
    }

    const seen = new Set<string>(frames.map((frame) => frame.primitive));
    const listed = new Set(metadata.primitives_used);
    const matches =
      listed.size === metadata.primitives_used.length &&
      listed.size === seen.size &&
      [...listed].every((primitive) => seen.has(primitive));
    if (!matches) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['metadata', 'primitives_used'],
        message: `primitives_used must list each frame primitive once, got [${metadata.primitives_used.join(', ')}]`,
      });
    }
  });

export type WireSessionRecord = z.infer<typeof WireSessionRecordSchema>;

// ============ Batch Manifest ============

/**
 * Schema for the manifest written after a batch recording session.
 */
export const WireRecordingManifestSchema = z.object({
  session_date: z.string().min(1),
  total_recordings: z.number().int().nonnegative(),
  recordings: z.array(z.string()),
  categories: z.record(z.array(z.string())),
});

export type WireRecordingManifest = z.infer<typeof WireRecordingManifestSchema>;
