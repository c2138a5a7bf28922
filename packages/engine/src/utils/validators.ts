/**
 * Zod schemas for runtime validation
 *
 * Covers controller/engine configuration and the on-disk playlist format.
 */

import { z } from 'zod';
import type { AudioBackend } from '../types';

// ============================================================================
// Configuration Schemas
// ============================================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const FadeProfileSchema = z.object({
  steps: z.number().int().positive(),
  durationMs: z.number().positive(),
});

export const EngineConfigSchema = z.object({
  naturalFade: FadeProfileSchema.optional(),
  haltFade: FadeProfileSchema.optional(),
  fadeLeadTime: z.number().nonnegative().optional(),
  positionPollInterval: z.number().positive().optional(),
  debug: z.boolean().optional(),
});

const AUDIO_BACKEND_METHODS = [
  'load',
  'play',
  'pause',
  'resume',
  'stop',
  'setVolume',
  'isBusy',
] as const;

export const AudioBackendSchema = z.custom<AudioBackend>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    AUDIO_BACKEND_METHODS.every((method) => typeof Reflect.get(value, method) === 'function'),
  { message: `backend must implement ${AUDIO_BACKEND_METHODS.join(', ')}` }
);

export const CueDeckConfigSchema = z.object({
  backend: AudioBackendSchema,
  engine: EngineConfigSchema.optional(),
  debug: z.boolean().optional(),
  logLevel: LogLevelSchema.optional(),
});

// ============================================================================
// Playlist Schemas
// ============================================================================

export const SongRecordSchema = z
  .object({
    file_path: z.string().min(1, 'File path is required'),
    start_time: z.number().nonnegative(),
    end_time: z.number().nonnegative(),
    page: z.number().int().nonnegative().default(0),
    comment: z.string().default(''),
    // Out-of-range volumes are clamped rather than rejected
    volume: z
      .number()
      .default(1.0)
      .transform((volume) => Math.max(0, Math.min(1, volume))),
  })
  .refine((record) => record.end_time > record.start_time, {
    message: 'end_time must be greater than start_time',
    path: ['end_time'],
  });

export const PlaylistSchema = z.array(SongRecordSchema);
