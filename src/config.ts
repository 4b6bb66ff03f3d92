import * as dotenv from 'dotenv';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LayoutSchema, ScoringSchema } from './types/iat.js';

dotenv.config();

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, fallback?: string) {
  const v = env[key]?.trim();
  if (v === undefined || v === '') return fallback;
  return v;
}

function getNumber(env: Env, key: string, fallback: number) {
  const v = getEnv(env, key);
  return v === undefined ? fallback : Number(v);
}

function getList(env: Env, key: string): number[] {
  const v = getEnv(env, key);
  if (!v) return [];
  return v
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s !== '')
    .map(Number);
}

export const ConfigSchema = z
  .object({
    dataDir: z.string().min(1),
    resultDir: z.string().min(1),
    resultFile: z.string().min(1),
    fileExtension: z.string().startsWith('.'),
    participantMarker: z.string().min(1),
    blockMarker: z.string().min(1),
    excludeParticipants: z.array(z.number().int().min(0).max(99)),
    onFileError: z.enum(['fail', 'skip']),
    scoring: ScoringSchema,
    layout: LayoutSchema
  })
  .superRefine((c, ctx) => {
    const trials = c.layout.congruent.end - c.layout.congruent.start + 1;
    if (trials - c.scoring.excludeLeadingTrials < 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['scoring', 'excludeLeadingTrials'],
        message: `excluding ${c.scoring.excludeLeadingTrials} of ${trials} trials leaves fewer than 2 for a standard deviation`
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_SCORING = {
  retryPenaltyMs: 600,
  clipMin: 300,
  clipMax: 3000,
  excludeLeadingTrials: 1
} as const;

export const DEFAULT_LAYOUT = {
  congruent: { start: 51, end: 90 },
  incongruent: { start: 121, end: 160 },
  withRetryField: 'response_time',
  keyboardOnlyField: 'response_time_keyboard_response'
} as const;

/**
 * Builds the run configuration from environment variables, with the first two
 * positional arguments overriding the data and result directories.
 */
export function loadConfig(env: Env = process.env, argv: string[] = []): Config {
  const dataDir = argv[0] ?? getEnv(env, 'DATA_DIR', './data') ?? './data';
  const raw = {
    dataDir: path.resolve(dataDir),
    resultDir: path.resolve(argv[1] ?? getEnv(env, 'RESULT_DIR', dataDir) ?? dataDir),
    resultFile: getEnv(env, 'RESULT_FILE', 'opensesameResults.csv'),
    fileExtension: getEnv(env, 'FILE_EXTENSION', '.csv'),
    participantMarker: getEnv(env, 'PARTICIPANT_MARKER', 'P'),
    blockMarker: getEnv(env, 'BLOCK_MARKER', 'block'),
    excludeParticipants: getList(env, 'EXCLUDE_PARTICIPANTS'),
    onFileError: getEnv(env, 'ON_FILE_ERROR', 'fail'),
    scoring: {
      retryPenaltyMs: getNumber(env, 'RETRY_PENALTY_MS', DEFAULT_SCORING.retryPenaltyMs),
      clipMin: getNumber(env, 'CLIP_MIN_MS', DEFAULT_SCORING.clipMin),
      clipMax: getNumber(env, 'CLIP_MAX_MS', DEFAULT_SCORING.clipMax),
      excludeLeadingTrials: getNumber(env, 'EXCLUDE_LEADING_TRIALS', DEFAULT_SCORING.excludeLeadingTrials)
    },
    layout: {
      ...DEFAULT_LAYOUT,
      withRetryField: getEnv(env, 'RT_FIELD', DEFAULT_LAYOUT.withRetryField),
      keyboardOnlyField: getEnv(env, 'RT_KEYBOARD_FIELD', DEFAULT_LAYOUT.keyboardOnlyField)
    }
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', parsed.error.flatten());
  }
  return parsed.data;
}
