import { z } from 'zod';

export const SegmentSchema = z
  .object({
    start: z.number().int().positive(),
    end: z.number().int().positive()
  })
  .refine((s) => s.end >= s.start, { message: 'segment end must not precede start' });

export type Segment = z.infer<typeof SegmentSchema>;

export const ScoringSchema = z
  .object({
    retryPenaltyMs: z.number().nonnegative(),
    clipMin: z.number().nonnegative(),
    clipMax: z.number().positive(),
    excludeLeadingTrials: z.number().int().nonnegative()
  })
  .refine((s) => s.clipMin <= s.clipMax, {
    message: 'clipMin must be less than or equal to clipMax',
    path: ['clipMin']
  });

export type Scoring = z.infer<typeof ScoringSchema>;

export const LayoutSchema = z
  .object({
    congruent: SegmentSchema,
    incongruent: SegmentSchema,
    withRetryField: z.string().min(1),
    keyboardOnlyField: z.string().min(1)
  })
  .refine(
    (l) => l.congruent.end - l.congruent.start === l.incongruent.end - l.incongruent.start,
    { message: 'congruent and incongruent segments must have the same length', path: ['incongruent'] }
  );

export type Layout = z.infer<typeof LayoutSchema>;

export const BlockSummarySchema = z.object({
  congruentRT: z.number(),
  incongruentRT: z.number(),
  dscore: z.number(),
  congruentStd: z.number(),
  incongruentStd: z.number(),
  congruentErrors: z.number().int().nonnegative(),
  incongruentErrors: z.number().int().nonnegative()
});

export type BlockSummary = z.infer<typeof BlockSummarySchema>;

export type TrialRow = Record<string, string>;

export type TrialLog = {
  path: string;
  participant: number;
  block: number;
  rows: TrialRow[];
  fields: string[];
};

export type TrialSeries = {
  withRetry: number[];
  keyboardOnly: number[];
};

export type BlockTrials = {
  congruent: TrialSeries;
  incongruent: TrialSeries;
};

export type CorrectedSeries = {
  values: number[];
  errors: number;
};

export type SegmentStats = {
  mean: number;
  std: number;
};

export type BlockSource = 'marker' | 'position';

export type LocatedFile = {
  path: string;
  name: string;
  participant: number;
  block: number;
  blockSource: BlockSource;
};

export type Logger = Pick<Console, 'info' | 'warn'>;

export function participantId(participant: number): string {
  return `p${String(participant).padStart(2, '0')}`;
}
