import type {
  BlockSummary,
  BlockTrials,
  CorrectedSeries,
  Layout,
  Scoring,
  SegmentStats,
  TrialLog,
  TrialSeries
} from '../types/iat.js';
import { extractTrials } from './extractor.js';

/**
 * Adds `penaltyMs` to every trial whose two response-time channels disagree,
 * i.e. the participant needed a second keypress. Exact comparison: both are raw
 * logged values.
 */
export function correctSecondChance(series: TrialSeries, penaltyMs: number): CorrectedSeries {
  let errors = 0;
  const values = series.withRetry.map((rt, i) => {
    if (rt !== series.keyboardOnly[i]) {
      errors++;
      return rt + penaltyMs;
    }
    return rt;
  });
  return { values, errors };
}

export function clip(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

export function clipSeries(values: number[], min: number, max: number): number[] {
  return values.map((v) => clip(v, min, max));
}

export function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Sample standard deviation (n - 1 divisor). */
export function sampleStd(values: number[]): number {
  const m = mean(values);
  const ss = values.reduce((acc, v) => acc + (v - m) ** 2, 0);
  return Math.sqrt(ss / (values.length - 1));
}

export function summarize(values: number[], excludeLeading: number): SegmentStats {
  const kept = values.slice(excludeLeading);
  return { mean: mean(kept), std: sampleStd(kept) };
}

export function scoreBlock(trials: BlockTrials, scoring: Scoring): BlockSummary {
  const congruent = correctSecondChance(trials.congruent, scoring.retryPenaltyMs);
  const incongruent = correctSecondChance(trials.incongruent, scoring.retryPenaltyMs);

  const c = summarize(clipSeries(congruent.values, scoring.clipMin, scoring.clipMax), scoring.excludeLeadingTrials);
  const ic = summarize(clipSeries(incongruent.values, scoring.clipMin, scoring.clipMax), scoring.excludeLeadingTrials);

  return {
    congruentRT: c.mean,
    incongruentRT: ic.mean,
    dscore: c.mean - ic.mean,
    congruentStd: c.std,
    incongruentStd: ic.std,
    congruentErrors: congruent.errors,
    incongruentErrors: incongruent.errors
  };
}

export function scoreTrialLog(log: TrialLog, layout: Layout, scoring: Scoring): BlockSummary {
  return scoreBlock(extractTrials(log, layout), scoring);
}
