import { MissingDataError } from '../errors.js';
import type { BlockTrials, Layout, Segment, TrialLog, TrialSeries } from '../types/iat.js';

function toNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function readSegment(log: TrialLog, segment: Segment, field: string): number[] {
  const values: number[] = [];
  // Segment bounds are 1-based and inclusive over data rows.
  for (let row = segment.start; row <= segment.end; row++) {
    const raw = log.rows[row - 1]?.[field];
    const n = toNumber(raw);
    if (n === null) {
      throw new MissingDataError(log.path, `field "${field}" at row ${row}`, 'a finite number', raw === undefined ? undefined : `"${raw}"`);
    }
    values.push(n);
  }
  return values;
}

function readSeries(log: TrialLog, segment: Segment, layout: Layout): TrialSeries {
  return {
    withRetry: readSegment(log, segment, layout.withRetryField),
    keyboardOnly: readSegment(log, segment, layout.keyboardOnlyField)
  };
}

/**
 * Slices the congruent and incongruent segments out of a trial log and reads both
 * response-time channels for each trial.
 */
export function extractTrials(log: TrialLog, layout: Layout): BlockTrials {
  for (const field of [layout.withRetryField, layout.keyboardOnlyField]) {
    if (!log.fields.includes(field)) {
      throw new MissingDataError(log.path, `column "${field}"`, 'a header containing it', log.fields.join(', ') || 'no header');
    }
  }

  const lastRow = Math.max(layout.congruent.end, layout.incongruent.end);
  if (log.rows.length < lastRow) {
    const short = [layout.congruent, layout.incongruent].find((s) => s.end > log.rows.length) ?? layout.incongruent;
    throw new MissingDataError(
      log.path,
      `rows ${short.start}-${short.end}`,
      `at least ${lastRow} data rows`,
      `${log.rows.length}`
    );
  }

  return {
    congruent: readSeries(log, layout.congruent, layout),
    incongruent: readSeries(log, layout.incongruent, layout)
  };
}
