import fs from 'node:fs';
import path from 'node:path';
import Papa from 'papaparse';
import { IoError } from '../errors.js';
import { participantId, type BlockSummary, type Logger } from '../types/iat.js';

export const BLOCKS = [1, 2] as const;
export type Block = (typeof BLOCKS)[number];

const SUMMARY_COLUMNS = [
  ['congruentRT', 'congruent_RT'],
  ['incongruentRT', 'incongruent_RT'],
  ['dscore', 'dscore'],
  ['congruentStd', 'congruent_std'],
  ['incongruentStd', 'incongruent_std'],
  ['congruentErrors', 'congruent_NBerrors'],
  ['incongruentErrors', 'incongruent_NBerrors']
] as const satisfies ReadonlyArray<readonly [keyof BlockSummary, string]>;

export const RESULT_COLUMNS: string[] = [
  'participant_id',
  ...BLOCKS.flatMap((b) => SUMMARY_COLUMNS.map(([, suffix]) => `block${b}_${suffix}`))
];

export type ResultRow = {
  participant_id: string;
  blocks: Partial<Record<Block, BlockSummary>>;
};

function isBlock(block: number): block is Block {
  return BLOCKS.some((b) => b === block);
}

/** Wide results table: one row per participant, block 1 and block 2 side by side. */
export class ResultsTable {
  private rowsByParticipant = new Map<number, ResultRow>();

  constructor(private readonly logger: Logger = console) {}

  ensureParticipant(participant: number): ResultRow {
    let row = this.rowsByParticipant.get(participant);
    if (!row) {
      row = { participant_id: participantId(participant), blocks: {} };
      this.rowsByParticipant.set(participant, row);
    }
    return row;
  }

  /** Returns false when the block is not one the table has columns for. */
  record(participant: number, block: number, summary: BlockSummary, source?: string): boolean {
    const row = this.ensureParticipant(participant);
    const from = source ? ` (${source})` : '';
    if (!isBlock(block)) {
      this.logger.warn(`Ignoring block ${block} for ${row.participant_id}${from}: only blocks ${BLOCKS.join(', ')} are stored`);
      return false;
    }
    if (row.blocks[block]) {
      this.logger.warn(`Block ${block} for ${row.participant_id} already recorded; overwriting${from}`);
    }
    row.blocks[block] = summary;
    return true;
  }

  get(participant: number): ResultRow | undefined {
    return this.rowsByParticipant.get(participant);
  }

  get size(): number {
    return this.rowsByParticipant.size;
  }

  rows(): ResultRow[] {
    return [...this.rowsByParticipant.entries()].sort(([a], [b]) => a - b).map(([, row]) => row);
  }

  toRecords(): Array<Record<string, string | number>> {
    return this.rows().map((row) => {
      const record: Record<string, string | number> = { participant_id: row.participant_id };
      for (const b of BLOCKS) {
        const summary = row.blocks[b];
        for (const [key, suffix] of SUMMARY_COLUMNS) {
          record[`block${b}_${suffix}`] = summary ? summary[key] : '';
        }
      }
      return record;
    });
  }

  toCsv(): string {
    const data = this.toRecords().map((r) => RESULT_COLUMNS.map((c) => r[c] ?? ''));
    return Papa.unparse({ fields: RESULT_COLUMNS, data }, { newline: '\n' }) + '\n';
  }
}

export function writeResults(table: ResultsTable, dir: string, file: string): string {
  const out = path.join(dir, file);
  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(out, table.toCsv(), 'utf8');
  } catch (e) {
    throw new IoError(out, 'write results to', e);
  }
  return out;
}
