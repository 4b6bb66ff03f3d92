import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { LocatedFile, Logger } from '../../types/iat.js';

export type TrialPair = [withRetry: number, keyboardOnly: number];

type BuildOptions = {
  rows?: number;
  congruent?: (trial: number) => TrialPair;
  incongruent?: (trial: number) => TrialPair;
  header?: string[];
};

const CONGRUENT_START = 51;
const INCONGRUENT_START = 121;

/** Builds an OpenSesame-like log; `trial` passed to the callbacks is 1-based within its segment. */
export function buildTrialCsv(options: BuildOptions = {}): string {
  const rows = options.rows ?? 160;
  const header = options.header ?? ['subject_nr', 'response_time', 'response_time_keyboard_response'];
  const lines = [header.join(',')];
  for (let row = 1; row <= rows; row++) {
    let pair: TrialPair = [1000, 1000];
    if (row >= CONGRUENT_START && row < CONGRUENT_START + 40 && options.congruent) {
      pair = options.congruent(row - CONGRUENT_START + 1);
    } else if (row >= INCONGRUENT_START && row < INCONGRUENT_START + 40 && options.incongruent) {
      pair = options.incongruent(row - INCONGRUENT_START + 1);
    }
    lines.push([5, ...pair].slice(0, header.length).join(','));
  }
  return lines.join('\n') + '\n';
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'iat-scoring-'));
}

export function writeFile(dir: string, rel: string, content: string): string {
  const full = path.join(dir, rel);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content, 'utf8');
  return full;
}

export function located(overrides: Partial<LocatedFile> = {}): LocatedFile {
  return {
    path: '/data/subject_P05_block1.csv',
    name: 'subject_P05_block1.csv',
    participant: 5,
    block: 1,
    blockSource: 'marker',
    ...overrides
  };
}

export function createLogger(): Logger & { info: jest.Mock; warn: jest.Mock } {
  return { info: jest.fn(), warn: jest.fn() };
}
