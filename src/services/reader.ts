import fs from 'node:fs';
import Papa from 'papaparse';
import { IoError, MissingDataError } from '../errors.js';
import type { LocatedFile, TrialLog, TrialRow } from '../types/iat.js';

export function parseTrialCsv(text: string, file: LocatedFile): TrialLog {
  const result = Papa.parse<TrialRow>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: (h) => h.trim()
  });

  // Rows with missing or extra trailing cells are common in exported logs.
  const fatal = result.errors.filter((e) => e.type !== 'FieldMismatch');
  if (fatal.length) {
    const first = fatal[0];
    throw new MissingDataError(file.path, `unparseable CSV at row ${first.row ?? '?'}: ${first.message}`);
  }

  return {
    path: file.path,
    participant: file.participant,
    block: file.block,
    rows: result.data,
    fields: result.meta.fields ?? []
  };
}

export function readTrialLog(file: LocatedFile): TrialLog {
  let text: string;
  try {
    text = fs.readFileSync(file.path, 'utf8');
  } catch (e) {
    throw new IoError(file.path, 'read', e);
  }
  return parseTrialCsv(text, file);
}
