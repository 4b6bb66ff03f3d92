import fs from 'node:fs';
import path from 'node:path';
import { FilenamePatternError, IoError } from '../errors.js';
import type { LocatedFile, Logger } from '../types/iat.js';

export type LocatorOptions = {
  fileExtension: string;
  participantMarker: string;
  blockMarker: string;
  excludeParticipants: number[];
};

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function parseParticipant(name: string, marker: string): number | null {
  const match = new RegExp(`${escapeRegExp(marker)}(\\d{2})`).exec(name);
  return match ? Number(match[1]) : null;
}

/**
 * Resolves the block number from a file name. The `<marker><digits>` token wins;
 * otherwise the character just before the extension is used when it is a digit.
 */
export function parseBlock(
  filePath: string,
  marker: string
): { block: number; source: LocatedFile['blockSource'] } {
  const name = path.basename(filePath);
  const match = new RegExp(`${escapeRegExp(marker)}(\\d+)`, 'i').exec(name);
  if (match) return { block: Number(match[1]), source: 'marker' };

  const stem = name.slice(0, name.length - path.extname(name).length);
  const last = stem.charAt(stem.length - 1);
  if (/^\d$/.test(last)) return { block: Number(last), source: 'position' };

  throw new FilenamePatternError(filePath, `block number ("${marker}<n>" or a trailing digit)`);
}

function listFiles(root: string, extension: string): string[] {
  let entries: string[];
  try {
    entries = fs.readdirSync(root, { recursive: true, encoding: 'utf8' });
  } catch (e) {
    throw new IoError(root, 'read directory', e);
  }
  const ext = extension.toLowerCase();
  return entries
    .filter((rel) => path.extname(rel).toLowerCase() === ext)
    .map((rel) => path.join(root, rel))
    .filter((p) => !isDirectory(p))
    .sort();
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    // Unreadable entries (dangling links, permissions) stay listed; reading them raises IoError.
    return false;
  }
}

export type LocateResult = {
  /** Keys are inserted in ascending participant order. */
  participants: Map<number, LocatedFile[]>;
  unresolved: Array<{ participant: number; error: FilenamePatternError }>;
};

/**
 * Scans `root` for trial logs and groups them by participant number. Files whose
 * block cannot be resolved are reported in `unresolved`; their participant is
 * still listed.
 */
export function locateTrialLogs(root: string, options: LocatorOptions, logger: Logger = console): LocateResult {
  const byParticipant = new Map<number, LocatedFile[]>();
  const unresolved: LocateResult['unresolved'] = [];
  const ignored: string[] = [];

  for (const filePath of listFiles(root, options.fileExtension)) {
    const name = path.basename(filePath);
    const participant = parseParticipant(name, options.participantMarker);
    if (participant === null) {
      ignored.push(name);
      continue;
    }
    if (options.excludeParticipants.includes(participant)) continue;

    const files = byParticipant.get(participant) ?? [];
    byParticipant.set(participant, files);
    try {
      const { block, source } = parseBlock(filePath, options.blockMarker);
      if (source === 'position') {
        logger.warn(`No "${options.blockMarker}<n>" token in ${filePath}; using trailing digit ${block} as block number`);
      }
      files.push({ path: filePath, name, participant, block, blockSource: source });
    } catch (e) {
      if (!(e instanceof FilenamePatternError)) throw e;
      unresolved.push({ participant, error: e });
    }
  }

  if (ignored.length) {
    logger.warn(`Ignored ${ignored.length} file(s) without a participant code: ${ignored.join(', ')}`);
  }
  if (options.excludeParticipants.length) {
    logger.info(`Excluded participants: ${options.excludeParticipants.join(', ')}`);
  }

  const sorted = new Map<number, LocatedFile[]>();
  for (const participant of [...byParticipant.keys()].sort((a, b) => a - b)) {
    const files = byParticipant.get(participant) ?? [];
    files.sort((a, b) => a.block - b.block || a.name.localeCompare(b.name));
    sorted.set(participant, files);
  }
  return { participants: sorted, unresolved };
}
