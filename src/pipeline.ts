import type { Config } from './config.js';
import { isFileError } from './errors.js';
import { locateTrialLogs } from './services/locator.js';
import { readTrialLog } from './services/reader.js';
import { ResultsTable, writeResults } from './services/results.js';
import { scoreTrialLog } from './services/scoring.js';
import { participantId, type Logger } from './types/iat.js';

export type PipelineResult = {
  table: ResultsTable;
  processed: number;
  skipped: number;
};

export function runPipeline(config: Config, logger: Logger = console): PipelineResult {
  const { participants, unresolved } = locateTrialLogs(config.dataDir, config, logger);
  const table = new ResultsTable(logger);
  let processed = 0;
  let skipped = 0;

  const skipOrThrow = (err: unknown) => {
    if (config.onFileError === 'skip' && isFileError(err)) {
      skipped++;
      logger.warn(`Skipping file: ${err.message}`);
      return;
    }
    throw err;
  };

  unresolved.forEach(({ error }) => skipOrThrow(error));

  for (const [participant, files] of participants) {
    table.ensureParticipant(participant);
    for (const file of files) {
      try {
        const summary = scoreTrialLog(readTrialLog(file), config.layout, config.scoring);
        if (table.record(participant, file.block, summary, file.path)) processed++;
      } catch (e) {
        skipOrThrow(e);
      }
    }
    const row = table.get(participant);
    if (row && !Object.keys(row.blocks).length) {
      logger.warn(`No block could be scored for ${participantId(participant)}`);
    }
  }

  return { table, processed, skipped };
}

/** Runs the pipeline and writes the results table once, at the end. */
export function runScoring(config: Config, logger: Logger = console): string {
  const { table, processed, skipped } = runPipeline(config, logger);
  const out = writeResults(table, config.resultDir, config.resultFile);
  logger.info(`Scored ${processed} file(s) for ${table.size} participant(s), skipped ${skipped}; results written to ${out}`);
  return out;
}
