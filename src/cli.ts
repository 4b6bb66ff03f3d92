import { loadConfig } from './config.js';
import { formatError } from './errors.js';
import { runScoring } from './pipeline.js';

type Env = Record<string, string | undefined>;
export type CliLogger = Pick<Console, 'log' | 'info' | 'warn' | 'error'>;

/** Runs one scoring pass and returns the process exit code. */
export function main(env: Env, argv: string[], logger: CliLogger = console): number {
  try {
    const config = loadConfig(env, argv);
    logger.log(`Scoring IAT logs in ${config.dataDir}`);
    runScoring(config, logger);
    return 0;
  } catch (err) {
    logger.error(formatError(err));
    return 1;
  }
}
