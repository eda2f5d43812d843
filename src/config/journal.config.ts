import * as path from 'path';

export const JOURNAL_CONFIG = Symbol('JOURNAL_CONFIG');

export interface JournalConfig {
  dataFile: string;   // JSON file holding every trade record
  imageDir: string;   // directory for uploaded screenshots
  port: number;
}

const DEFAULTS = {
  dataFile: 'journal_data.json',
  imageDir: 'trade_images',
  port: 3000,
} as const;

/**
 * Reads journal settings from the environment.
 * Relative paths resolve against the working directory.
 * @throws Error if PORT is set but not a positive integer
 */
export function loadJournalConfig(env: NodeJS.ProcessEnv = process.env): JournalConfig {
  const rawPort = env.PORT?.trim();
  const port = rawPort ? Number(rawPort) : DEFAULTS.port;
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`PORT must be a positive integer, got "${rawPort}"`);
  }

  return {
    dataFile: path.resolve(env.JOURNAL_DATA_FILE?.trim() || DEFAULTS.dataFile),
    imageDir: path.resolve(env.JOURNAL_IMAGE_DIR?.trim() || DEFAULTS.imageDir),
    port,
  };
}
