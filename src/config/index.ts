/**
 * config/index.ts — Configuration loader.
 *
 * Bootstraps settings in two phases:
 *   1. Loads a .env file from the working directory, if there is one.
 *      Variables already set in the environment win over the file.
 *   2. Reads the runtime settings (token, timeout, part size, publisher)
 *      from the environment, validating every numeric value.
 *
 * Called once by the CLI before any client is created.
 */
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { LIMITS } from '../shared';
import { logger } from '../utils/logger';
import { parsePartSizeMiB, parsePositiveInteger } from '../utils/validators';

export { SYSTEMS, SYSTEM_NAMES, getSystem, tokenUrl } from './systems';
export type { SystemConfig } from './systems';

export const DEFAULT_PUBLISHER = 'Universität Münster';

export interface RuntimeSettings {
  token?: string;
  requestTimeoutMs: number;
  partSize: number;
  publisher: string;
}

/**
 * Loads .env from `cwd` without overriding existing variables.
 * @returns The path of the loaded file, or undefined when none exists
 */
export function loadConfig(cwd = process.cwd()): string | undefined {
  const envPath = path.resolve(cwd, '.env');
  if (!fs.existsSync(envPath)) return undefined;

  const result = dotenv.config({ path: envPath, override: false });
  if (result.error) {
    throw result.error;
  }
  logger.debug(`Loaded .env from ${envPath}`);
  return envPath;
}

export function getRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  const token = env.INVENIORDM_TOKEN?.trim();

  return {
    ...(token && { token }),
    requestTimeoutMs: parsePositiveInteger(
      env.RDM_REQUEST_TIMEOUT_MS,
      'RDM_REQUEST_TIMEOUT_MS',
      LIMITS.REQUEST_TIMEOUT_MS,
    ),
    partSize: parsePartSizeMiB(env.RDM_PART_SIZE_MB, 'RDM_PART_SIZE_MB', LIMITS.DEFAULT_PART_SIZE),
    publisher: env.RDM_PUBLISHER?.trim() || DEFAULT_PUBLISHER,
  };
}
