/**
 * Resolve an executable on the search path
 */

import os from 'os';
import { exec } from './exec.js';
import { logger } from './logger.js';

// where.exe is called by absolute path so no shell is involved
function getWhichCommand(): string {
  return os.platform() === 'win32' ? 'C:\\Windows\\System32\\where.exe' : 'which';
}

/**
 * @returns First resolved location of `command`, or null when the lookup
 * finds nothing or cannot run
 */
export async function getCommandPath(command: string): Promise<string | null> {
  try {
    const result = await exec(getWhichCommand(), [command]);
    if (result.code !== 0) {
      return null;
    }

    const [first] = result.stdout
      .split(/\r?\n|\r/)
      .map(line => line.trim())
      .filter(line => line.length > 0);
    return first ?? null;
  } catch (error) {
    logger.debug(`lookup of ${command} failed`, error);
    return null;
  }
}
