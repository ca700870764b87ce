import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

/**
 * Directory of the calling module (ESM replacement for __dirname)
 */
export function getDirname(metaUrl: string): string {
  return dirname(fileURLToPath(metaUrl));
}

/**
 * Walk up from `startDir` to the nearest package.json and return its version.
 * Works from both src/ and the compiled dist/src/.
 */
export function readPackageVersion(startDir: string, fallback = '1.0.0'): string {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      try {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version;
        }
      } catch {
        return fallback;
      }
      return fallback;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return fallback;
    }
    dir = parent;
  }
}
