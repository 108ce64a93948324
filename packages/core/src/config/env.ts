import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

/**
 * Find and load the nearest .env file
 *
 * Walks up from `startDir` (at most `maxDepth` levels) and loads the first
 * .env found; falls back to the working directory. Returns the loaded path,
 * or undefined when there is none. Variables already set are kept.
 */
export function loadEnvFile(startDir: string, maxDepth = 10): string | undefined {
  let currentDir = startDir;

  for (let depth = 0; depth < maxDepth; depth++) {
    const envPath = join(currentDir, '.env');
    if (existsSync(envPath)) {
      dotenv.config({ path: envPath });
      return envPath;
    }

    const parentDir = resolve(currentDir, '..');
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  const cwdEnvPath = join(process.cwd(), '.env');
  if (existsSync(cwdEnvPath)) {
    dotenv.config({ path: cwdEnvPath });
    return cwdEnvPath;
  }

  return undefined;
}

/**
 * Directory of a module given its import.meta.url
 */
export function moduleDir(url: string): string {
  return dirname(fileURLToPath(url));
}
