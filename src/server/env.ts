/**
 * Environment loading shared by the stdio and HTTP entry points.
 *
 * @module server/env
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

/**
 * Load .env from the first candidate that exists:
 * 1. STUDY_HELPER_ENV_FILE (explicit override)
 * 2. CWD/.env (project-local)
 * 3. Package root/.env (development)
 *
 * @returns The file loaded, or null when none exists
 */
export function loadEnvironment(): string | null {
  const envCandidates = [
    process.env.STUDY_HELPER_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.resolve(packageRoot, '.env'),
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);

  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      return envPath;
    }
  }
  return null;
}
