/**
 * Env file loading for scripts. Imported before anything that reads
 * process.env at load time (the root logger reads LOG_LEVEL).
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

/** `.env.local` first, then `.env`; already-set variables win */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  dotenv.config({ path: resolve(cwd, '.env.local') });
  dotenv.config({ path: resolve(cwd, '.env') });
}

loadEnvFiles();
