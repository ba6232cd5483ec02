/**
 * Environment loader - import before any module that reads configuration.
 */
import { config } from 'dotenv';
import path from 'path';

/** Load .env.local, then .env; values already set are never overwritten */
export function loadEnvFiles(dir: string = process.cwd()): void {
  const debug = process.env.DEBUG === 'true';
  config({ path: path.join(dir, '.env.local'), debug });
  config({ path: path.join(dir, '.env'), debug });
}

loadEnvFiles();
