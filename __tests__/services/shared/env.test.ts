/**
 * Environment Loader Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadEnvFiles } from '@/services/shared/env';

describe('Environment Loader', () => {
  let dir: string | undefined;

  afterEach(async () => {
    delete process.env.STORYBOARD_ENV_SAMPLE;
    delete process.env.STORYBOARD_ENV_BASE_ONLY;
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it('should let .env.local win over .env', async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'env-'));
    await writeFile(path.join(dir, '.env.local'), 'STORYBOARD_ENV_SAMPLE=local\n');
    await writeFile(path.join(dir, '.env'), 'STORYBOARD_ENV_SAMPLE=base\nSTORYBOARD_ENV_BASE_ONLY=base\n');

    loadEnvFiles(dir);

    expect(process.env.STORYBOARD_ENV_SAMPLE).toBe('local');
    expect(process.env.STORYBOARD_ENV_BASE_ONLY).toBe('base');
  });

  it('should do nothing when no env files exist', async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'env-'));

    loadEnvFiles(dir);

    expect(process.env.STORYBOARD_ENV_SAMPLE).toBeUndefined();
  });
});
