/**
 * Storyboard Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { loadStoryboardConfig } from '@/services/storyboard/config';
import { ConfigurationError } from '@/services/storyboard/errors';

describe('Storyboard Configuration', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadStoryboardConfig({})).toEqual({
      secondsPerScene: 6,
      sparseFragment: { maxWords: 2 },
      continuity: { similarityThreshold: 0.55, minLength: 40, maxImageDimension: 512 },
      completion: { batchSize: 14, maxIterations: 10, onInteriorGap: 'flag' },
      generation: { maxTokens: 8000, temperature: 0.7 },
      imageSize: '1536x1024',
      audit: { enabled: false, directory: 'storyboard-audit' },
      collaboratorTimeoutMs: 120000,
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadStoryboardConfig({
      STORYBOARD_SECONDS_PER_SCENE: '4.5',
      STORYBOARD_CONTINUITY_THRESHOLD: '0.8',
      STORYBOARD_BATCH_SIZE: '10',
      STORYBOARD_ON_INTERIOR_GAP: 'fail',
      STORYBOARD_AUDIT_ENABLED: 'true',
      STORYBOARD_AUDIT_DIR: '/tmp/audit',
    });

    expect(config.secondsPerScene).toBe(4.5);
    expect(config.continuity.similarityThreshold).toBe(0.8);
    expect(config.completion).toEqual({ batchSize: 10, maxIterations: 10, onInteriorGap: 'fail' });
    expect(config.audit).toEqual({ enabled: true, directory: '/tmp/audit' });
  });

  it('should reject invalid values', () => {
    expect(() => loadStoryboardConfig({ STORYBOARD_SECONDS_PER_SCENE: '-2' })).toThrow(ConfigurationError);
    expect(() => loadStoryboardConfig({ STORYBOARD_ON_INTERIOR_GAP: 'skip' })).toThrow(ConfigurationError);
    expect(() => loadStoryboardConfig({ STORYBOARD_CONTINUITY_THRESHOLD: '1.5' })).toThrow(
      /STORYBOARD_CONTINUITY_THRESHOLD/,
    );
  });
});
