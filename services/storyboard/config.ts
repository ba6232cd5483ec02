/**
 * Storyboard Configuration
 *
 * Tunables for timing, continuity gating, completion batching and audit output.
 * Values come from the environment and are validated with zod; every field has
 * a default so an empty environment yields a working configuration.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
  STORYBOARD_SECONDS_PER_SCENE: z.coerce.number().positive().default(6),
  STORYBOARD_SPARSE_FRAGMENT_MAX_WORDS: z.coerce.number().int().nonnegative().default(2),
  STORYBOARD_CONTINUITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.55),
  STORYBOARD_CONTINUITY_MIN_LENGTH: z.coerce.number().int().nonnegative().default(40),
  STORYBOARD_VISION_MAX_DIMENSION: z.coerce.number().int().positive().default(512),
  STORYBOARD_BATCH_SIZE: z.coerce.number().int().positive().default(14),
  STORYBOARD_MAX_ITERATIONS: z.coerce.number().int().positive().default(10),
  STORYBOARD_ON_INTERIOR_GAP: z.enum(['flag', 'fail']).default('flag'),
  STORYBOARD_MAX_TOKENS: z.coerce.number().int().positive().default(8000),
  STORYBOARD_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  STORYBOARD_IMAGE_SIZE: z.string().regex(/^\d+x\d+$/).default('1536x1024'),
  STORYBOARD_AUDIT_ENABLED: booleanFlag.default('false'),
  STORYBOARD_AUDIT_DIR: z.string().min(1).default('storyboard-audit'),
  COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
});

export type InteriorGapPolicy = 'flag' | 'fail';

export interface StoryboardConfig {
  secondsPerScene: number;
  sparseFragment: {
    maxWords: number;
  };
  continuity: {
    similarityThreshold: number;
    minLength: number;
    maxImageDimension: number;
  };
  completion: {
    batchSize: number;
    maxIterations: number;
    onInteriorGap: InteriorGapPolicy;
  };
  generation: {
    maxTokens: number;
    temperature: number;
  };
  imageSize: string;
  audit: {
    enabled: boolean;
    directory: string;
  };
  collaboratorTimeoutMs: number;
}

/**
 * Parse a configuration from an environment map.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadStoryboardConfig(env: NodeJS.ProcessEnv = process.env): StoryboardConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid storyboard configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    secondsPerScene: e.STORYBOARD_SECONDS_PER_SCENE,
    sparseFragment: {
      maxWords: e.STORYBOARD_SPARSE_FRAGMENT_MAX_WORDS,
    },
    continuity: {
      similarityThreshold: e.STORYBOARD_CONTINUITY_THRESHOLD,
      minLength: e.STORYBOARD_CONTINUITY_MIN_LENGTH,
      maxImageDimension: e.STORYBOARD_VISION_MAX_DIMENSION,
    },
    completion: {
      batchSize: e.STORYBOARD_BATCH_SIZE,
      maxIterations: e.STORYBOARD_MAX_ITERATIONS,
      onInteriorGap: e.STORYBOARD_ON_INTERIOR_GAP,
    },
    generation: {
      maxTokens: e.STORYBOARD_MAX_TOKENS,
      temperature: e.STORYBOARD_TEMPERATURE,
    },
    imageSize: e.STORYBOARD_IMAGE_SIZE,
    audit: {
      enabled: e.STORYBOARD_AUDIT_ENABLED,
      directory: e.STORYBOARD_AUDIT_DIR,
    },
    collaboratorTimeoutMs: e.COLLABORATOR_TIMEOUT_MS,
  };
}

let cached: StoryboardConfig | null = null;

/** Configuration from process.env, parsed on first use */
export function getStoryboardConfig(): StoryboardConfig {
  if (!cached) {
    cached = loadStoryboardConfig();
  }
  return cached;
}
