/**
 * Continuity Engine
 *
 * When a scene reads much like the one before it, describe the previous
 * scene's rendered image and hand that description to the prompt assembler as
 * a continuity hint. Scene 1 can instead borrow its starting tone from the
 * album cover.
 *
 * Similarity is token Jaccard on case-folded, theme-prefixed scene text. Both
 * texts must reach `minLength` characters and the score must reach
 * `similarityThreshold`. Hints are advisory: a missing image or a failed
 * vision call yields no hint.
 */

import { access } from 'fs/promises';
import type { VisionAnalyzer } from '@/types';
import { storyboardLogger } from '../logger';
import { jaccardSimilarity } from '../utils/textProcessing';
import type { StoryboardSession } from './session';

const log = storyboardLogger.child('Continuity');

const DESCRIBE_SYSTEM_MESSAGE =
  'You describe images for an image generator. Be concrete and brief. Never mention that you are looking at an image.';

const DESCRIBE_PROMPT =
  'Describe this image in at most 60 words: color palette, lighting, camera framing and composition, ' +
  'and the setting. Do not describe any text in the image.';

export interface SceneImageLocator {
  /** Where the rendered image for a scene is (or will be) stored */
  sceneImagePath(scene: number): string;
  albumCoverPath?(): string | undefined;
}

export interface ContinuityOptions {
  similarityThreshold: number;
  minLength: number;
}

export const DEFAULT_CONTINUITY_OPTIONS: Readonly<ContinuityOptions> = Object.freeze({
  similarityThreshold: 0.55,
  minLength: 40,
});

export type ContinuitySource = 'previous-scene' | 'album-cover';

export interface ContinuityHint {
  source: ContinuitySource;
  /** Scene whose image was described; 0 for the album cover */
  sourceScene: number;
  imagePath: string;
  description: string;
  similarity?: number;
  text: string;
}

export interface ContinuityEngineOptions {
  session: StoryboardSession;
  vision: VisionAnalyzer;
  images: SceneImageLocator;
  options?: Partial<ContinuityOptions>;
  fileExists?: (filePath: string) => Promise<boolean>;
}

async function defaultFileExists(filePath: string): Promise<boolean> {
  return access(filePath).then(
    () => true,
    () => false,
  );
}

/** Scene text as the image model sees it: theme prefix first, once */
export function withThemePrefix(prompt: string, themePrefix: string): string {
  const body = prompt.trim();
  if (!themePrefix) return body;
  if (body.toLowerCase().startsWith(themePrefix.toLowerCase())) return body;
  return `${themePrefix} ${body}`;
}

export function formatContinuityHint(source: ContinuitySource, description: string): string {
  return source === 'album-cover'
    ? `Album cover reference — use this as the starting visual tone; make the scene a moving shot: ${description}`
    : `Reference image — use only for continuity (palette, lighting, composition): ${description}`;
}

export class ContinuityEngine {
  private readonly session: StoryboardSession;
  private readonly vision: VisionAnalyzer;
  private readonly images: SceneImageLocator;
  private readonly options: ContinuityOptions;
  private readonly fileExists: (filePath: string) => Promise<boolean>;
  private readonly descriptions = new Map<string, string>();

  constructor(init: ContinuityEngineOptions) {
    this.session = init.session;
    this.vision = init.vision;
    this.images = init.images;
    this.options = { ...DEFAULT_CONTINUITY_OPTIONS, ...init.options };
    this.fileExists = init.fileExists ?? defaultFileExists;
  }

  /**
   * Similarity between two scene texts, or null when either is too short to
   * compare.
   */
  compare(previous: string, candidate: string): number | null {
    if (previous.length < this.options.minLength || candidate.length < this.options.minLength) {
      return null;
    }
    return jaccardSimilarity(previous, candidate);
  }

  isSimilar(previous: string, candidate: string): boolean {
    const score = this.compare(previous, candidate);
    return score !== null && score >= this.options.similarityThreshold;
  }

  /**
   * Continuity hint for `sceneNumber`, whose body text is `candidatePrompt`.
   */
  async resolveContinuityHint(sceneNumber: number, candidatePrompt: string): Promise<ContinuityHint | null> {
    if (sceneNumber === 1) {
      return this.albumCoverHint();
    }

    const previous = this.session.getScene(sceneNumber - 1);
    if (!previous) return null;

    const prefix = this.session.theme.themePrefix;
    const previousText = withThemePrefix(previous.prompt, prefix);
    const candidateText = withThemePrefix(candidatePrompt, prefix);

    const score = this.compare(previousText, candidateText);
    if (score === null || score < this.options.similarityThreshold) {
      return null;
    }

    const imagePath = this.images.sceneImagePath(previous.scene);
    if (!(await this.fileExists(imagePath))) {
      log.debug(`Scene ${sceneNumber} resembles scene ${previous.scene} (${score.toFixed(2)}) but no image exists yet`);
      return null;
    }

    const description = await this.describe(imagePath);
    if (!description) return null;

    log.info(`Scene ${sceneNumber}: continuity reference from scene ${previous.scene} (similarity ${score.toFixed(2)})`);
    return {
      source: 'previous-scene',
      sourceScene: previous.scene,
      imagePath,
      description,
      similarity: score,
      text: formatContinuityHint('previous-scene', description),
    };
  }

  private async albumCoverHint(): Promise<ContinuityHint | null> {
    const coverPath = this.images.albumCoverPath?.();
    if (!coverPath || !(await this.fileExists(coverPath))) return null;

    const description = await this.describe(coverPath);
    if (!description) return null;

    return {
      source: 'album-cover',
      sourceScene: 0,
      imagePath: coverPath,
      description,
      text: formatContinuityHint('album-cover', description),
    };
  }

  private async describe(imagePath: string): Promise<string | null> {
    const cached = this.descriptions.get(imagePath);
    if (cached) return cached;

    const result = await this.vision.analyze([imagePath], DESCRIBE_PROMPT, DESCRIBE_SYSTEM_MESSAGE);
    if (!result.success) {
      log.warn(`Vision description failed for ${imagePath}: ${result.error}`);
      return null;
    }

    const description = result.content.replace(/\s+/g, ' ').trim();
    if (!description) {
      log.warn(`Vision description for ${imagePath} was empty`);
      return null;
    }

    this.descriptions.set(imagePath, description);
    return description;
  }
}
