/**
 * Scene Renderer
 *
 * Generates one image per scene, strictly in scene order. Cancellation is
 * checked between scenes only; a scene already sent to the synthesizer is
 * finished first. A failed scene is recorded and rendering moves on.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { ImageSynthesizer } from '@/types';
import { storyboardLogger } from '../logger';
import type { ScenePromptAssembler } from './promptAssembler';
import type { StoryboardSession } from './session';

const log = storyboardLogger.child('SceneRenderer');

export interface RenderProgress {
  scene: number;
  completed: number;
  total: number;
  status: 'rendered' | 'failed';
}

export interface RenderSceneImagesOptions {
  assembler: ScenePromptAssembler;
  synthesizer: ImageSynthesizer;
  imagePathFor: (scene: number) => string;
  size: string;
  /** Limit rendering to these scene numbers */
  scenes?: readonly number[];
  signal?: AbortSignal;
  shouldCancel?: () => boolean;
  onProgress?: (progress: RenderProgress) => void;
}

export interface RenderFailure {
  scene: number;
  error: string;
}

export interface RenderSummary {
  rendered: number[];
  failed: RenderFailure[];
  cancelled: boolean;
}

export async function renderSceneImages(
  session: StoryboardSession,
  options: RenderSceneImagesOptions,
): Promise<RenderSummary> {
  const wanted = options.scenes ? new Set(options.scenes) : null;
  const scenes = session.getScenes().filter(s => !wanted || wanted.has(s.scene));
  const summary: RenderSummary = { rendered: [], failed: [], cancelled: false };

  let completed = 0;
  for (const scene of scenes) {
    if (options.signal?.aborted || options.shouldCancel?.()) {
      log.info(`Rendering cancelled before scene ${scene.scene}`);
      summary.cancelled = true;
      break;
    }

    const prompt = await options.assembler.assemble(scene.scene);
    const result = await options.synthesizer.synthesize(prompt, options.size);
    completed++;

    if (result.success && result.imageBytes) {
      const target = options.imagePathFor(scene.scene);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, result.imageBytes);
      summary.rendered.push(scene.scene);
      log.info(`Scene ${scene.scene}: image saved to ${target}`);
      options.onProgress?.({ scene: scene.scene, completed, total: scenes.length, status: 'rendered' });
    } else {
      const error = result.error || 'no image returned';
      summary.failed.push({ scene: scene.scene, error });
      log.warn(`Scene ${scene.scene}: image generation failed: ${error}`);
      options.onProgress?.({ scene: scene.scene, completed, total: scenes.length, status: 'failed' });
    }
  }

  return summary;
}
