/**
 * Shared fixtures for storyboard tests.
 */

import type { CollaboratorResult, SceneRecord, TextGenerationParams, TextGenerator, WindowLyrics } from '@/types';
import { calculateSceneWindows, formatSceneTimestamp, mapLyricsToWindows } from '@/services/storyboard/sceneWindows';

export const SECONDS_PER_SCENE = 6;

/** Windows for a song of `total` full scenes with no lyrics */
export function makeWindows(total: number, lyrics: readonly string[] = []): WindowLyrics[] {
  const windows = calculateSceneWindows(total * SECONDS_PER_SCENE, SECONDS_PER_SCENE);
  const mapped = mapLyricsToWindows(windows, []);
  return mapped.map((w, i) => ({ window: w.window, lyrics: lyrics[i] ?? '' }));
}

export function sceneReply(from: number, to: number): string {
  const blocks: string[] = [];
  for (let n = from; n <= to; n++) {
    blocks.push(`SCENE ${n}: 6 seconds\nShot ${n} of the sleeping city.`);
  }
  return blocks.join('\n\n');
}

export function makeScene(scene: number, prompt: string, lyrics = ''): SceneRecord {
  return {
    scene,
    timestamp: formatSceneTimestamp((scene - 1) * SECONDS_PER_SCENE),
    duration: '6s',
    lyrics,
    prompt,
  };
}

export function ok(content: string): CollaboratorResult {
  return { success: true, content, error: '' };
}

/** Requested [start, end] parsed from a storyboard request */
export function requestedRange(prompt: string): [number, number] {
  const match = /Create scenes (\d+) to (\d+)/.exec(prompt);
  if (!match) throw new Error(`No range in prompt: ${prompt.slice(0, 80)}`);
  return [Number(match[1]), Number(match[2])];
}

/**
 * Text collaborator that answers every request with at most `perCall` scenes
 * starting at the requested start.
 */
export class BatchingTextGenerator implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(private readonly perCall = 14) {}

  async generate(params: TextGenerationParams): Promise<CollaboratorResult> {
    this.prompts.push(params.prompt);
    const [start, end] = requestedRange(params.prompt);
    return ok(sceneReply(start, Math.min(end, start + this.perCall - 1)));
  }
}
