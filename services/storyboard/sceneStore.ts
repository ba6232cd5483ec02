/**
 * Scene Store
 *
 * Persists a storyboard as the ordered scene array under `storyboard.scenes`
 * of a song record JSON file. Other fields of the song record are preserved.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { SceneRecord } from '@/types';
import { storyboardLogger } from '../logger';
import { ValidationError } from './errors';
import type { StoryboardSession } from './session';

const log = storyboardLogger.child('SceneStore');

export const SceneRecordSchema = z.object({
  scene: z.number().int().positive(),
  timestamp: z.string(),
  duration: z.string(),
  lyrics: z.string(),
  prompt: z.string(),
  generated_prompt: z.string().optional(),
});

const SongRecordSchema = z
  .object({
    storyboard: z
      .object({
        scenes: z.array(SceneRecordSchema).default([]),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

type SongRecord = z.infer<typeof SongRecordSchema>;

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function readSongRecord(songPath: string): Promise<SongRecord> {
  let raw: string;
  try {
    raw = await readFile(songPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Song record ${songPath} is not valid JSON: ${error instanceof Error ? error.message : error}`);
  }

  const parsed = SongRecordSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ValidationError(`Song record ${songPath} is invalid: ${issues}`);
  }
  return parsed.data;
}

/**
 * Scenes stored in a song record, ordered by scene number. A missing file or
 * a record without a storyboard yields an empty list.
 */
export async function readScenes(songPath: string): Promise<SceneRecord[]> {
  const record = await readSongRecord(songPath);
  const scenes = record.storyboard?.scenes ?? [];
  return [...scenes].sort((a, b) => a.scene - b.scene);
}

export async function writeScenes(songPath: string, scenes: readonly SceneRecord[]): Promise<void> {
  const record = await readSongRecord(songPath);
  const ordered = [...scenes].sort((a, b) => a.scene - b.scene);
  const updated: SongRecord = {
    ...record,
    storyboard: { ...record.storyboard, scenes: ordered },
  };

  await mkdir(path.dirname(songPath), { recursive: true });
  await writeFile(songPath, JSON.stringify(updated, null, 2), 'utf-8');
  log.info(`Saved ${ordered.length} scenes to ${songPath}`);
}

/**
 * Copy assembled prompts from the session into the stored scenes. Only
 * `generated_prompt` changes; scenes missing from the file are not added.
 * Returns how many stored scenes were updated.
 */
export async function saveGeneratedPrompts(songPath: string, session: StoryboardSession): Promise<number> {
  const stored = await readScenes(songPath);
  let updated = 0;

  const scenes = stored.map(record => {
    const generated = session.getScene(record.scene)?.generated_prompt;
    if (generated === undefined || generated === record.generated_prompt) return record;
    updated++;
    return { ...record, generated_prompt: generated };
  });

  if (updated > 0) {
    await writeScenes(songPath, scenes);
  }
  return updated;
}
