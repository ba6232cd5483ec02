/**
 * Continuity Engine Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ContinuityEngine, withThemePrefix } from '@/services/storyboard/continuityEngine';
import { StoryboardSession } from '@/services/storyboard/session';
import { createThemeContext } from '@/services/storyboard/themeContext';
import type { CollaboratorResult, ThemeContext } from '@/types';
import { makeScene, makeWindows, ok } from './helpers';

const STREET = 'A lone figure walks through neon-lit rain on a crowded city street at night';
const DESCRIPTION = 'Teal and magenta neon, wet asphalt reflections, low-angle wide shot.';

function setup(options: { theme?: ThemeContext; exists?: boolean; cover?: string } = {}) {
  const session = new StoryboardSession({
    songIdentifiers: { title: 'Night Drive' },
    theme: options.theme ?? createThemeContext(),
    secondsPerScene: 6,
    windows: makeWindows(4),
  });
  session.addScenes([makeScene(1, STREET)]);

  const analyze = vi
    .fn<(paths: string[], prompt: string, systemMessage?: string) => Promise<CollaboratorResult>>()
    .mockResolvedValue(ok(DESCRIPTION));
  const fileExists = vi.fn(async () => options.exists ?? true);

  const engine = new ContinuityEngine({
    session,
    vision: { analyze },
    images: {
      sceneImagePath: scene => `/renders/scene_${scene}.png`,
      albumCoverPath: () => options.cover,
    },
    fileExists,
  });
  return { engine, analyze, fileExists };
}

describe('Continuity Engine', () => {
  it('should describe the previous image for a near-identical scene', async () => {
    const { engine, analyze } = setup();

    const hint = await engine.resolveContinuityHint(2, `${STREET} slowly`);

    expect(hint).toEqual({
      source: 'previous-scene',
      sourceScene: 1,
      imagePath: '/renders/scene_1.png',
      description: DESCRIPTION,
      similarity: 13 / 14,
      text: `Reference image — use only for continuity (palette, lighting, composition): ${DESCRIPTION}`,
    });
    expect(analyze).toHaveBeenCalledWith(['/renders/scene_1.png'], expect.any(String), expect.any(String));
  });

  it('should skip short prompts', async () => {
    const { engine, analyze } = setup();

    expect(engine.compare('Rain.', 'Rain.')).toBeNull();
    expect(await engine.resolveContinuityHint(2, 'Rain.')).toBeNull();
    expect(analyze).not.toHaveBeenCalled();
  });

  it('should skip dissimilar prompts', async () => {
    const { engine, analyze } = setup();

    const hint = await engine.resolveContinuityHint(2, 'Sunflower fields under a bright midday sky with drifting clouds');

    expect(hint).toBeNull();
    expect(analyze).not.toHaveBeenCalled();
  });

  it('should skip when the previous image has not been rendered', async () => {
    const { engine, analyze } = setup({ exists: false });

    expect(await engine.resolveContinuityHint(2, STREET)).toBeNull();
    expect(analyze).not.toHaveBeenCalled();
  });

  it('should compare theme-prefixed text', () => {
    expect(withThemePrefix('rain falls', 'Cinematic still:')).toBe('Cinematic still: rain falls');
    expect(withThemePrefix('cinematic still: rain falls', 'Cinematic still:')).toBe('cinematic still: rain falls');
    expect(withThemePrefix('  rain falls ', '')).toBe('rain falls');
  });

  it('should describe each image once', async () => {
    const { engine, analyze } = setup();

    await engine.resolveContinuityHint(2, STREET);
    await engine.resolveContinuityHint(2, STREET);

    expect(analyze).toHaveBeenCalledTimes(1);
  });

  it('should give no hint when the vision call fails', async () => {
    const { engine, analyze } = setup();
    analyze.mockResolvedValueOnce({ success: false, content: '', error: 'vision offline' });

    expect(await engine.resolveContinuityHint(2, STREET)).toBeNull();
  });

  it('should use the album cover for the first scene', async () => {
    const { engine } = setup({ cover: '/covers/night-drive.png' });

    const hint = await engine.resolveContinuityHint(1, STREET);

    expect(hint?.source).toBe('album-cover');
    expect(hint?.text).toBe(
      `Album cover reference — use this as the starting visual tone; make the scene a moving shot: ${DESCRIPTION}`,
    );
  });

  it('should give the first scene no hint without an album cover', async () => {
    const { engine } = setup();

    expect(await engine.resolveContinuityHint(1, STREET)).toBeNull();
  });

  describe('with rendered files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'continuity-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should check the filesystem for the previous image', async () => {
      const session = new StoryboardSession({
        songIdentifiers: { title: 'Night Drive' },
        theme: createThemeContext(),
        secondsPerScene: 6,
        windows: makeWindows(3),
        scenes: [makeScene(1, STREET), makeScene(2, STREET)],
      });
      const analyze = vi
        .fn<(paths: string[], prompt: string) => Promise<CollaboratorResult>>()
        .mockResolvedValue(ok(DESCRIPTION));
      const engine = new ContinuityEngine({
        session,
        vision: { analyze },
        images: { sceneImagePath: scene => path.join(dir, `scene_${scene}.png`) },
      });
      await writeFile(path.join(dir, 'scene_1.png'), 'placeholder');

      expect(await engine.resolveContinuityHint(2, STREET)).not.toBeNull();
      expect(await engine.resolveContinuityHint(3, STREET)).toBeNull();
      expect(analyze).toHaveBeenCalledTimes(1);
    });
  });
});
