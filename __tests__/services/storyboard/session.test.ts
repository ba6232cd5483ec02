/**
 * Storyboard Session Tests
 */

import { describe, it, expect } from 'vitest';
import { PromptCache, StoryboardSession } from '@/services/storyboard/session';
import { createThemeContext } from '@/services/storyboard/themeContext';
import { ValidationError } from '@/services/storyboard/errors';
import { makeScene, makeWindows } from './helpers';

function newSession() {
  return new StoryboardSession({
    id: 'sb_test',
    songIdentifiers: { title: 'Night Drive' },
    theme: createThemeContext(),
    secondsPerScene: 6,
    windows: makeWindows(4),
  });
}

describe('Prompt Cache', () => {
  it('should key entries by scene and preset', () => {
    const cache = new PromptCache();
    cache.set(1, 'noir', 'prompt A');

    expect(cache.get(1, 'noir')).toBe('prompt A');
    expect(cache.get(1, 'pastel')).toBeUndefined();
    expect(cache.has(2, 'noir')).toBe(false);
  });

  it('should invalidate one scene across presets', () => {
    const cache = new PromptCache();
    cache.set(1, 'noir', 'a');
    cache.set(1, 'pastel', 'b');
    cache.set(11, 'noir', 'c');

    cache.invalidate(1);

    expect(cache.size).toBe(1);
    expect(cache.get(11, 'noir')).toBe('c');

    cache.invalidate();
    expect(cache.size).toBe(0);
  });
});

describe('Storyboard Session', () => {
  it('should keep the first record for a scene number', () => {
    const session = newSession();

    expect(session.addScenes([makeScene(2, 'first'), makeScene(1, 'opening')])).toBe(2);
    expect(session.addScenes([makeScene(2, 'second')])).toBe(0);

    expect(session.getScenes().map(s => [s.scene, s.prompt])).toEqual([
      [1, 'opening'],
      [2, 'first'],
    ]);
  });

  it('should hand out copies of its records', () => {
    const session = newSession();
    session.addScenes([makeScene(1, 'opening')]);

    const copy = session.getScene(1);
    if (copy) copy.prompt = 'changed';

    expect(session.getScene(1)?.prompt).toBe('opening');
  });

  it('should only allow generated_prompt to change', () => {
    const session = newSession();
    session.addScenes([makeScene(1, 'opening')]);

    session.setGeneratedPrompt(1, 'final prompt');

    expect(session.getScene(1)).toEqual({ ...makeScene(1, 'opening'), generated_prompt: 'final prompt' });
    expect(() => session.setGeneratedPrompt(3, 'x')).toThrow(ValidationError);
  });

  it('should switch the active preset', () => {
    const session = newSession();
    const pastel = createThemeContext({ presetKey: 'pastel' });

    session.setActivePreset(pastel);

    expect(session.theme).toBe(pastel);
    expect(session.theme.presetKey).toBe('pastel');
  });

  it('should not share caches between sessions', () => {
    const a = newSession();
    const b = newSession();
    a.promptCache.set(1, 'default', 'from a');

    expect(b.promptCache.get(1, 'default')).toBeUndefined();
    expect(a.totalScenes).toBe(4);
  });
});
