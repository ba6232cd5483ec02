/**
 * Storyboard Session
 *
 * Owns the mutable state of one song's storyboard: the accepted scene records,
 * the active visual preset and the assembled-prompt cache. Nothing here is global, so two sessions
 * never share cached prompts.
 *
 * The session is used by a single sequential worker and does no locking.
 */

import type { SceneRecord, SongIdentifiers, ThemeContext, WindowLyrics } from '@/types';
import { ValidationError } from './errors';

/**
 * Assembled prompts keyed by (scene, presetKey).
 */
export class PromptCache {
  private entries = new Map<string, string>();

  private key(scene: number, presetKey: string): string {
    return `${scene}::${presetKey}`;
  }

  get(scene: number, presetKey: string): string | undefined {
    return this.entries.get(this.key(scene, presetKey));
  }

  set(scene: number, presetKey: string, prompt: string): void {
    this.entries.set(this.key(scene, presetKey), prompt);
  }

  has(scene: number, presetKey: string): boolean {
    return this.entries.has(this.key(scene, presetKey));
  }

  /** Drop cached prompts for one scene (every preset), or for all scenes */
  invalidate(scene?: number): void {
    if (scene === undefined) {
      this.entries.clear();
      return;
    }
    const prefix = `${scene}::`;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) this.entries.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

export function generateSessionId(): string {
  return `sb_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

export interface StoryboardSessionInit {
  id?: string;
  songIdentifiers: SongIdentifiers;
  theme: ThemeContext;
  secondsPerScene: number;
  windows: readonly WindowLyrics[];
  scenes?: readonly SceneRecord[];
}

export class StoryboardSession {
  readonly id: string;
  readonly songIdentifiers: SongIdentifiers;
  readonly secondsPerScene: number;
  readonly windows: readonly WindowLyrics[];
  readonly promptCache = new PromptCache();

  private scenes = new Map<number, SceneRecord>();
  private activeTheme: ThemeContext;

  constructor(init: StoryboardSessionInit) {
    this.id = init.id ?? generateSessionId();
    this.songIdentifiers = init.songIdentifiers;
    this.activeTheme = init.theme;
    this.secondsPerScene = init.secondsPerScene;
    this.windows = init.windows;
    if (init.scenes) this.addScenes(init.scenes);
  }

  /** Theme of the active visual preset */
  get theme(): ThemeContext {
    return this.activeTheme;
  }

  /**
   * Switch to another visual preset. Prompts cached under earlier presets are
   * kept, so switching back reuses them.
   */
  setActivePreset(theme: ThemeContext): void {
    this.activeTheme = theme;
  }

  get totalScenes(): number {
    return this.windows.length;
  }

  /**
   * Accept new scene records. Scene numbers already present are left as they
   * are; returns how many records were added.
   */
  addScenes(records: readonly SceneRecord[]): number {
    let added = 0;
    for (const record of records) {
      if (this.scenes.has(record.scene)) continue;
      this.scenes.set(record.scene, { ...record });
      added++;
    }
    return added;
  }

  getScene(scene: number): SceneRecord | undefined {
    const record = this.scenes.get(scene);
    return record ? { ...record } : undefined;
  }

  getScenes(): SceneRecord[] {
    return [...this.scenes.values()]
      .sort((a, b) => a.scene - b.scene)
      .map(record => ({ ...record }));
  }

  /** The only scene field that may change after a record is accepted */
  setGeneratedPrompt(scene: number, prompt: string): void {
    const record = this.scenes.get(scene);
    if (!record) {
      throw new ValidationError(`Scene ${scene} does not exist in session ${this.id}`);
    }
    this.scenes.set(scene, { ...record, generated_prompt: prompt });
  }
}
