/**
 * Scene Window Calculator
 *
 * Splits a song into fixed-length scene windows and resolves the lyrics that
 * fall inside each one. All functions are pure.
 */

import type { LyricSegment, SceneWindow, WindowLyrics } from '@/types';
import { isStructuralMarker } from './timestampParser';
import { ValidationError } from './errors';

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive number, got ${value}`);
  }
}

/**
 * Number of windows needed to cover the song: ceil(duration / secondsPerScene).
 */
export function countSceneWindows(songDuration: number, secondsPerScene: number): number {
  assertPositive('songDuration', songDuration);
  assertPositive('secondsPerScene', secondsPerScene);
  return Math.ceil(songDuration / secondsPerScene);
}

/**
 * Ordered, contiguous windows covering [0, songDuration). The last window is
 * clipped to the song end.
 *
 * @example
 * calculateSceneWindows(20, 6) // [0,6) [6,12) [12,18) [18,20)
 */
export function calculateSceneWindows(songDuration: number, secondsPerScene: number): SceneWindow[] {
  const count = countSceneWindows(songDuration, secondsPerScene);
  const windows: SceneWindow[] = [];

  for (let i = 0; i < count; i++) {
    const start = i * secondsPerScene;
    const end = i === count - 1 ? songDuration : (i + 1) * secondsPerScene;
    windows.push({ index: i + 1, start, end, duration: end - start });
  }

  return windows;
}

/**
 * Space-joined text of every segment starting inside [window.start, window.end),
 * skipping structural markers such as "(instrumental)". May be empty.
 */
export function lyricsForWindow(window: SceneWindow, segments: readonly LyricSegment[]): string {
  return segments
    .filter(s => s.start >= window.start && s.start < window.end)
    .map(s => s.text.trim())
    .filter(text => text.length > 0 && !isStructuralMarker(text))
    .join(' ');
}

export function mapLyricsToWindows(
  windows: readonly SceneWindow[],
  segments: readonly LyricSegment[],
): WindowLyrics[] {
  return windows.map(window => ({ window, lyrics: lyricsForWindow(window, segments) }));
}

/**
 * Format seconds as "M:SS".
 *
 * @example
 * formatSceneTimestamp(75) // "1:15"
 */
export function formatSceneTimestamp(seconds: number): string {
  const whole = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(whole / 60);
  const remainder = whole % 60;
  return `${minutes}:${String(remainder).padStart(2, '0')}`;
}

/**
 * Format a window length as "Ns", rounding to whole seconds. A clipped last
 * window shorter than half a second still reads "1s".
 */
export function formatSceneDuration(seconds: number): string {
  return `${Math.max(1, Math.round(seconds))}s`;
}
