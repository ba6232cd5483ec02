/**
 * Scene Window Tests
 *
 * Property: windows are contiguous, start at 0, end at the song duration and
 * number ceil(duration / secondsPerScene).
 * Property: lyric mapping is deterministic.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  calculateSceneWindows,
  countSceneWindows,
  formatSceneDuration,
  formatSceneTimestamp,
  lyricsForWindow,
  mapLyricsToWindows,
} from '@/services/storyboard/sceneWindows';
import { parseTranscript } from '@/services/storyboard/timestampParser';
import { ValidationError } from '@/services/storyboard/errors';

describe('Scene Windows', () => {
  it('should cut a 20s song into 6s windows with a clipped last window', () => {
    const windows = calculateSceneWindows(20, 6);

    expect(windows).toEqual([
      { index: 1, start: 0, end: 6, duration: 6 },
      { index: 2, start: 6, end: 12, duration: 6 },
      { index: 3, start: 12, end: 18, duration: 6 },
      { index: 4, start: 18, end: 20, duration: 2 },
    ]);
  });

  it('should not add a window when the duration divides evenly', () => {
    expect(countSceneWindows(18, 6)).toBe(3);
    expect(countSceneWindows(18.5, 6)).toBe(4);
  });

  it('should reject non-positive inputs', () => {
    expect(() => countSceneWindows(0, 6)).toThrow(ValidationError);
    expect(() => calculateSceneWindows(20, 0)).toThrow(ValidationError);
  });

  it('should map lyrics by segment start and skip structural markers', () => {
    const { segments } = parseTranscript('line one\nline two\n[Chorus]\nline three', 12);
    const windows = calculateSceneWindows(12, 6);

    expect(mapLyricsToWindows(windows, segments).map(w => w.lyrics)).toEqual([
      'line one line two',
      'line three',
    ]);
  });

  it('should give windows without lyrics an empty string', () => {
    const [first, second] = calculateSceneWindows(12, 6);
    const segments = [{ start: 1, end: 4, text: '  hold on  ' }];

    expect(lyricsForWindow(first, segments)).toBe('hold on');
    expect(lyricsForWindow(second, segments)).toBe('');
  });

  it('should format timestamps and durations', () => {
    expect(formatSceneTimestamp(75)).toBe('1:15');
    expect(formatSceneTimestamp(5.9)).toBe('0:05');
    expect(formatSceneTimestamp(600)).toBe('10:00');
    expect(formatSceneDuration(5.6)).toBe('6s');
    expect(formatSceneDuration(2)).toBe('2s');
  });

  it('should never label a clipped last window as zero seconds', () => {
    const windows = calculateSceneWindows(12.3, 6);

    expect(windows).toHaveLength(3);
    expect(formatSceneDuration(windows[2]?.duration ?? 0)).toBe('1s');
  });

  describe('properties', () => {
    const arbDuration = fc.integer({ min: 1, max: 3600 });
    const arbSecondsPerScene = fc.integer({ min: 1, max: 60 });

    it('windows SHALL cover [0, duration) contiguously', () => {
      fc.assert(
        fc.property(arbDuration, arbSecondsPerScene, (duration, secondsPerScene) => {
          const windows = calculateSceneWindows(duration, secondsPerScene);

          expect(windows).toHaveLength(Math.ceil(duration / secondsPerScene));
          expect(windows[0].start).toBe(0);
          expect(windows[windows.length - 1].end).toBe(duration);
          windows.forEach((w, i) => {
            expect(w.index).toBe(i + 1);
            expect(w.duration).toBeGreaterThan(0);
            if (i > 0) expect(w.start).toBe(windows[i - 1].end);
          });
        }),
      );
    });

    it('lyric mapping SHALL be idempotent', () => {
      const arbSegments = fc.array(
        fc.record({
          start: fc.integer({ min: 0, max: 120 }),
          text: fc.constantFrom('hold on', 'city lights', '[Chorus]', 'we ride', ''),
        }),
        { maxLength: 20 },
      );

      fc.assert(
        fc.property(arbSegments, raw => {
          const segments = raw
            .map(s => ({ start: s.start, end: s.start + 1, text: s.text }))
            .sort((a, b) => a.start - b.start);
          const windows = calculateSceneWindows(120, 6);

          expect(mapLyricsToWindows(windows, segments)).toEqual(mapLyricsToWindows(windows, segments));
        }),
      );
    });
  });
});
