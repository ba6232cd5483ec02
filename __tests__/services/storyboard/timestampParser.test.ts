/**
 * Timestamp Parser Tests
 */

import { describe, it, expect } from 'vitest';
import {
  filterSparseTrailingFragments,
  isStructuralMarker,
  parseClock,
  parseTranscript,
  stripSectionLabels,
} from '@/services/storyboard/timestampParser';
import { ValidationError } from '@/services/storyboard/errors';

describe('Timestamp Parser', () => {
  describe('parseClock', () => {
    it('should parse minutes and seconds', () => {
      expect(parseClock('0:05')).toBe(5);
      expect(parseClock('01:15')).toBe(75);
    });

    it('should parse fractional seconds with a dot or comma', () => {
      expect(parseClock('1:05.5')).toBe(65.5);
      expect(parseClock('0:07,25')).toBe(7.25);
    });

    it('should parse hours', () => {
      expect(parseClock('1:02:03')).toBe(3723);
    });
  });

  describe('parseTranscript', () => {
    it('should parse start=end=text ranges', () => {
      const result = parseTranscript('0:05=00:06=hello\n0:06=00:07=world', 10);

      expect(result.format).toBe('range');
      expect(result.segments).toEqual([
        { start: 5, end: 6, text: 'hello' },
        { start: 6, end: 7, text: 'world' },
      ]);
      expect(result.untimedLines).toEqual([]);
    });

    it('should infer ends from the next entry and the song duration', () => {
      const result = parseTranscript('0:00=first line\n0:04=second line\n0:09=third', 12);

      expect(result.format).toBe('single');
      expect(result.segments).toEqual([
        { start: 0, end: 4, text: 'first line' },
        { start: 4, end: 9, text: 'second line' },
        { start: 9, end: 12, text: 'third' },
      ]);
    });

    it('should parse several bracketed markers on one line', () => {
      const result = parseTranscript('[0:01.500] hello there [0:03] general', 10);

      expect(result.format).toBe('bracketed');
      expect(result.segments).toEqual([
        { start: 1.5, end: 3, text: 'hello there' },
        { start: 3, end: 10, text: 'general' },
      ]);
    });

    it('should accept parenthesised markers and keep text before the first one', () => {
      const result = parseTranscript('oh (0:02) yeah', 5);

      expect(result.segments).toEqual([{ start: 2, end: 5, text: 'oh yeah' }]);
    });

    it('should strip leading section labels', () => {
      const result = parseTranscript('0:00=[Verse 1] walking down\n0:05=Chorus: sing it', 10);

      expect(result.segments.map(s => s.text)).toEqual(['walking down', 'sing it']);
    });

    it('should let an empty entry close the previous line', () => {
      const result = parseTranscript('0:00=hello\n0:04=\n0:10=again', 12);

      expect(result.segments).toEqual([
        { start: 0, end: 4, text: 'hello' },
        { start: 10, end: 12, text: 'again' },
      ]);
    });

    it('should sort entries by start time', () => {
      const result = parseTranscript('0:08=later\n0:02=earlier', 10);

      expect(result.segments).toEqual([
        { start: 2, end: 8, text: 'earlier' },
        { start: 8, end: 10, text: 'later' },
      ]);
    });

    it('should merge lines of another format into the timed line before them', () => {
      const result = parseTranscript('0:00=one\n0:03=two\nstray words', 6);

      expect(result.format).toBe('single');
      expect(result.segments).toEqual([
        { start: 0, end: 3, text: 'one' },
        { start: 3, end: 6, text: 'two stray words' },
      ]);
      expect(result.untimedLines).toEqual(['stray words']);
    });

    it('should give untimed opening lines to the first timed line', () => {
      const result = parseTranscript('[Intro]\nhey there\n0:02=one\n0:05=two', 8);

      expect(result.segments).toEqual([
        { start: 2, end: 5, text: 'hey there one' },
        { start: 5, end: 8, text: 'two' },
      ]);
      expect(result.untimedLines).toEqual(['[Intro]', 'hey there']);
    });

    it('should spread untimed lyrics evenly over the song', () => {
      const result = parseTranscript('line one\nline two\n[Chorus]\nline three', 12);

      expect(result.format).toBe('plain');
      expect(result.segments).toEqual([
        { start: 0, end: 3, text: 'line one' },
        { start: 3, end: 6, text: 'line two' },
        { start: 6, end: 9, text: '[Chorus]' },
        { start: 9, end: 12, text: 'line three' },
      ]);
    });

    it('should return no segments for an empty transcript', () => {
      expect(parseTranscript('\n\n', 30).segments).toEqual([]);
    });

    it('should reject an invalid song duration', () => {
      expect(() => parseTranscript('0:00=hi', -1)).toThrow(ValidationError);
      expect(() => parseTranscript('0:00=hi', Number.NaN)).toThrow(ValidationError);
    });
  });

  describe('structural markers', () => {
    it('should recognise marker-only text', () => {
      expect(isStructuralMarker('[Chorus]')).toBe(true);
      expect(isStructuralMarker('(instrumental)')).toBe(true);
      expect(isStructuralMarker('Verse 2:')).toBe(true);
      expect(isStructuralMarker('the chorus of birds')).toBe(false);
    });

    it('should strip stacked labels but leave marker-only text alone', () => {
      expect(stripSectionLabels('[Intro] Bridge: come closer')).toBe('come closer');
      expect(stripSectionLabels('  [Outro] ')).toBe('[Outro]');
    });
  });

  describe('filterSparseTrailingFragments', () => {
    it('should drop short fragments far from the previous kept segment', () => {
      const segments = [
        { start: 0, end: 3, text: 'first words here' },
        { start: 3, end: 20, text: 'more lyrics now' },
        { start: 20, end: 40, text: 'yeah' },
        { start: 40, end: 42, text: 'final long line here' },
      ];

      const kept = filterSparseTrailingFragments(segments, 6);

      expect(kept.map(s => s.text)).toEqual(['first words here', 'more lyrics now', 'final long line here']);
    });

    it('should measure the gap from the most recent kept segment', () => {
      const segments = [
        { start: 0, end: 5, text: 'a b c' },
        { start: 5, end: 10, text: 'oh' },
        { start: 10, end: 12, text: 'hey' },
      ];

      expect(filterSparseTrailingFragments(segments, 6)).toHaveLength(3);
    });

    it('should honour a custom word limit', () => {
      const segments = [
        { start: 0, end: 10, text: 'opening line of the song' },
        { start: 10, end: 12, text: 'come on now' },
      ];

      expect(filterSparseTrailingFragments(segments, 6, { maxWords: 2 })).toHaveLength(2);
      expect(filterSparseTrailingFragments(segments, 6, { maxWords: 3 })).toHaveLength(1);
    });
  });
});
