/**
 * Timestamp Parser
 *
 * Normalizes raw lyric transcripts into ordered LyricSegments. Four dialects
 * are recognized, in priority order:
 *
 *   1. `start=end=text`            explicit start/end pair
 *   2. `M:SS=text`                 single timestamp, end inferred
 *   3. `[M:SS] text` / `(M:SS)`    inline markers, several per line allowed
 *   4. plain lines                 spread evenly over the song
 *
 * Each line is lexed into one token; the most frequent kind becomes the
 * transcript's dominant format (ties go to the higher priority). Lines of any
 * other kind lose their own timing and join the timed line before them.
 */

import type { LyricSegment } from '@/types';
import { countWords } from '../utils/textProcessing';
import { storyboardLogger } from '../logger';
import { ValidationError } from './errors';

const log = storyboardLogger.child('TimestampParser');

export type TranscriptFormat = 'range' | 'single' | 'bracketed' | 'plain';

export interface ParsedTranscript {
  format: TranscriptFormat;
  segments: LyricSegment[];
  /** Lines that did not match the dominant timed format; their text is merged into neighbouring segments */
  untimedLines: string[];
}

interface TimedEntry {
  start: number;
  end?: number;
  text: string;
}

type LineToken =
  | { kind: 'range'; entry: TimedEntry; raw: string }
  | { kind: 'single'; entry: TimedEntry; raw: string }
  | { kind: 'bracketed'; entries: TimedEntry[]; raw: string }
  | { kind: 'plain'; text: string; raw: string };

// ============================================================================
// Lexer
// ============================================================================

const CLOCK = String.raw`(?:\d{1,2}:)?\d{1,3}:\d{1,2}(?:[.,]\d{1,3})?`;
const RANGE_LINE = new RegExp(String.raw`^\s*(${CLOCK})\s*=\s*(${CLOCK})\s*=(.*)$`);
const SINGLE_LINE = new RegExp(String.raw`^\s*(${CLOCK})\s*=(.*)$`);
const INLINE_MARKER = new RegExp(String.raw`[\[(]\s*(${CLOCK})\s*[\])]`, 'g');

const FORMAT_PRIORITY: readonly TranscriptFormat[] = ['range', 'single', 'bracketed', 'plain'];

/**
 * Convert "M:SS", "MM:SS.mmm" or "H:MM:SS" into seconds.
 */
export function parseClock(value: string): number {
  const parts = value.trim().replace(',', '.').split(':');
  let seconds = 0;
  for (const part of parts) {
    seconds = seconds * 60 + Number(part);
  }
  return seconds;
}

function lexLine(raw: string): LineToken | null {
  if (!raw.trim()) return null;

  const range = RANGE_LINE.exec(raw);
  if (range) {
    const start = parseClock(range[1] ?? '0');
    const end = parseClock(range[2] ?? '0');
    return { kind: 'range', entry: { start, end: Math.max(start, end), text: range[3] ?? '' }, raw };
  }

  const single = SINGLE_LINE.exec(raw);
  if (single) {
    return { kind: 'single', entry: { start: parseClock(single[1] ?? '0'), text: single[2] ?? '' }, raw };
  }

  const markers = [...raw.matchAll(INLINE_MARKER)];
  if (markers.length > 0) {
    const entries: TimedEntry[] = [];
    const prefix = raw.slice(0, markers[0]?.index ?? 0);
    markers.forEach((marker, i) => {
      const textStart = (marker.index ?? 0) + marker[0].length;
      const textEnd = markers[i + 1]?.index ?? raw.length;
      const text = raw.slice(textStart, textEnd);
      entries.push({
        start: parseClock(marker[1] ?? '0'),
        text: i === 0 && prefix.trim() ? `${prefix.trim()} ${text.trim()}` : text,
      });
    });
    return { kind: 'bracketed', entries, raw };
  }

  return { kind: 'plain', text: raw, raw };
}

// ============================================================================
// Structural markers
// ============================================================================

const SECTION_WORDS = [
  'pre-chorus', 'post-chorus', 'verse', 'chorus', 'bridge', 'intro', 'outro', 'hook',
  'refrain', 'interlude', 'instrumental', 'breakdown', 'break', 'solo', 'drop', 'coda',
].join('|');

const SECTION_LABEL = String.raw`(?:${SECTION_WORDS})(?:\s+\d+)?`;
const MARKER_ONLY = new RegExp(String.raw`^\s*(?:[\[(]\s*${SECTION_LABEL}\s*[\])]|${SECTION_LABEL}\s*:?)\s*$`, 'i');
const BRACKETED_LABEL = new RegExp(String.raw`^\s*[\[(]\s*${SECTION_LABEL}\s*[\])]\s*`, 'i');
const COLON_LABEL = new RegExp(String.raw`^\s*${SECTION_LABEL}\s*:\s*`, 'i');

/**
 * True when the text is only a section label such as "[Chorus]",
 * "Verse 2:" or "(instrumental)".
 */
export function isStructuralMarker(text: string): boolean {
  return MARKER_ONLY.test(text);
}

/**
 * Remove leading section labels from a lyric line. Marker-only text is
 * returned trimmed so callers can still classify it.
 */
export function stripSectionLabels(text: string): string {
  let current = text.trim();
  if (isStructuralMarker(current)) return current;

  let previous = '';
  while (current !== previous) {
    previous = current;
    current = current.replace(BRACKETED_LABEL, '').replace(COLON_LABEL, '').trim();
  }
  return current;
}

// ============================================================================
// Parsing
// ============================================================================

function tokenFormat(token: LineToken): TranscriptFormat {
  return token.kind;
}

function selectDominantFormat(tokens: LineToken[]): TranscriptFormat {
  const counts = new Map<TranscriptFormat, number>();
  for (const token of tokens) {
    const format = tokenFormat(token);
    counts.set(format, (counts.get(format) ?? 0) + 1);
  }

  let best: TranscriptFormat = 'plain';
  let bestCount = 0;
  for (const format of FORMAT_PRIORITY) {
    const count = counts.get(format) ?? 0;
    if (count > bestCount) {
      best = format;
      bestCount = count;
    }
  }
  return best;
}

function tokenText(token: LineToken): string {
  switch (token.kind) {
    case 'range':
    case 'single':
      return token.entry.text;
    case 'bracketed':
      return token.entries.map(e => e.text.trim()).filter(Boolean).join(' ');
    case 'plain':
      return token.text;
  }
}

function distributeEvenly(lines: string[], songDuration: number): LyricSegment[] {
  const step = lines.length > 0 ? songDuration / lines.length : 0;
  return lines.map((text, i) => ({
    start: i * step,
    end: (i + 1) * step,
    text,
  }));
}

function resolveTimedEntries(entries: TimedEntry[], songDuration: number): LyricSegment[] {
  const sorted = [...entries].sort((a, b) => a.start - b.start);
  const segments: LyricSegment[] = [];

  sorted.forEach((entry, i) => {
    const text = stripSectionLabels(entry.text);
    // An empty timed entry only closes the previous line.
    if (!text) return;

    const next = sorted[i + 1];
    const inferredEnd = next ? next.start : Math.max(entry.start, songDuration);
    segments.push({
      start: entry.start,
      end: entry.end ?? inferredEnd,
      text,
    });
  });

  return segments;
}

/**
 * Parse a raw transcript into ordered lyric segments.
 *
 * @param text - Transcript in any supported dialect
 * @param songDuration - Song length, used for the last inferred end and for
 *   spreading untimed lines
 */
export function parseTranscript(text: string, songDuration: number): ParsedTranscript {
  if (!Number.isFinite(songDuration) || songDuration < 0) {
    throw new ValidationError(`Song duration must be a non-negative number, got ${songDuration}`);
  }

  const tokens = text
    .split(/\r?\n/)
    .map(lexLine)
    .filter((token): token is LineToken => token !== null);

  const format = selectDominantFormat(tokens);

  if (format === 'plain') {
    const lines = tokens
      .map(token => stripSectionLabels(tokenText(token)))
      .filter(Boolean);
    log.debug(`No dominant timestamp format; spreading ${lines.length} lines over ${songDuration}s`);
    return { format, segments: distributeEvenly(lines, songDuration), untimedLines: [] };
  }

  const entries: TimedEntry[] = [];
  const untimedLines: string[] = [];
  const leading: string[] = [];
  let last: TimedEntry | undefined;

  for (const token of tokens) {
    if (token.kind !== format) {
      untimedLines.push(token.raw.trim());
      const text = stripSectionLabels(tokenText(token));
      if (!text || isStructuralMarker(text)) continue;

      // Untimed lines join the timed line before them, or the first one.
      if (last) {
        last.text = `${last.text.trim()} ${text}`;
      } else {
        leading.push(text);
      }
      continue;
    }

    const timed = token.kind === 'bracketed' ? token.entries : [token.entry];
    const first = timed[0];
    if (!last && first && leading.length > 0) {
      first.text = [...leading, stripSectionLabels(first.text)].filter(Boolean).join(' ');
    }
    entries.push(...timed);
    last = timed[timed.length - 1] ?? last;
  }

  if (untimedLines.length > 0) {
    log.warn(`${untimedLines.length} line(s) do not match the ${format} timestamp format; merged into the neighbouring timed lines`);
  }

  return { format, segments: resolveTimedEntries(entries, songDuration), untimedLines };
}

export interface SparseFragmentOptions {
  /** Fragments with at most this many words are candidates for removal */
  maxWords?: number;
}

/**
 * Drop short fragments that appear long after the previous kept segment.
 *
 * A segment is removed when the start-to-start gap since the last kept segment
 * exceeds one scene duration and it has no more than `maxWords` words. The gap
 * is measured from the most recent kept segment, so it resets after every kept
 * entry.
 */
export function filterSparseTrailingFragments(
  segments: readonly LyricSegment[],
  secondsPerScene: number,
  options: SparseFragmentOptions = {},
): LyricSegment[] {
  const { maxWords = 2 } = options;
  const kept: LyricSegment[] = [];
  let lastKeptStart: number | null = null;

  for (const segment of segments) {
    const gap = lastKeptStart === null ? 0 : segment.start - lastKeptStart;
    if (gap > secondsPerScene && countWords(segment.text) <= maxWords) {
      log.debug(`Dropping sparse fragment "${segment.text}" at ${segment.start}s (gap ${gap.toFixed(1)}s)`);
      continue;
    }
    kept.push(segment);
    lastKeptStart = segment.start;
  }

  return kept;
}
