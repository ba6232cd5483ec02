/**
 * Storyboard Response Parser
 *
 * Line-driven state machine over the collaborator's free-text reply:
 *
 *   SEEKING_SCENE        ignore preamble until the first scene marker
 *   ACCUMULATING_PROMPT  collect description lines for the open scene
 *
 * A scene marker (`SCENE <n>[: <duration>]`, markdown wrappers tolerated)
 * flushes the open scene and starts a new one. The last scene is flushed at
 * end of input. Timestamp and lyrics come from the window mapping, never from
 * the reply.
 */

import type { SceneRecord, WindowLyrics } from '@/types';
import { storyboardLogger } from '../logger';
import { previewText } from '../utils/textProcessing';
import { formatSceneDuration, formatSceneTimestamp } from './sceneWindows';

const log = storyboardLogger.child('ResponseParser');

export enum ParserState {
  SEEKING_SCENE = 'SEEKING_SCENE',
  ACCUMULATING_PROMPT = 'ACCUMULATING_PROMPT',
}

export type ParseResult =
  | { ok: true; scenes: SceneRecord[]; maxScene: number; markerCount: number }
  | { ok: false; reason: 'no-scene-markers'; preview: string };

interface OpenScene {
  scene: number;
  durationLabel?: string;
  lines: string[];
}

const SCENE_MARKER =
  /^\s*[#>*_\s]*SCENE\s+(\d+)\b\s*(\([^)]*\d[^)]*\))?\s*(?:\*\*)?\s*(?:[:\-–—.]\s*(?:\*\*)?\s*(.*?))?\s*(?:\*\*)?\s*$/i;
// What follows a "(0:06, 6s)" timing group is the lyric line echoed back from the request.
const ECHOED_LYRICS = /^(?:\[no lyrics\]|["“].*["”])$/i;
const DURATION = /^(\d+(?:\.\d+)?)\s*(?:s|secs?|seconds?)?\.?$/i;
const LYRICS_DECLARATION = /^\s*[*_]{0,2}\s*lyrics?\s*[*_]{0,2}\s*:/i;

export interface SceneMarker {
  scene: number;
  durationLabel?: string;
  /** Description text that followed the marker on the same line */
  inlineText?: string;
}

/**
 * Match a single line against the scene-marker grammar.
 */
export function matchSceneMarker(line: string): SceneMarker | null {
  const match = SCENE_MARKER.exec(line);
  if (!match) return null;

  const scene = Number(match[1]);
  const timing = match[2];
  const rest = (match[3] ?? '').trim();
  if (!rest || (timing && ECHOED_LYRICS.test(rest))) return { scene };

  const duration = DURATION.exec(rest);
  if (duration) {
    return { scene, durationLabel: `${Number(duration[1])}s` };
  }
  return { scene, inlineText: rest };
}

export function hasSceneMarkers(text: string): boolean {
  return text.split(/\r?\n/).some(line => matchSceneMarker(line) !== null);
}

/**
 * Parse a reply into scene records.
 *
 * @param text - Raw collaborator reply
 * @param windows - Window mapping for the whole song; scenes without a window
 *   are skipped
 */
export function parseStoryboardResponse(text: string, windows: readonly WindowLyrics[]): ParseResult {
  const byIndex = new Map(windows.map(w => [w.window.index, w]));
  const scenes: SceneRecord[] = [];
  const seen = new Set<number>();

  let state: ParserState = ParserState.SEEKING_SCENE;
  let open: OpenScene | null = null;
  let markerCount = 0;

  const flush = (current: OpenScene): void => {
    const mapped = byIndex.get(current.scene);
    if (!mapped) {
      log.warn(`Ignoring scene ${current.scene}: outside the ${windows.length}-scene window range`);
      return;
    }
    if (seen.has(current.scene)) {
      log.warn(`Ignoring repeated scene ${current.scene}`);
      return;
    }

    // A scene without expected lyrics must stay text-free.
    const lines = mapped.lyrics
      ? current.lines
      : current.lines.filter(line => !LYRICS_DECLARATION.test(line));

    seen.add(current.scene);
    scenes.push({
      scene: current.scene,
      timestamp: formatSceneTimestamp(mapped.window.start),
      duration: current.durationLabel ?? formatSceneDuration(mapped.window.duration),
      lyrics: mapped.lyrics,
      prompt: lines.join('\n'),
    });
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const marker = matchSceneMarker(rawLine);

    if (marker) {
      markerCount++;
      if (open) flush(open);
      open = {
        scene: marker.scene,
        durationLabel: marker.durationLabel,
        lines: marker.inlineText ? [marker.inlineText] : [],
      };
      state = ParserState.ACCUMULATING_PROMPT;
      continue;
    }

    const line = rawLine.trim();
    if (!line) continue;

    switch (state) {
      case ParserState.SEEKING_SCENE:
        break;
      case ParserState.ACCUMULATING_PROMPT:
        open?.lines.push(line);
        break;
    }
  }

  if (open) flush(open);

  if (markerCount === 0) {
    return { ok: false, reason: 'no-scene-markers', preview: previewText(text) };
  }

  scenes.sort((a, b) => a.scene - b.scene);
  const maxScene = scenes.reduce((max, s) => Math.max(max, s.scene), 0);
  return { ok: true, scenes, maxScene, markerCount };
}

/**
 * Canonical text form of scene records, readable by parseStoryboardResponse.
 */
export function serializeScenes(scenes: readonly SceneRecord[]): string {
  return scenes
    .map(s => (s.prompt ? `SCENE ${s.scene}: ${s.duration}\n${s.prompt}` : `SCENE ${s.scene}: ${s.duration}`))
    .join('\n\n');
}
