/**
 * Storyboard Service
 *
 * Entry point for turning a timestamped transcript into a complete storyboard
 * session: parse, drop sparse fragments, cut scene windows, map lyrics, then
 * run the completion loop.
 */

import type { LyricSegment, SongIdentifiers, TextGenerator, ThemeContext, WindowLyrics } from '@/types';
import { storyboardLogger } from '../logger';
import { FileAuditRecorder, noopAuditRecorder, type AuditRecorder } from '../auditLogService';
import { getStoryboardConfig, type StoryboardConfig } from './config';
import { filterSparseTrailingFragments, parseTranscript, type TranscriptFormat } from './timestampParser';
import { calculateSceneWindows, mapLyricsToWindows } from './sceneWindows';
import {
  StoryboardCompletionLoop,
  retryPolicyFromConfig,
  type CompletionResult,
  type RetryPolicy,
} from './completionLoop';
import { StoryboardSession } from './session';

const log = storyboardLogger.child('Service');

export interface PreparedStoryboard {
  format: TranscriptFormat;
  segments: LyricSegment[];
  untimedLines: string[];
  windows: WindowLyrics[];
}

/**
 * Parse a transcript and map its lyrics onto scene windows.
 */
export function prepareStoryboard(
  transcript: string,
  songDuration: number,
  secondsPerScene: number,
  options: { sparseFragmentMaxWords?: number } = {},
): PreparedStoryboard {
  const parsed = parseTranscript(transcript, songDuration);
  const segments = filterSparseTrailingFragments(parsed.segments, secondsPerScene, {
    maxWords: options.sparseFragmentMaxWords,
  });
  const windows = mapLyricsToWindows(calculateSceneWindows(songDuration, secondsPerScene), segments);

  log.info(
    `Prepared ${windows.length} scenes from ${segments.length} ${parsed.format} segments ` +
    `(${parsed.segments.length - segments.length} sparse fragments dropped)`
  );
  return { format: parsed.format, segments, untimedLines: parsed.untimedLines, windows };
}

export interface GenerateStoryboardOptions {
  transcript: string;
  songDuration: number;
  theme: ThemeContext;
  songIdentifiers: SongIdentifiers;
  textGenerator: TextGenerator;
  /** Defaults to the configuration from the environment */
  config?: StoryboardConfig;
  /** Overrides config.secondsPerScene */
  secondsPerScene?: number;
  /** Overrides the completion settings from config */
  policy?: Partial<RetryPolicy>;
  /** Overrides the recorder chosen from config.audit */
  audit?: AuditRecorder;
}

export interface StoryboardOutcome {
  session: StoryboardSession;
  prepared: PreparedStoryboard;
  result: CompletionResult;
}

export async function generateStoryboard(options: GenerateStoryboardOptions): Promise<StoryboardOutcome> {
  const config = options.config ?? getStoryboardConfig();
  const secondsPerScene = options.secondsPerScene ?? config.secondsPerScene;

  const prepared = prepareStoryboard(options.transcript, options.songDuration, secondsPerScene, {
    sparseFragmentMaxWords: config.sparseFragment.maxWords,
  });

  const audit =
    options.audit ??
    (config.audit.enabled
      ? new FileAuditRecorder({
          directory: config.audit.directory,
          songIdentifiers: options.songIdentifiers,
          secondsPerScene,
        })
      : noopAuditRecorder);

  const loop = new StoryboardCompletionLoop({
    textGenerator: options.textGenerator,
    policy: { ...retryPolicyFromConfig(config), ...options.policy },
    audit,
    maxTokens: config.generation.maxTokens,
    temperature: config.generation.temperature,
  });

  const result = await loop.generate({ theme: options.theme, windows: prepared.windows });

  const session = new StoryboardSession({
    songIdentifiers: options.songIdentifiers,
    theme: options.theme,
    secondsPerScene,
    windows: prepared.windows,
    scenes: result.scenes,
  });

  log.info(`Session ${session.id}: ${result.scenes.length}/${session.totalScenes} scenes (${result.mode})`);
  return { session, prepared, result };
}
