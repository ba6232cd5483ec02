/**
 * Storyboard Request Builder
 *
 * Composes the instruction sent to the text collaborator for one batch of
 * scenes. Output depends only on the batch (and its theme), so the same batch
 * always produces the same text; audit records rely on that.
 */

import type { StoryboardBatch, StoryboardRequest, ThemeContext, WindowLyrics } from '@/types';
import substitutions from './data/safetySubstitutions.json';
import { formatSceneDuration, formatSceneTimestamp } from './sceneWindows';
import { ValidationError } from './errors';

export interface SafetySubstitution {
  term: string;
  replacement: string;
}

export const SAFETY_SUBSTITUTIONS: readonly SafetySubstitution[] = substitutions;

export const NO_LYRICS_MARKER = '[NO LYRICS]';

const SYSTEM_MESSAGE =
  'You are a music video director writing shot-by-shot storyboards for an image generator. ' +
  'Follow the requested output format exactly. Never ask for confirmation, never offer to split the work, ' +
  'and never summarize: write every requested scene.';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const SUBSTITUTION_PATTERNS = SAFETY_SUBSTITUTIONS.map(s => ({
  pattern: new RegExp(`\\b${escapeRegExp(s.term)}\\b`, 'gi'),
  replacement: s.replacement,
}));

/**
 * Replace banned terms with their safe synonyms, keeping a leading capital.
 */
export function applySafetySubstitutions(text: string): string {
  let result = text;
  for (const { pattern, replacement } of SUBSTITUTION_PATTERNS) {
    result = result.replace(pattern, match => {
      const first = match.charAt(0);
      return first === first.toUpperCase() && first !== first.toLowerCase()
        ? replacement.charAt(0).toUpperCase() + replacement.slice(1)
        : replacement;
    });
  }
  return result;
}

/**
 * Slice the window mapping for [startScene, endScene] into a batch.
 */
export function createBatch(
  startScene: number,
  endScene: number,
  allWindows: readonly WindowLyrics[],
  theme: ThemeContext,
): StoryboardBatch {
  const totalScenes = allWindows.length;
  if (startScene < 1 || endScene > totalScenes || startScene > endScene) {
    throw new ValidationError(`Invalid batch range ${startScene}-${endScene} for ${totalScenes} scenes`);
  }
  return {
    startScene,
    endScene,
    totalScenes,
    theme,
    windows: allWindows.filter(w => w.window.index >= startScene && w.window.index <= endScene),
  };
}

function personaSection(theme: ThemeContext): string[] {
  if (!theme.personaName) {
    return ['PERSONA: There is no recurring performer. Do not invent a main character.'];
  }
  const lines = [
    `PERSONA: ${theme.personaName} appears in about ${theme.personaAppearancePercent}% of the scenes. ` +
      `Never feature ${theme.personaName} in two consecutive scenes. Mention ${theme.personaName} by name whenever they appear.`,
  ];
  if (theme.personaVisuals) {
    lines.push(`Appearance of ${theme.personaName}: ${theme.personaVisuals}`);
  }
  return lines;
}

function lyricsSection(windows: readonly WindowLyrics[]): string[] {
  const lines = windows.map(({ window, lyrics }) => {
    const header = `SCENE ${window.index} (${formatSceneTimestamp(window.start)}, ${formatSceneDuration(window.duration)})`;
    return lyrics ? `${header}: "${lyrics}"` : `${header}: ${NO_LYRICS_MARKER}`;
  });
  return [
    'SCENE LYRICS:',
    ...lines,
    `For scenes marked ${NO_LYRICS_MARKER}, describe a purely visual moment and do not add a "Lyrics:" line.`,
  ];
}

function safetySection(): string[] {
  return [
    'SAFE WORDING: never use the words on the left; use the replacement on the right instead.',
    ...SAFETY_SUBSTITUTIONS.map(s => `- ${s.term} -> ${s.replacement}`),
  ];
}

/**
 * Build the instruction for one batch.
 */
export function buildStoryboardRequest(batch: StoryboardBatch): StoryboardRequest {
  const { startScene, endScene, totalScenes, theme } = batch;
  const count = endScene - startScene + 1;

  const sections: string[][] = [];

  const scope = [
    `Create scenes ${startScene} to ${endScene} of a ${totalScenes}-scene music video storyboard.`,
    `Write exactly ${count} scene${count === 1 ? '' : 's'}, numbered with their absolute scene numbers.`,
  ];
  if (startScene > 1) {
    scope.push(`Scenes 1 to ${startScene - 1} already exist. Continue the same story from scene ${startScene}.`);
  }
  sections.push(scope);

  if (theme.styleText) {
    sections.push([`STYLE: ${theme.styleText}`]);
  }
  if (theme.themePrefix) {
    sections.push([`Every scene description must begin with: "${theme.themePrefix}"`]);
  }

  sections.push(personaSection(theme));
  sections.push([
    `SETUPS: Use at most ${theme.setupCount} distinct setups (a setup is one location with one lighting scheme). ` +
      'Rotate through them instead of inventing new ones.',
    'When a scene shows no people at all, include the phrase "no characters".',
  ]);
  sections.push(lyricsSection(batch.windows));
  sections.push(safetySection());
  sections.push([
    'OUTPUT FORMAT:',
    'SCENE <number>: <seconds> seconds',
    '<one paragraph visual description>',
    `Separate scenes with a blank line. Output only scenes ${startScene} to ${endScene}, nothing else.`,
  ]);

  return {
    prompt: sections.map(lines => lines.join('\n')).join('\n\n'),
    systemMessage: SYSTEM_MESSAGE,
  };
}
