/**
 * Scene Prompt Assembler
 *
 * Turns an accepted scene record into the final text sent to the image
 * synthesizer:
 *
 *   [continuity hint]
 *   [theme prefix +] scene body (safety substitutions applied)
 *   [persona block]
 *   [lyrics instruction]
 *   [keyword instruction]
 *
 * Parts are joined by blank lines. Results are memoized per (scene, preset)
 * in the session's prompt cache and written back to the scene's
 * `generated_prompt`.
 */

import type { SceneRecord, TextGenerator, ThemeContext } from '@/types';
import { storyboardLogger } from '../logger';
import { applySafetySubstitutions } from './requestBuilder';
import { withThemePrefix, type ContinuityEngine } from './continuityEngine';
import type { StoryboardSession } from './session';
import { ValidationError } from './errors';

const log = storyboardLogger.child('PromptAssembler');

// ---------------------------------------------------------------------------
// Persona detection
// ---------------------------------------------------------------------------

const NO_CHARACTER_MARKERS: readonly RegExp[] = [
  /\bno (?:characters?|people|persons?|humans?|figures?|performers?)\b/i,
  /\bwithout (?:any )?(?:characters?|people|humans?|figures?)\b/i,
  /\b(?:empty|deserted|unpopulated) (?:scene|landscape|street|room|stage)\b/i,
];

const ROLE_WORDS =
  /\b(?:singers?|vocalists?|performers?|artists?|musicians?|band|frontman|frontwoman|rapper|guitarist|drummer|dj)\b/i;

export type PersonaDecision = 'suppressed' | 'matched' | 'asked-yes' | 'asked-no' | 'absent';

export function hasNoCharacterMarker(text: string): boolean {
  return NO_CHARACTER_MARKERS.some(pattern => pattern.test(text));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Local persona check: explicit "no characters" wording wins, then the
 * persona's name or a performer role word. Returns null when undecided.
 */
export function matchPersona(body: string, theme: ThemeContext): boolean | null {
  if (hasNoCharacterMarker(body)) return false;
  if (theme.personaName && new RegExp(`\\b${escapeRegExp(theme.personaName)}\\b`, 'i').test(body)) {
    return true;
  }
  if (ROLE_WORDS.test(body)) return true;
  return null;
}

const PERSONA_QUERY_SYSTEM = 'You classify storyboard scene descriptions. Answer with a single word: YES or NO.';

// ---------------------------------------------------------------------------
// Instructions
// ---------------------------------------------------------------------------

export function personaBlock(theme: ThemeContext): string {
  const name = theme.personaName || 'The performer';
  return `Character reference for ${name}: ${theme.personaVisuals}. Keep this appearance consistent with earlier scenes.`;
}

export function lyricsInstruction(theme: ThemeContext, lyrics: string): string {
  if (theme.embedLyrics && lyrics.trim()) {
    return (
      `Embed these lyrics into the environment itself (signage, graffiti, light, reflections): "${lyrics.trim()}". ` +
      'Never render them as an overlay, caption or subtitle.'
    );
  }
  return 'Use the lyrics only for mood. Render no text, letters, captions or subtitles anywhere in the image.';
}

export function keywordInstruction(theme: ThemeContext): string | null {
  if (!theme.embedKeywords || theme.keywords.length === 0) return null;
  return `Work these keywords into the scene as visual elements: ${theme.keywords.join(', ')}.`;
}

// ---------------------------------------------------------------------------
// Assembler
// ---------------------------------------------------------------------------

export interface ScenePromptAssemblerOptions {
  session: StoryboardSession;
  continuity?: ContinuityEngine;
  /** Answers the persona YES/NO fallback query */
  textGenerator?: TextGenerator;
}

export class ScenePromptAssembler {
  private readonly session: StoryboardSession;
  private readonly continuity?: ContinuityEngine;
  private readonly textGenerator?: TextGenerator;

  constructor(options: ScenePromptAssemblerOptions) {
    this.session = options.session;
    this.continuity = options.continuity;
    this.textGenerator = options.textGenerator;
  }

  async assemble(sceneNumber: number): Promise<string> {
    const theme = this.session.theme;
    const cached = this.session.promptCache.get(sceneNumber, theme.presetKey);
    if (cached !== undefined) {
      this.session.setGeneratedPrompt(sceneNumber, cached);
      return cached;
    }

    const scene = this.session.getScene(sceneNumber);
    if (!scene) {
      throw new ValidationError(`Scene ${sceneNumber} does not exist in session ${this.session.id}`);
    }

    const prompt = await this.build(scene, theme);
    this.session.promptCache.set(sceneNumber, theme.presetKey, prompt);
    this.session.setGeneratedPrompt(sceneNumber, prompt);
    return prompt;
  }

  private async build(scene: SceneRecord, theme: ThemeContext): Promise<string> {
    const parts: string[] = [];

    const hint = this.continuity ? await this.continuity.resolveContinuityHint(scene.scene, scene.prompt) : null;
    if (hint) parts.push(hint.text);

    parts.push(withThemePrefix(applySafetySubstitutions(scene.prompt), theme.themePrefix));

    const decision = await this.decidePersona(scene, theme);
    if (decision === 'matched' || decision === 'asked-yes') {
      parts.push(personaBlock(theme));
    }
    log.debug(`Scene ${scene.scene}: persona ${decision}`);

    parts.push(lyricsInstruction(theme, scene.lyrics));

    const keywords = keywordInstruction(theme);
    if (keywords) parts.push(keywords);

    return parts.filter(Boolean).join('\n\n');
  }

  private async decidePersona(scene: SceneRecord, theme: ThemeContext): Promise<PersonaDecision> {
    if (!theme.personaVisuals) return 'absent';

    const local = matchPersona(scene.prompt, theme);
    if (local === false) return 'suppressed';
    if (local === true) return 'matched';
    if (!this.textGenerator) return 'absent';

    const result = await this.textGenerator.generate({
      prompt:
        `Scene description:\n${scene.prompt}\n\n` +
        'Does this scene show a person, singer or performer on screen? Answer YES or NO.',
      systemMessage: PERSONA_QUERY_SYSTEM,
      maxTokens: 5,
      temperature: 0,
    });

    if (!result.success) {
      log.warn(`Persona query failed for scene ${scene.scene}: ${result.error}`);
      return 'asked-no';
    }
    return /^\W*yes\b/i.test(result.content.trim()) ? 'asked-yes' : 'asked-no';
  }
}
