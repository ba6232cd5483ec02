/**
 * Theme Context
 *
 * Immutable bundle of style, persona and embedding settings shared by the
 * request builder and the prompt assembler.
 */

import { z } from 'zod';
import type { ThemeContext } from '@/types';
import { ValidationError } from './errors';

export const ThemeContextInputSchema = z.object({
  styles: z.array(z.string()).default([]),
  themePrefix: z.string().default(''),
  personaName: z.string().default(''),
  personaVisuals: z.string().default(''),
  personaAppearancePercent: z.number().min(0).max(100).default(40),
  setupCount: z.number().int().positive().default(4),
  embedLyrics: z.boolean().default(false),
  embedKeywords: z.boolean().default(false),
  keywords: z.array(z.string()).default([]),
  presetKey: z.string().default('default'),
});

export type ThemeContextInput = z.input<typeof ThemeContextInputSchema>;

/**
 * Merge style fragments into one comma-separated style line, dropping blanks
 * and case-insensitive duplicates while keeping first-seen order.
 */
export function mergeStyleText(styles: readonly string[]): string {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const style of styles) {
    for (const part of style.split(',')) {
      const trimmed = part.trim();
      const key = trimmed.toLowerCase();
      if (!trimmed || seen.has(key)) continue;
      seen.add(key);
      merged.push(trimmed);
    }
  }
  return merged.join(', ');
}

export function createThemeContext(input: ThemeContextInput = {}): ThemeContext {
  const parsed = ThemeContextInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid theme context: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }

  const t = parsed.data;
  return Object.freeze({
    styleText: mergeStyleText(t.styles),
    themePrefix: t.themePrefix.trim(),
    personaName: t.personaName.trim(),
    personaVisuals: t.personaVisuals.trim(),
    personaAppearancePercent: t.personaAppearancePercent,
    setupCount: t.setupCount,
    embedLyrics: t.embedLyrics,
    embedKeywords: t.embedKeywords,
    keywords: Object.freeze(t.keywords.map(k => k.trim()).filter(Boolean)),
    presetKey: t.presetKey,
  });
}
