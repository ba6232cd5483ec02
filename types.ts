/**
 * Shared storyboard types.
 *
 * Times are in seconds unless a field says otherwise. SceneRecord keeps the
 * snake_case `generated_prompt` key because scene lists are persisted in that
 * shape inside song records.
 */

export interface LyricSegment {
  start: number;
  end: number;
  text: string;
}

export interface SceneWindow {
  /** 1-based scene number */
  index: number;
  start: number;
  end: number;
  duration: number;
}

/** Lyrics resolved for one scene window */
export interface WindowLyrics {
  window: SceneWindow;
  lyrics: string;
}

export interface SceneRecord {
  scene: number;
  /** "M:SS" */
  timestamp: string;
  /** "Ns" */
  duration: string;
  lyrics: string;
  prompt: string;
  generated_prompt?: string;
}

export interface ThemeContext {
  readonly styleText: string;
  readonly themePrefix: string;
  readonly personaName: string;
  readonly personaVisuals: string;
  /** Target share of scenes featuring the persona, 0-100 */
  readonly personaAppearancePercent: number;
  /** Number of distinct location+lighting setups to rotate */
  readonly setupCount: number;
  readonly embedLyrics: boolean;
  readonly embedKeywords: boolean;
  readonly keywords: readonly string[];
  /** Identifies the active style preset; part of the prompt cache key */
  readonly presetKey: string;
}

export interface StoryboardBatch {
  startScene: number;
  endScene: number;
  totalScenes: number;
  theme: ThemeContext;
  /** Window lyrics for startScene..endScene, in order */
  windows: WindowLyrics[];
}

export interface StoryboardRequest {
  prompt: string;
  systemMessage: string;
}

export type GenerationMode = 'single-shot' | 'continuation' | 'batched';

/** Identifies the song a storyboard belongs to in audit records */
export interface SongIdentifiers {
  title: string;
  artist?: string;
  songId?: string;
}

// ============================================================================
// Collaborator contracts
// ============================================================================

export interface CollaboratorResult {
  success: boolean;
  content: string;
  error: string;
}

export interface ImageSynthesisResult {
  success: boolean;
  imageBytes?: Buffer;
  error: string;
}

export interface TextGenerationParams {
  prompt: string;
  systemMessage?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface TextGenerator {
  generate(params: TextGenerationParams): Promise<CollaboratorResult>;
}

export interface VisionAnalyzer {
  analyze(imagePaths: string[], prompt: string, systemMessage?: string): Promise<CollaboratorResult>;
}

export interface ImageSynthesizer {
  synthesize(prompt: string, size: string): Promise<ImageSynthesisResult>;
}
