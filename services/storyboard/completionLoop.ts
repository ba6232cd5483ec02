/**
 * Storyboard Completion Loop
 *
 * Drives the text collaborator until every scene of the storyboard exists.
 *
 * - single-shot: one request for the whole range
 * - continuation: the reply stopped early, so request
 *   [maxScene + 1, min(maxScene + batchSize, total)] until complete
 * - batched: the first reply refused or asked for instructions, so request
 *   fixed-size batches from scene 1
 *
 * Every continuation must raise the highest scene index, otherwise the run
 * aborts with StalledProgressError. More than `maxIterations` follow-up
 * requests aborts with IterationLimitError. Records are append-only: the
 * first record received for a scene number is the one kept.
 */

import type {
  GenerationMode,
  SceneRecord,
  StoryboardBatch,
  TextGenerator,
  ThemeContext,
  WindowLyrics,
} from '@/types';
import { storyboardLogger } from '../logger';
import { noopAuditRecorder, type AuditRecorder } from '../auditLogService';
import type { InteriorGapPolicy, StoryboardConfig } from './config';
import { buildStoryboardRequest, createBatch } from './requestBuilder';
import { hasSceneMarkers, parseStoryboardResponse } from './responseParser';
import {
  CollaboratorFailureError,
  EmptyResponseError,
  IncompleteStoryboardError,
  IterationLimitError,
  ParseFailureError,
  StalledProgressError,
  ValidationError,
} from './errors';

const log = storyboardLogger.child('CompletionLoop');

// ============================================================================
// Retry policy
// ============================================================================

export interface RetryPolicy {
  /** Scenes requested per continuation or batch */
  batchSize: number;
  /** Follow-up requests allowed after the first reply */
  maxIterations: number;
  /** What to do when interior scene numbers are missing at the end */
  onInteriorGap: InteriorGapPolicy;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  batchSize: 14,
  maxIterations: 10,
  onInteriorGap: 'flag',
});

export function retryPolicyFromConfig(config: StoryboardConfig): RetryPolicy {
  return { ...config.completion };
}

// ============================================================================
// Refusal detection
// ============================================================================

const REFUSAL_PATTERNS: readonly RegExp[] = [
  /\bwould you like me to\b/i,
  /\bdo you want me to\b/i,
  /\bshall i (?:continue|proceed|start|go ahead)\b/i,
  /\bplease confirm\b/i,
  /\bconfirm (?:that|whether|if|how)\b/i,
  /\b(?:split|break|divide)\b[^.?!]*\b(?:batches|parts|chunks|sections|smaller)\b/i,
  /\bin (?:batches|chunks|parts)\b/i,
  /\b(?:too long|too many scenes)\b/i,
  /\b(?:can(?:no|['’])t|cannot|unable to)\b[^.?!]*\b(?:all|entire|full|complete)\b/i,
  /\bdue to (?:the )?(?:length|size|output limits?)\b/i,
];

/**
 * True when a reply contains no scene markers and reads as a refusal, a
 * request for confirmation, or an offer to split the work.
 */
export function detectRefusal(text: string): boolean {
  if (hasSceneMarkers(text)) return false;
  return REFUSAL_PATTERNS.some(pattern => pattern.test(text));
}

// ============================================================================
// Loop
// ============================================================================

export interface CompletionRequest {
  theme: ThemeContext;
  /** Window lyrics for the whole song, scene 1..N */
  windows: readonly WindowLyrics[];
}

export interface CompletionResult {
  scenes: SceneRecord[];
  mode: GenerationMode;
  /** Follow-up requests sent after the first reply */
  iterations: number;
  /** Interior scene numbers never received */
  missingScenes: number[];
}

export interface CompletionLoopOptions {
  textGenerator: TextGenerator;
  policy?: Partial<RetryPolicy>;
  audit?: AuditRecorder;
  maxTokens?: number;
  temperature?: number;
}

export class StoryboardCompletionLoop {
  private readonly textGenerator: TextGenerator;
  private readonly policy: RetryPolicy;
  private readonly audit: AuditRecorder;
  private readonly maxTokens?: number;
  private readonly temperature?: number;

  constructor(options: CompletionLoopOptions) {
    this.textGenerator = options.textGenerator;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.audit = options.audit ?? noopAuditRecorder;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;

    if (this.policy.batchSize < 1 || this.policy.maxIterations < 1) {
      throw new ValidationError('Retry policy needs a positive batchSize and maxIterations');
    }
  }

  getPolicy(): Readonly<RetryPolicy> {
    return this.policy;
  }

  /**
   * Request the full storyboard in one call, then complete it.
   */
  async generate(request: CompletionRequest): Promise<CompletionResult> {
    const total = this.totalScenes(request);
    const batch = createBatch(1, total, request.windows, request.theme);
    const reply = await this.send(batch, 'single-shot', []);
    return this.complete(reply, request);
  }

  /**
   * Complete a storyboard from an already received first reply.
   */
  async complete(initialReply: string, request: CompletionRequest): Promise<CompletionResult> {
    const total = this.totalScenes(request);
    const merged = new Map<number, SceneRecord>();

    if (detectRefusal(initialReply)) {
      log.warn(`Collaborator declined the single-shot request; switching to batches of ${this.policy.batchSize}`);
      return this.continueFrom(merged, request, 'batched');
    }

    const parsed = parseStoryboardResponse(initialReply, request.windows);
    if (!parsed.ok) {
      throw new ParseFailureError(parsed.preview);
    }

    this.merge(merged, parsed.scenes);
    log.info(`First reply covered ${parsed.scenes.length}/${total} scenes (max scene ${parsed.maxScene})`);

    return this.continueFrom(merged, request, parsed.maxScene < total ? 'continuation' : 'single-shot');
  }

  private async continueFrom(
    merged: Map<number, SceneRecord>,
    request: CompletionRequest,
    mode: GenerationMode,
  ): Promise<CompletionResult> {
    const total = this.totalScenes(request);
    let maxScene = this.maxSceneOf(merged);
    let iterations = 0;

    while (maxScene < total) {
      if (iterations >= this.policy.maxIterations) {
        throw new IterationLimitError(maxScene, this.policy.maxIterations, this.sorted(merged));
      }
      iterations++;

      const start = maxScene + 1;
      const end = Math.min(maxScene + this.policy.batchSize, total);
      log.info(`Requesting scenes ${start}-${end} of ${total} (${mode}, iteration ${iterations})`);

      const batch = createBatch(start, end, request.windows, request.theme);
      const reply = await this.send(batch, mode, this.sorted(merged));
      const parsed = parseStoryboardResponse(reply, request.windows);
      if (parsed.ok) {
        this.merge(merged, parsed.scenes);
      } else {
        log.warn(`Reply for scenes ${start}-${end} had no scene markers`);
      }

      const newMax = this.maxSceneOf(merged);
      if (newMax <= maxScene) {
        throw new StalledProgressError(maxScene, [start, end], this.sorted(merged));
      }
      maxScene = newMax;
    }

    return this.finish(merged, total, mode, iterations);
  }

  private finish(
    merged: Map<number, SceneRecord>,
    total: number,
    mode: GenerationMode,
    iterations: number,
  ): CompletionResult {
    const scenes = this.sorted(merged);
    const missingScenes: number[] = [];
    for (let n = 1; n <= total; n++) {
      if (!merged.has(n)) missingScenes.push(n);
    }

    if (missingScenes.length > 0) {
      if (this.policy.onInteriorGap === 'fail') {
        throw new IncompleteStoryboardError(missingScenes, scenes);
      }
      log.warn(`Storyboard complete up to scene ${total} but missing interior scenes: ${missingScenes.join(', ')}`);
    }

    log.info(`Storyboard complete: ${scenes.length}/${total} scenes, mode=${mode}, follow-ups=${iterations}`);
    return { scenes, mode, iterations, missingScenes };
  }

  private async send(batch: StoryboardBatch, mode: GenerationMode, accepted: SceneRecord[]): Promise<string> {
    const request = buildStoryboardRequest(batch);
    const result = await this.textGenerator.generate({
      prompt: request.prompt,
      systemMessage: request.systemMessage,
      maxTokens: this.maxTokens,
      temperature: this.temperature,
    });

    await this.audit.recordExchange(
      { mode, batchRange: [batch.startScene, batch.endScene] },
      request.prompt,
      result.success ? result.content : `ERROR: ${result.error}`,
    );

    if (!result.success) {
      throw new CollaboratorFailureError(result.error || 'unknown error', 'text-generation', accepted);
    }
    if (!result.content.trim()) {
      throw new EmptyResponseError('text-generation', accepted);
    }
    return result.content;
  }

  private merge(merged: Map<number, SceneRecord>, scenes: readonly SceneRecord[]): void {
    for (const scene of scenes) {
      if (!merged.has(scene.scene)) {
        merged.set(scene.scene, scene);
      }
    }
  }

  private maxSceneOf(merged: Map<number, SceneRecord>): number {
    let max = 0;
    for (const n of merged.keys()) {
      if (n > max) max = n;
    }
    return max;
  }

  private sorted(merged: Map<number, SceneRecord>): SceneRecord[] {
    return [...merged.values()].sort((a, b) => a.scene - b.scene);
  }

  private totalScenes(request: CompletionRequest): number {
    if (request.windows.length === 0) {
      throw new ValidationError('Cannot build a storyboard without scene windows');
    }
    return request.windows.length;
  }
}
