/**
 * Gemini text collaborator.
 *
 * Never throws for transport errors: failures come back as
 * `{ success: false, error }`. A 400 response to a request that carried
 * `temperature` or `maxOutputTokens` is retried once without them, since some
 * models reject those parameters.
 */

import type { GenerateContentConfig, GenerateContentParameters } from "@google/genai";
import type { CollaboratorResult, TextGenerationParams, TextGenerator } from "@/types";
import { collaboratorLogger } from "../logger";
import { MODELS, getAIClient, getErrorMessage, getErrorStatus } from "../shared/apiClient";

const log = collaboratorLogger.child("GeminiText");

export type GenerateContentFn = (params: GenerateContentParameters) => Promise<{ text?: string }>;

export interface GeminiTextGeneratorOptions {
  model?: string;
  timeoutMs?: number;
  /** Replaces the SDK call; defaults to the shared GoogleGenAI client */
  generateContent?: GenerateContentFn;
}

export class GeminiTextGenerator implements TextGenerator {
  private readonly model: string;
  private readonly generateContent: GenerateContentFn;

  constructor(options: GeminiTextGeneratorOptions = {}) {
    this.model = options.model ?? MODELS.TEXT;
    this.generateContent =
      options.generateContent ??
      (params => getAIClient({ timeoutMs: options.timeoutMs }).models.generateContent(params));
  }

  async generate(params: TextGenerationParams): Promise<CollaboratorResult> {
    const config: GenerateContentConfig = {};
    if (params.systemMessage) config.systemInstruction = params.systemMessage;
    if (params.maxTokens !== undefined) config.maxOutputTokens = params.maxTokens;
    if (params.temperature !== undefined) config.temperature = params.temperature;

    try {
      return await this.call(params.prompt, config);
    } catch (error) {
      const tunable = config.maxOutputTokens !== undefined || config.temperature !== undefined;
      if (getErrorStatus(error) === 400 && tunable) {
        log.warn(`Model rejected generation parameters, retrying without them: ${getErrorMessage(error)}`);
        const downgraded: GenerateContentConfig = {};
        if (config.systemInstruction) downgraded.systemInstruction = config.systemInstruction;
        try {
          return await this.call(params.prompt, downgraded);
        } catch (retryError) {
          return this.failure(retryError);
        }
      }
      return this.failure(error);
    }
  }

  private async call(prompt: string, config: GenerateContentConfig): Promise<CollaboratorResult> {
    const started = Date.now();
    const response = await this.generateContent({ model: this.model, contents: prompt, config });
    const content = response.text ?? "";
    log.debug(`${this.model} replied with ${content.length} chars in ${Date.now() - started}ms`);
    return { success: true, content, error: "" };
  }

  private failure(error: unknown): CollaboratorResult {
    const message = getErrorMessage(error);
    log.error(`Text generation failed: ${message}`);
    return { success: false, content: "", error: message };
  }
}
