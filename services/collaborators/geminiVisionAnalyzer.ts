/**
 * Gemini vision collaborator on LangChain.
 *
 * Images are downscaled before upload and sent as data URLs alongside the
 * text prompt in a single human message.
 */

import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import { HumanMessage, SystemMessage, type BaseMessage, type MessageContent } from "@langchain/core/messages";
import type { CollaboratorResult, VisionAnalyzer } from "@/types";
import { collaboratorLogger } from "../logger";
import { GEMINI_API_KEY, MODELS, getErrorMessage } from "../shared/apiClient";
import { toJpegDataUrl } from "./imageDownscale";

const log = collaboratorLogger.child("GeminiVision");

export interface VisionModel {
  invoke(messages: BaseMessage[]): Promise<{ content: MessageContent }>;
}

export interface GeminiVisionAnalyzerOptions {
  maxImageDimension?: number;
  model?: VisionModel;
}

/**
 * Flatten LangChain message content to plain text.
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map(part => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

export class GeminiVisionAnalyzer implements VisionAnalyzer {
  private readonly maxImageDimension: number;
  private model: VisionModel | null;

  constructor(options: GeminiVisionAnalyzerOptions = {}) {
    this.maxImageDimension = options.maxImageDimension ?? 512;
    this.model = options.model ?? null;
  }

  async analyze(imagePaths: string[], prompt: string, systemMessage?: string): Promise<CollaboratorResult> {
    try {
      const images = await Promise.all(imagePaths.map(p => toJpegDataUrl(p, this.maxImageDimension)));

      const messages: BaseMessage[] = [];
      if (systemMessage) messages.push(new SystemMessage(systemMessage));
      messages.push(
        new HumanMessage({
          content: [
            ...images.map(dataUrl => ({ type: "image_url" as const, image_url: dataUrl })),
            { type: "text" as const, text: prompt },
          ],
        }),
      );

      const response = await this.getModel().invoke(messages);
      const content = contentToText(response.content).trim();
      log.debug(`Described ${imagePaths.length} image(s): ${content.length} chars`);
      return { success: true, content, error: "" };
    } catch (error) {
      const message = getErrorMessage(error);
      log.warn(`Vision analysis failed: ${message}`);
      return { success: false, content: "", error: message };
    }
  }

  private getModel(): VisionModel {
    if (!this.model) {
      this.model = new ChatGoogleGenerativeAI({
        apiKey: GEMINI_API_KEY,
        model: MODELS.VISION,
        temperature: 0.3,
      });
    }
    return this.model;
  }
}
