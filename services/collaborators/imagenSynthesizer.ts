/**
 * Imagen image collaborator.
 */

import { PersonGeneration, type GenerateImagesParameters } from "@google/genai";
import type { ImageSynthesisResult, ImageSynthesizer } from "@/types";
import { collaboratorLogger } from "../logger";
import { MODELS, getAIClient, getErrorMessage } from "../shared/apiClient";

const log = collaboratorLogger.child("Imagen");

interface GeneratedImageLike {
  image?: { imageBytes?: string };
  raiFilteredReason?: string;
}

export type GenerateImagesFn = (params: GenerateImagesParameters) => Promise<{ generatedImages?: GeneratedImageLike[] }>;

export interface ImagenSynthesizerOptions {
  model?: string;
  timeoutMs?: number;
  generateImages?: GenerateImagesFn;
}

const ASPECT_RATIOS: ReadonlyArray<readonly [string, number]> = [
  ["1:1", 1],
  ["3:4", 3 / 4],
  ["4:3", 4 / 3],
  ["9:16", 9 / 16],
  ["16:9", 16 / 9],
];

/**
 * Closest supported aspect ratio for a "WIDTHxHEIGHT" size, e.g.
 * "1536x1024" -> "4:3". Unparseable sizes fall back to "16:9".
 */
export function sizeToAspectRatio(size: string): string {
  const match = /^(\d+)x(\d+)$/.exec(size.trim());
  if (!match) return "16:9";
  const width = Number(match[1]);
  const height = Number(match[2]);
  if (width <= 0 || height <= 0) return "16:9";

  const ratio = width / height;
  let best = ASPECT_RATIOS[0];
  for (const candidate of ASPECT_RATIOS) {
    if (Math.abs(candidate[1] - ratio) < Math.abs(best[1] - ratio)) best = candidate;
  }
  return best[0];
}

export class ImagenSynthesizer implements ImageSynthesizer {
  private readonly model: string;
  private readonly generateImages: GenerateImagesFn;

  constructor(options: ImagenSynthesizerOptions = {}) {
    this.model = options.model ?? MODELS.IMAGE;
    this.generateImages =
      options.generateImages ??
      (params => getAIClient({ timeoutMs: options.timeoutMs }).models.generateImages(params));
  }

  async synthesize(prompt: string, size: string): Promise<ImageSynthesisResult> {
    const aspectRatio = sizeToAspectRatio(size);
    try {
      const response = await this.generateImages({
        model: this.model,
        prompt,
        config: {
          numberOfImages: 1,
          aspectRatio,
          personGeneration: PersonGeneration.ALLOW_ADULT,
        },
      });

      const img = response.generatedImages?.[0];
      if (img?.raiFilteredReason) {
        log.warn(`Image was filtered: ${img.raiFilteredReason}`);
        return { success: false, error: `Image generation was filtered by safety system: ${img.raiFilteredReason}` };
      }
      const bytes = img?.image?.imageBytes;
      if (!bytes) {
        return { success: false, error: "No image data found in Imagen response" };
      }

      log.debug(`Generated ${aspectRatio} image with ${this.model}`);
      return { success: true, imageBytes: Buffer.from(bytes, "base64"), error: "" };
    } catch (error) {
      const message = getErrorMessage(error);
      log.error(`Image generation failed: ${message}`);
      return { success: false, error: message };
    }
  }
}
