import { GoogleGenAI } from "@google/genai";
import { collaboratorLogger } from "../logger";
import { ConfigurationError } from "../storyboard/errors";

const log = collaboratorLogger.child("ApiClient");

// --- Configuration ---
// Vertex AI (preferred when a project is set)
export const VERTEX_PROJECT = process.env.GOOGLE_CLOUD_PROJECT || "";
export const VERTEX_LOCATION = process.env.GOOGLE_CLOUD_LOCATION || "global";

// Export for LangChain services that need direct API key access
export const GEMINI_API_KEY = process.env.GEMINI_API_KEY || "";

/**
 * Models used by the storyboard collaborators. Each can be overridden from the
 * environment.
 */
export const MODELS = {
  TEXT: process.env.STORYBOARD_TEXT_MODEL || "gemini-3-flash-preview",
  VISION: process.env.STORYBOARD_VISION_MODEL || "gemini-3-flash-preview",
  IMAGE: process.env.STORYBOARD_IMAGE_MODEL || "imagen-4.0-fast-generate-001",
} as const;

export interface AIClientOptions {
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Create a GoogleGenAI client:
 * - Vertex AI ADC when GOOGLE_CLOUD_PROJECT is set
 * - otherwise GEMINI_API_KEY
 */
export function createAIClient(options: AIClientOptions = {}): GoogleGenAI {
  // Re-read environment variables at creation time (for lazy initialization)
  const vertexProject = process.env.GOOGLE_CLOUD_PROJECT || "";
  const vertexLocation = process.env.GOOGLE_CLOUD_LOCATION || "global";
  const geminiKey = process.env.GEMINI_API_KEY || "";
  const httpOptions = options.timeoutMs ? { timeout: options.timeoutMs } : undefined;

  if (vertexProject) {
    log.info(`Using Vertex AI with project: ${vertexProject}`);
    return new GoogleGenAI({
      vertexai: true,
      project: vertexProject,
      location: vertexLocation,
      httpOptions,
    });
  }

  if (geminiKey) {
    log.info("Using API key auth (Vertex AI not configured)");
    return new GoogleGenAI({ apiKey: geminiKey, httpOptions });
  }

  throw new ConfigurationError(
    "No authentication configured. Set either:\n" +
    "- GOOGLE_CLOUD_PROJECT for Vertex AI\n" +
    "- GEMINI_API_KEY for API key auth"
  );
}

// Lazy initialization - create client on first access
let _aiClient: GoogleGenAI | null = null;

export function getAIClient(options: AIClientOptions = {}): GoogleGenAI {
  if (!_aiClient) {
    _aiClient = createAIClient(options);
  }
  return _aiClient;
}

/**
 * HTTP status carried by an SDK error, if any.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
