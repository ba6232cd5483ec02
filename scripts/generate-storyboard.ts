/**
 * Generate a storyboard for one song from a timestamped transcript.
 *
 * Run with:
 *   npm run storyboard -- --transcript lyrics.txt --duration 184 --title "Night Drive" \
 *     [--artist "..."] [--style "synthwave, neon"] [--prefix "Cinematic still:"] \
 *     [--persona-name Mara --persona-visuals "short silver hair, red coat"] \
 *     [--song-json songs/night-drive.json] [--render --images-dir out/night-drive] [--album-cover cover.png]
 *
 * Without --song-json the storyboard is printed to stdout.
 */

import "../services/shared/env";
import { readFile } from "fs/promises";
import path from "path";
import { parseArgs } from "util";
import { logger } from "../services/logger";
import {
  ContinuityEngine,
  ScenePromptAssembler,
  StoryboardError,
  createThemeContext,
  generateStoryboard,
  getStoryboardConfig,
  renderSceneImages,
  saveGeneratedPrompts,
  serializeScenes,
  writeScenes,
} from "../services/storyboard";
import { GeminiTextGenerator } from "../services/collaborators/geminiTextGenerator";
import { GeminiVisionAnalyzer } from "../services/collaborators/geminiVisionAnalyzer";
import { ImagenSynthesizer } from "../services/collaborators/imagenSynthesizer";

const log = logger.child("CLI");

const { values } = parseArgs({
  options: {
    transcript: { type: "string" },
    duration: { type: "string" },
    title: { type: "string" },
    artist: { type: "string" },
    style: { type: "string" },
    prefix: { type: "string" },
    "persona-name": { type: "string" },
    "persona-visuals": { type: "string" },
    "embed-lyrics": { type: "boolean", default: false },
    "song-json": { type: "string" },
    render: { type: "boolean", default: false },
    "images-dir": { type: "string" },
    "album-cover": { type: "string" },
  },
});

async function main(): Promise<void> {
  if (!values.transcript || !values.duration || !values.title) {
    throw new Error("Usage: --transcript <file> --duration <seconds> --title <title> [options]");
  }
  const songDuration = Number(values.duration);

  const config = getStoryboardConfig();
  const transcript = await readFile(values.transcript, "utf-8");
  const theme = createThemeContext({
    styles: values.style ? [values.style] : [],
    themePrefix: values.prefix,
    personaName: values["persona-name"],
    personaVisuals: values["persona-visuals"],
    embedLyrics: values["embed-lyrics"],
  });
  const textGenerator = new GeminiTextGenerator({ timeoutMs: config.collaboratorTimeoutMs });

  const { session, result } = await generateStoryboard({
    transcript,
    songDuration,
    theme,
    songIdentifiers: { title: values.title, artist: values.artist },
    textGenerator,
    config,
  });

  if (result.missingScenes.length > 0) {
    log.warn(`Missing scenes: ${result.missingScenes.join(", ")}`);
  }

  const songJson = values["song-json"];
  if (songJson) {
    await writeScenes(songJson, session.getScenes());
  } else {
    process.stdout.write(serializeScenes(session.getScenes()) + "\n");
  }

  if (!values.render) return;

  const imagesDir = values["images-dir"] ?? path.join("storyboard-images", session.id);
  const imagePathFor = (scene: number) => path.join(imagesDir, `scene_${String(scene).padStart(3, "0")}.png`);
  const albumCover = values["album-cover"];

  const continuity = new ContinuityEngine({
    session,
    vision: new GeminiVisionAnalyzer({ maxImageDimension: config.continuity.maxImageDimension }),
    images: { sceneImagePath: imagePathFor, albumCoverPath: () => albumCover },
    options: config.continuity,
  });
  const assembler = new ScenePromptAssembler({ session, continuity, textGenerator });

  const controller = new AbortController();
  process.once("SIGINT", () => {
    log.warn("Interrupted: finishing the current scene, then stopping");
    controller.abort();
  });

  const summary = await renderSceneImages(session, {
    assembler,
    synthesizer: new ImagenSynthesizer({ timeoutMs: config.collaboratorTimeoutMs }),
    imagePathFor,
    size: config.imageSize,
    signal: controller.signal,
    onProgress: p => log.info(`[${p.completed}/${p.total}] scene ${p.scene} ${p.status}`),
  });

  log.info(`Rendered ${summary.rendered.length} scenes, ${summary.failed.length} failed${summary.cancelled ? " (cancelled)" : ""}`);
  if (songJson) {
    await saveGeneratedPrompts(songJson, session);
  }
}

main().catch((error: unknown) => {
  if (error instanceof StoryboardError) {
    log.error(`${error.code}: ${error.message}`, { partialScenes: error.partialScenes.length });
  } else {
    log.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
});
