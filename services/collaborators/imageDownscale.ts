import { readFile } from "fs/promises";
import sharp from "sharp";

/**
 * Read an image and shrink it to fit within `maxDimension` pixels on its long
 * side, re-encoded as JPEG. Smaller images are not enlarged.
 */
export async function downscaleImage(filePath: string, maxDimension: number): Promise<Buffer> {
  const bytes = await readFile(filePath);
  return sharp(bytes, { failOnError: false })
    .rotate()
    .resize({ width: maxDimension, height: maxDimension, fit: "inside", withoutEnlargement: true })
    .jpeg({ quality: 85, mozjpeg: true })
    .toBuffer();
}

export async function toJpegDataUrl(filePath: string, maxDimension: number): Promise<string> {
  const jpeg = await downscaleImage(filePath, maxDimension);
  return `data:image/jpeg;base64,${jpeg.toString("base64")}`;
}
