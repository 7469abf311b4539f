import sharp from "sharp";
import type { Canvas } from "./canvas";
import { EncodeError } from "./errors";

export function canvasToPng({ data, width, height, channels }: Canvas) {
  return sharp(data, { raw: { width, height, channels } }).png();
}

export function encodeCanvas(canvas: Canvas) {
  return canvasToPng(canvas).toBuffer();
}

export async function writeImage(canvas: Canvas, outputPath: string) {
  try {
    await canvasToPng(canvas).toFile(outputPath);
  } catch (cause) {
    throw new EncodeError(outputPath, { cause });
  }
}

export async function saveImage(canvas: Canvas, outputPath: string) {
  try {
    await writeImage(canvas, outputPath);
    return true;
  } catch (err) {
    if (!(err instanceof EncodeError)) throw err;
    console.error(`Error: ${err.message}`, err.cause);
    return false;
  }
}
