import { BLACK, CHANNELS } from "./constantes";
import type { Color } from "./pixels";
import type { ProgressCallback } from "./progress";

export interface CanvasSize {
  width: number;
  height: number;
}

export interface Canvas extends CanvasSize {
  channels: typeof CHANNELS;
  /** Interleaved RGB, row-major. */
  data: Buffer;
}

export function sizeCanvas(pixelCount: number): CanvasSize {
  if (!Number.isInteger(pixelCount) || pixelCount < 0) {
    throw new RangeError(`Invalid pixel count: ${pixelCount}`);
  }
  if (pixelCount === 0) return { width: 0, height: 0 };
  const width = Math.round(Math.sqrt(pixelCount));
  return { width, height: Math.ceil(pixelCount / width) };
}

export function renderCanvas(
  pixels: readonly Color[],
  { width, height }: CanvasSize,
  onProgress?: ProgressCallback,
): Canvas {
  const cells = width * height;
  if (cells < pixels.length) {
    throw new RangeError(
      `A ${width}x${height} canvas cannot hold ${pixels.length} pixels`,
    );
  }
  const data = Buffer.alloc(cells * CHANNELS);

  for (let position = 0; position < cells; position++) {
    const [red, green, blue] =
      position < pixels.length ? pixels[position] : BLACK;
    const offset = position * CHANNELS;
    data[offset] = red;
    data[offset + 1] = green;
    data[offset + 2] = blue;
    onProgress?.(position, position - 1, cells - 1);
  }

  return { width, height, channels: CHANNELS, data };
}

export function getPixel(canvas: Canvas, x: number, y: number): Color {
  if (x < 0 || x >= canvas.width || y < 0 || y >= canvas.height) {
    throw new RangeError(`(${x}, ${y}) is outside the canvas`);
  }
  const offset = (y * canvas.width + x) * CHANNELS;
  return [
    canvas.data[offset],
    canvas.data[offset + 1],
    canvas.data[offset + 2],
  ];
}
