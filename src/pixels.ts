import { CHANNELS } from "./constantes";
import type { ProgressCallback } from "./progress";

export type Color = readonly [red: number, green: number, blue: number];

/**
 * Packs bytes into RGB colors, three at a time in red, green, blue order.
 * A trailing partial triple is padded with zeros.
 */
export function packPixels(
  bytes: Uint8Array,
  onProgress?: ProgressCallback,
): Color[] {
  const pixels: Color[] = [];
  const channels = [0, 0, 0];
  let filled = 0;

  for (let i = 0; i < bytes.length; i++) {
    channels[filled++] = bytes[i];
    if (filled === CHANNELS) {
      pixels.push([channels[0], channels[1], channels[2]]);
      channels.fill(0);
      filled = 0;
    }
    onProgress?.(i, i - 1, bytes.length - 1);
  }

  if (filled > 0) pixels.push([channels[0], channels[1], channels[2]]);
  return pixels;
}
