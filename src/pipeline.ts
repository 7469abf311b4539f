import formatDuration from "format-duration";
import { readFileBytes } from "./bytes";
import { renderCanvas, sizeCanvas } from "./canvas";
import { DEFAULT_OUTPUT_PATH, MESSAGES } from "./constantes";
import { EmptyInputError, FileAccessError } from "./errors";
import { saveImage } from "./image";
import { packPixels } from "./pixels";
import { endProgress, progressReporter, type Write } from "./progress";

export interface ConvertOptions {
  output?: string;
  /** Sink for progress bar redraws, stdout by default. */
  write?: Write;
}

/**
 * Reads `filePath`, draws its bytes as RGB pixels and saves the result as a PNG.
 * Resolves to false when the file cannot be read, is empty, or the image
 * cannot be written.
 */
export async function convertFileToImage(
  filePath: string,
  { output = DEFAULT_OUTPUT_PATH, write }: ConvertOptions = {},
) {
  const start = performance.now();
  const onProgress = progressReporter(write);
  try {
    console.log(MESSAGES.readingBytes);
    const bytes = await readFileBytes(filePath);

    console.log(MESSAGES.packingPixels);
    const pixels = packPixels(bytes, onProgress);
    endProgress(write);
    if (!pixels.length) throw new EmptyInputError(filePath);

    console.log(MESSAGES.creatingImage);
    const size = sizeCanvas(pixels.length);

    console.log(MESSAGES.drawingImage);
    const canvas = renderCanvas(pixels, size, onProgress);
    endProgress(write);

    console.log(MESSAGES.savingImage);
    return await saveImage(canvas, output);
  } catch (err) {
    if (err instanceof FileAccessError || err instanceof EmptyInputError) {
      const details = err.cause === undefined ? [] : [err.cause];
      console.error(`Error: ${err.message}`, ...details);
      return false;
    }
    throw err;
  } finally {
    const duration = performance.now() - start;
    console.log(`Finished in ${formatDuration(duration, { ms: true })}`);
  }
}
