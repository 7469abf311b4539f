export const DEFAULT_OUTPUT_PATH = "saved.png";

export const CHANNELS = 3;
export const PROGRESS_SEGMENTS = 10;

export const BLACK = [0, 0, 0] as const;

export const MESSAGES = {
  readingBytes: "Getting bytes from file...",
  packingPixels: "Assembling pixel colour list...",
  creatingImage: "Creating image...",
  drawingImage: "Drawing pixel data to image...",
  savingImage: "Saving image...",
  done: "All done!",
  failed: "Unable to create image!",
  prompt: "Enter a file name: ",
} as const;
