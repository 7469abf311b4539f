import { readFile } from "node:fs/promises";
import { FileAccessError } from "./errors";

export async function readFileBytes(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (cause) {
    throw new FileAccessError(filePath, { cause });
  }
}
