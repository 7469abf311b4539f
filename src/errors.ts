export class FileAccessError extends Error {
  override name = "FileAccessError";
  constructor(
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`Unable to read "${filePath}"`, options);
  }
}

export class EmptyInputError extends Error {
  override name = "EmptyInputError";
  constructor(readonly filePath: string) {
    super(`"${filePath}" is empty, there is nothing to draw`);
  }
}

export class EncodeError extends Error {
  override name = "EncodeError";
  constructor(
    readonly outputPath: string,
    options?: { cause?: unknown },
  ) {
    super(`Unable to write image to "${outputPath}"`, options);
  }
}

export class NoInputError extends Error {
  override name = "NoInputError";
  constructor() {
    super("Input closed before a file name was given");
  }
}
