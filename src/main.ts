import yargs from "yargs/yargs";
import { DEFAULT_OUTPUT_PATH, MESSAGES } from "./constantes";
import { convertFileToImage } from "./pipeline";
import { askQuestion, lastOf } from "./utils";

/**
 * Runs the command line with already stripped arguments. Uses the last file
 * given, or asks for one on `stdin`. Prints the outcome and sets
 * `process.exitCode` on failure.
 */
export async function main(
  args: string[],
  stdin: NodeJS.ReadableStream = process.stdin,
) {
  const { _: files, output } = await yargs(args)
    .scriptName("file-to-image")
    .usage(
      "$0 [file]\n\nDraw the bytes of a file as an RGB image. When several files are given the last one is used.",
    )
    .options({
      output: {
        type: "string",
        alias: ["o"],
        default: DEFAULT_OUTPUT_PATH,
        describe: "Where to write the PNG, overwritten if present",
      },
    })
    .help()
    .parse();

  let succeeded: boolean;
  try {
    const filePath =
      lastOf(files.map(String)) ?? (await askQuestion(MESSAGES.prompt, stdin));
    succeeded = await convertFileToImage(filePath, { output });
  } catch (err) {
    console.error(err);
    succeeded = false;
  }

  if (succeeded) {
    console.log(MESSAGES.done);
  } else {
    console.log(MESSAGES.failed);
    process.exitCode = 1;
  }
  return succeeded;
}
