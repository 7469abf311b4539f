import { NoInputError } from "./errors";

/** Prompts on stdout and resolves the first line read from `input`, without its line ending. */
export function askQuestion(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
) {
  return new Promise<string>((resolve, reject) => {
    process.stdout.write(question);
    let received = "";
    const stop = () => {
      input.off("data", onData);
      input.off("end", onEnd);
      input.off("error", onError);
      input.pause();
    };
    const onData = (data: Buffer | string) => {
      received += data.toString();
      const newline = received.indexOf("\n");
      if (newline === -1) return;
      stop();
      resolve(received.slice(0, newline).replace(/\r$/, ""));
    };
    // a last line without a newline still counts
    const onEnd = () => {
      stop();
      if (received) resolve(received.replace(/\r$/, ""));
      else reject(new NoInputError());
    };
    const onError = (err: Error) => {
      stop();
      reject(err);
    };
    input.on("data", onData);
    input.on("end", onEnd);
    input.on("error", onError);
  });
}

export function lastOf<T>(arr: readonly T[]): T | undefined {
  return arr[arr.length - 1];
}
