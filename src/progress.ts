import { PROGRESS_SEGMENTS } from "./constantes";

export type ProgressCallback = (
  current: number,
  previous: number,
  target: number,
) => void;
export type Write = (chunk: string) => void;

const stdoutWrite: Write = (chunk) => {
  process.stdout.write(chunk);
};

/** Truncated percentage of `target`, or null when there is no target to scale against. */
export function progressPercent(current: number, target: number) {
  if (target <= 0) return null;
  return Math.trunc((current * 100) / target);
}

export function crossesBucket(previousPercent: number, currentPercent: number) {
  return Math.trunc(previousPercent / 10) !== Math.trunc(currentPercent / 10);
}

export function formatProgressBar(percent: number) {
  let bar = "";
  for (let i = 0; i < PROGRESS_SEGMENTS; i++) {
    bar += i * 10 < percent ? "#" : "-";
  }
  return `[${bar}] ${percent.toString().padStart(3)}%`;
}

/**
 * Redraws the bar in place, only when the percentage moves into another
 * 10% bucket, so a phase prints at most 11 times.
 */
export function updateProgress(
  current: number,
  previous: number,
  target: number,
  write: Write = stdoutWrite,
) {
  const currentPercent = progressPercent(current, target);
  const previousPercent = progressPercent(previous, target);
  if (currentPercent === null || previousPercent === null) return;
  if (!crossesBucket(previousPercent, currentPercent)) return;
  write(`${formatProgressBar(currentPercent)}\r`);
}

export function endProgress(write: Write = stdoutWrite) {
  write("\n");
}

export function progressReporter(write: Write = stdoutWrite): ProgressCallback {
  return (current, previous, target) =>
    updateProgress(current, previous, target, write);
}
