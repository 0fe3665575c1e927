import { MultiProgressBars } from "multi-progress-bars";
import chalk from "chalk";

export const PAGES_TASK = "Pages";

// Progress bar manager singleton
let mpb: MultiProgressBars | null = null;

export function initProgressBars(): MultiProgressBars {
  if (!mpb) {
    mpb = new MultiProgressBars({
      anchor: "bottom",
      persist: true,
      border: true,
      initMessage: " Capture Progress ",
    });
  }
  return mpb;
}

/**
 * Close and cleanup progress bars
 */
export function closeProgressBars(): void {
  if (mpb) {
    mpb.close();
    mpb = null;
  }
}

export function addPageProgressTask(totalPages: number): void {
  const bars = initProgressBars();
  bars.addTask(PAGES_TASK, {
    type: "percentage",
    barTransformFn: chalk.green,
    nameTransformFn: chalk.green.bold,
    message: `0/${totalPages} pages`,
  });
}

/**
 * Advance the page bar. Failed pages still move the bar; they are counted
 * in the message.
 */
export function updatePageProgress(
  done: number,
  totalPages: number,
  failed: number,
): void {
  if (!mpb) return;
  const suffix = failed > 0 ? chalk.red(` (${failed} failed)`) : "";
  mpb.updateTask(PAGES_TASK, {
    percentage: totalPages > 0 ? done / totalPages : 1,
    message: `${done}/${totalPages} pages${suffix}`,
  });
}

export function markPagesDone(saved: number): void {
  if (!mpb) return;
  mpb.done(PAGES_TASK, {
    message: `${saved} saved ✓`,
    barTransformFn: chalk.gray,
  });
}
