import { getLogger } from "@coinsage/core";

const logger = getLogger("shutdown");

/**
 * Runs one shutdown step under its own timeout. Never throws: a failing
 * step is logged and the next one still runs.
 */
export async function shutdownStep(
  step: number,
  totalSteps: number,
  label: string,
  fn: () => void | Promise<void>,
  timeoutMs: number,
  shutdownStart: number,
): Promise<void> {
  const elapsed = () => Date.now() - shutdownStart;
  const tag = `${step}/${totalSteps}`;

  logger.info({ step: tag, elapsedMs: elapsed() }, `Shutdown [${tag}] ${label}...`);

  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    const result = fn();
    if (result instanceof Promise) {
      await Promise.race([
        result,
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error(`Timed out after ${timeoutMs}ms`)), timeoutMs);
        }),
      ]);
    }
    logger.info({ step: tag, elapsedMs: elapsed() }, `Shutdown [${tag}] ${label} done`);
  } catch (err) {
    logger.warn({ err, step: tag, elapsedMs: elapsed() }, `Shutdown [${tag}] ${label} failed, skipping`);
  } finally {
    clearTimeout(timer);
  }
}

export interface ShutdownTask {
  label: string;
  run: () => void | Promise<void>;
}

/** Runs the steps in order, each with the same per-step timeout. */
export async function runShutdown(steps: ShutdownTask[], timeoutMs: number): Promise<void> {
  const start = Date.now();
  for (const [i, step] of steps.entries()) {
    await shutdownStep(i + 1, steps.length, step.label, step.run, timeoutMs, start);
  }
  logger.info({ elapsedMs: Date.now() - start }, "Shutdown complete");
}
