/**
 * @fileoverview Fixed-delay throttle for outbound API requests.
 * @module src/utils/network/requestThrottle
 */

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Serializes tasks and sleeps a fixed delay before each one starts, so two
 * consecutive requests are always at least `delayMs` apart, also when callers
 * run concurrently. Not adaptive: the delay is the same for every endpoint.
 */
export class RequestThrottle {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly delayMs: number,
    private readonly sleepFn: SleepFn = sleep,
  ) {}

  /**
   * Waits for the previous task to settle, sleeps the delay, then runs `task`.
   * A failing task does not block the ones queued after it.
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      if (this.delayMs > 0) {
        await this.sleepFn(this.delayMs);
      }
      return task();
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
