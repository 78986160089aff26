/**
 * @file bounded-wait.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Waits for a task at most `timeoutMs`. Resolves true when it settled in time.
 * The task must not reject.
 */
export async function waitWithTimeout(task: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  try {
    return await Promise.race([task.then(() => true), timedOut]);
  } finally {
    clearTimeout(timer);
  }
}
