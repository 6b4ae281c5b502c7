/**
 * Deadlines for calls into external models.
 *
 * The underlying call is not interrupted: when the deadline passes the
 * returned promise rejects and the late result is dropped.
 *
 * @module utils/deadline
 */

export async function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return work;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  let timedOut = false;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
    if (timedOut) {
      work.catch((error: unknown) => {
        console.error(
          '[deadline] Abandoned call failed after its deadline:',
          error instanceof Error ? error.message : String(error)
        );
      });
    }
  }
}
