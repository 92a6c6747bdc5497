/**
 * Race a call against a deadline. The call receives an AbortSignal that fires
 * when the deadline passes, so collaborators that accept one stop work too.
 * The rejection on timeout is whatever `onTimeout` builds, which lets each
 * stage report a timeout as its own failure kind.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      // Reject before aborting so the timeout error wins the race
      reject(onTimeout());
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}
