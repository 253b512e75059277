import { TransientError } from "../errors.js";

/**
 * Race `work` against a deadline. On expiry the controller is aborted (cancelling
 * in-flight requests) and the race rejects with TransientError.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  controller: AbortController,
  label: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TransientError(`${label} timed out after ${ms}ms`));
    }, ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
