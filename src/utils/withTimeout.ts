import { UpstreamUnavailableError } from "../turn/errors.js";

/**
 * Race `work` against a timer. Timeouts and failures both come out as
 * UpstreamUnavailableError so the turn layer can retry them. When a
 * controller is given it is aborted on timeout.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  upstream: "llm" | "search",
  label: string,
  controller?: AbortController,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new UpstreamUnavailableError(upstream, `${label} timed out after ${ms}ms`));
      controller?.abort();
    }, ms);
  });

  try {
    return await Promise.race([work, timeout]);
  } catch (err) {
    if (err instanceof UpstreamUnavailableError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new UpstreamUnavailableError(upstream, `${label} failed: ${reason}`, err);
  } finally {
    clearTimeout(timer);
  }
}
