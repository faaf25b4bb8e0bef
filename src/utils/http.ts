// Simple fetch with timeout & retry for outbound calls (log collector, probes).
export async function fetchWithTimeout(
  url: string,
  opts: RequestInit & { timeoutMs?: number } = {},
  retries = 0,
  retryDelayMs = 0
): Promise<Response> {
  const { timeoutMs = 8000, ...init } = opts;
  const ctrl = new AbortController();
  const timer = setTimeout(() => ctrl.abort(), timeoutMs);

  try {
    return await fetch(url, { ...init, signal: ctrl.signal });
  } catch (err) {
    if (retries > 0) {
      await new Promise((r) => setTimeout(r, retryDelayMs));
      return fetchWithTimeout(url, opts, retries - 1, retryDelayMs);
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
