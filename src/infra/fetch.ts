export function resolveFetch(fetchImpl?: typeof fetch): typeof fetch {
  const resolved = fetchImpl ?? globalThis.fetch;
  if (!resolved) {
    throw new Error("fetch is not available in this runtime (Node 18+ required)");
  }
  return resolved;
}

/** Adds a timeout signal unless the caller already supplied one. */
export function withRequestTimeout(init: RequestInit, timeoutMs?: number): RequestInit {
  if (init.signal || !timeoutMs || timeoutMs <= 0) return init;
  return { ...init, signal: AbortSignal.timeout(timeoutMs) };
}
