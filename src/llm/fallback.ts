// src/llm/fallback.ts — Generative-first, heuristic-fallback combinator
// Used by the planner, the specialized agents and the critic review.

export interface FallbackOutcome<T> {
  value: T;
  usedFallback: boolean;
  error?: string;
}

/**
 * Run `primary`; on any rejection run `fallback` instead. `primary` may be
 * null when generative assistance is off, in which case the fallback runs
 * directly and no error is reported.
 */
export async function withFallback<T>(
  primary: (() => Promise<T>) | null,
  fallback: () => T | Promise<T>,
  onError?: (message: string) => void,
): Promise<FallbackOutcome<T>> {
  if (primary) {
    try {
      return { value: await primary(), usedFallback: false };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      onError?.(message);
      return { value: await fallback(), usedFallback: true, error: message };
    }
  }
  return { value: await fallback(), usedFallback: true };
}
