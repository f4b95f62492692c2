export const WORKER_POOL = {
  defaultSize: 5,
  minSize: 1,
  maxSize: 20,
} as const;

export const MOCK_CONFIG = {
  latencyMs: 500,
  inputTokens: 100,
  outputTokens: 50,
} as const;

export const PROGRESS_CONFIG = {
  idWidth: 12,
  titleWidth: 35,
  verdictWidth: 15,
  tokenWidth: 12,
  costWidth: 10,
} as const;

/**
 * Clamps a requested worker count into the supported pool range. Non-finite
 * input falls back to the default size.
 */
export function clampWorkers(requested: number): number {
  if (!Number.isFinite(requested)) return WORKER_POOL.defaultSize;
  return Math.max(
    WORKER_POOL.minSize,
    Math.min(Math.trunc(requested), WORKER_POOL.maxSize),
  );
}
