export interface MaxTokensOptions {
  /** Per-model overrides, keyed by the upstream model name. */
  maxTokensMapping?: Record<string, number>;
  /** Global default applied before the model-name heuristic. */
  defaultMaxTokens?: number;
}

const DEFAULT_MAX_TOKENS = 8192;

function isPositive(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 1;
}

/**
 * Picks a default output budget from the model family.
 */
export function maxTokensForModel(model: string): number {
  if (model.includes('opus-4')) return 16384;
  if (model.includes('opus') || model.includes('sonnet')) return 8192;
  if (model.includes('haiku')) return 4096;
  return DEFAULT_MAX_TOKENS;
}

/**
 * Resolves max_tokens for the upstream request. The Messages API requires it,
 * so the result is always a positive integer.
 *
 * Priority: explicit request value, per-model mapping, global default, model heuristic.
 */
export function resolveMaxTokens(
  model: string,
  requested: number | null | undefined,
  options: MaxTokensOptions = {}
): number {
  if (isPositive(requested)) {
    return Math.floor(requested);
  }

  const mapping = options.maxTokensMapping;
  const mapped = mapping && Object.hasOwn(mapping, model) ? mapping[model] : undefined;
  if (isPositive(mapped)) {
    return Math.floor(mapped);
  }

  if (isPositive(options.defaultMaxTokens)) {
    return Math.floor(options.defaultMaxTokens);
  }

  return maxTokensForModel(model);
}
