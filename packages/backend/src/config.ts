import { z } from 'zod';
import { logger } from './utils/logger';

export const DEFAULT_UPSTREAM_URL = 'https://api.anthropic.com';

// --- Mapping tables ---

function splitPairs(mappingStr: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const pair of mappingStr.split(',')) {
    const separator = pair.indexOf(':');
    if (separator === -1) continue;
    const key = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    if (key && value) {
      pairs.push([key, value]);
    }
  }
  return pairs;
}

function parsePositiveInt(value: string): number | undefined {
  if (!/^\+?\d+$/.test(value)) return undefined;
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}

/**
 * Parses a model rewrite table.
 * Format: "source1:target1,source2:target2"
 */
export function parseModelMapping(mappingStr: string | undefined): Record<string, string> {
  if (!mappingStr) return {};
  return Object.fromEntries(splitPairs(mappingStr));
}

/**
 * Parses a per-model max_tokens table.
 * Format: "model1:16384,model2:4096"; non-positive or non-numeric values are skipped.
 */
export function parseMaxTokensMapping(mappingStr: string | undefined): Record<string, number> {
  const mapping: Record<string, number> = {};
  if (!mappingStr) return mapping;

  for (const [model, tokensStr] of splitPairs(mappingStr)) {
    const tokens = parsePositiveInt(tokensStr);
    if (tokens !== undefined) {
      mapping[model] = tokens;
    }
  }
  return mapping;
}

// --- Zod Schema ---

const EnvSchema = z.object({
  ANTHROPIC_BASE_URL: z
    .string()
    .url()
    .optional()
    .or(z.literal('').transform(() => undefined)),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  MODEL_MAPPING: z.string().optional(),
  MAX_TOKENS_MAPPING: z.string().optional(),
  MAX_TOKENS: z.string().optional(),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
});

export interface RelayConfig {
  upstreamUrl: string;
  port: number;
  host: string;
  modelMapping: Record<string, string>;
  maxTokensMapping: Record<string, number>;
  defaultMaxTokens?: number;
  upstreamTimeoutMs: number;
}

/**
 * Builds the relay configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = EnvSchema.parse(env);

  const config: RelayConfig = {
    upstreamUrl: (parsed.ANTHROPIC_BASE_URL ?? DEFAULT_UPSTREAM_URL).replace(/\/+$/, ''),
    port: parsed.PORT,
    host: parsed.HOST,
    modelMapping: parseModelMapping(parsed.MODEL_MAPPING),
    maxTokensMapping: parseMaxTokensMapping(parsed.MAX_TOKENS_MAPPING),
    defaultMaxTokens: parsed.MAX_TOKENS ? parsePositiveInt(parsed.MAX_TOKENS.trim()) : undefined,
    upstreamTimeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
  };

  logConfigStats(config);
  return config;
}

function logConfigStats(config: RelayConfig) {
  logger.debug(`Upstream API URL: ${config.upstreamUrl}`);

  const modelCount = Object.keys(config.modelMapping).length;
  if (modelCount > 0) {
    logger.debug(`Loaded ${modelCount} model mappings`, { modelMapping: config.modelMapping });
  } else {
    logger.debug('Model mapping: disabled (passthrough)');
  }

  const maxTokensCount = Object.keys(config.maxTokensMapping).length;
  if (maxTokensCount > 0) {
    logger.debug(`Loaded ${maxTokensCount} max_tokens mappings`, {
      maxTokensMapping: config.maxTokensMapping,
    });
  } else {
    logger.debug('Max tokens mapping: using defaults');
  }
}
