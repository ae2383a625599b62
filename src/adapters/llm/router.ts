/**
 * Gateway router
 *
 * Builds the generation gateway for the provider selected at startup.
 * Provider choice is process-wide; requests may only override the model.
 * Gateways are cached per provider/model so SDK clients are reused across
 * requests. The cache is LRU-bounded: model overrides come from callers.
 */

import type { Config, LLMProviderT } from "../../config/index.js";
import { ConfigurationError } from "../../orchestrator/errors.js";
import { log } from "../../utils/telemetry.js";
import { AnthropicGateway, ANTHROPIC_DEFAULT_MODEL, createAnthropicClient } from "./anthropic.js";
import { FixturesGateway, FIXTURES_DEFAULT_MODEL } from "./fixtures.js";
import { OpenAIGateway, OPENAI_DEFAULT_MODEL, createOpenAIClient } from "./openai.js";
import type { GenerationGateway } from "./types.js";

export const DEFAULT_MODELS: Record<LLMProviderT, string> = {
  openai: OPENAI_DEFAULT_MODEL,
  anthropic: ANTHROPIC_DEFAULT_MODEL,
  fixtures: FIXTURES_DEFAULT_MODEL,
};

/** Maximum cached gateways; the least recently used entry is evicted first */
export const MAX_CACHED_GATEWAYS = 16;

const gateways = new Map<string, GenerationGateway>();

/**
 * Resolve the model for a call: request override, then LLM_MODEL, then the
 * provider default.
 */
export function resolveModel(cfg: Config, modelOverride?: string): string {
  return modelOverride ?? cfg.llm.model ?? DEFAULT_MODELS[cfg.llm.provider];
}

function requireKey(key: string | undefined, provider: LLMProviderT, variable: string): string {
  if (!key) {
    throw new ConfigurationError(`LLM_PROVIDER=${provider} but ${variable} is not set`, { provider });
  }
  return key;
}

function buildGateway(cfg: Config, model: string): GenerationGateway {
  switch (cfg.llm.provider) {
    case "openai":
      return new OpenAIGateway(createOpenAIClient(requireKey(cfg.llm.openaiApiKey, "openai", "OPENAI_API_KEY")), model);
    case "anthropic":
      return new AnthropicGateway(
        createAnthropicClient(requireKey(cfg.llm.anthropicApiKey, "anthropic", "ANTHROPIC_API_KEY")),
        model
      );
    case "fixtures":
      return new FixturesGateway(model);
  }
}

/**
 * Get the gateway for the configured provider.
 *
 * @throws ConfigurationError when the provider's credentials are missing
 */
export function getGateway(cfg: Config, modelOverride?: string): GenerationGateway {
  const model = resolveModel(cfg, modelOverride);
  const cacheKey = `${cfg.llm.provider}:${model}`;

  const cached = gateways.get(cacheKey);
  if (cached) {
    // Cache hit - move to end (LRU)
    gateways.delete(cacheKey);
    gateways.set(cacheKey, cached);
    return cached;
  }

  const gateway = buildGateway(cfg, model);
  if (gateways.size >= MAX_CACHED_GATEWAYS) {
    const oldest = gateways.keys().next().value;
    if (oldest !== undefined) gateways.delete(oldest);
  }
  gateways.set(cacheKey, gateway);
  log.debug({ provider: gateway.name, model: gateway.model }, "Generation gateway initialised");
  return gateway;
}

/**
 * Number of cached gateways.
 */
export function gatewayCacheSize(): number {
  return gateways.size;
}

/**
 * Reset gateway cache (useful for testing).
 */
export function resetGatewayCache(): void {
  gateways.clear();
}
