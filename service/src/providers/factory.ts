import type { Config, LLMProvider } from "@coinwire/shared";
import { AnthropicProvider } from "./anthropic-provider.js";
import { withFallback } from "./fallback.js";
import { OpenRouterProvider } from "./openrouter-provider.js";

type ProviderConfig = Config["llm"]["providers"][number];

export function createProvider(config: ProviderConfig): LLMProvider {
  switch (config.type) {
    case "anthropic":
      return new AnthropicProvider({ apiKey: config.apiKey, id: config.id });
    case "openrouter":
      return new OpenRouterProvider({ apiKey: config.apiKey, id: config.id });
  }
}

/** One provider as is, several wrapped in fallback order, none as null. */
export function createProviderChain(configs: ProviderConfig[]): LLMProvider | null {
  const providers = configs.map(createProvider);
  if (providers.length === 0) return null;
  if (providers.length === 1) return providers[0] ?? null;
  return withFallback(providers);
}
