import { describe, it, expect } from "vitest";
import { AnthropicProvider } from "../anthropic-provider.js";
import { OpenRouterProvider } from "../openrouter-provider.js";
import { createProvider, createProviderChain } from "../factory.js";

describe("provider factory", () => {
  it("builds a provider by type", () => {
    expect(createProvider({ id: "anthropic", type: "anthropic", apiKey: "test-key" })).toBeInstanceOf(AnthropicProvider);
    const or = createProvider({ id: "or", type: "openrouter", apiKey: "test-key" });
    expect(or).toBeInstanceOf(OpenRouterProvider);
    expect(or.id).toBe("or");
  });

  it("returns null without providers", () => {
    expect(createProviderChain([])).toBeNull();
  });

  it("returns a lone provider unwrapped", () => {
    const chain = createProviderChain([{ id: "anthropic", type: "anthropic", apiKey: "test-key" }]);
    expect(chain?.id).toBe("anthropic");
  });

  it("wraps several providers in fallback order", () => {
    const chain = createProviderChain([
      { id: "anthropic", type: "anthropic", apiKey: "test-key" },
      { id: "openrouter", type: "openrouter", apiKey: "test-key" },
    ]);
    expect(chain?.name).toBe("Fallback(anthropic, openrouter)");
  });
});
