import { describe, it, expect, vi, beforeEach } from "vitest";
import type { CompletionParams } from "@coinwire/shared";

const { mockCreate, constructed, MockApiError } = vi.hoisted(() => {
  class MockApiError extends Error {
    readonly status: number | undefined;
    readonly headers: Record<string, string> | undefined;

    constructor(status: number | undefined, message: string, headers?: Record<string, string>) {
      super(message);
      this.status = status;
      this.headers = headers;
    }
  }
  const constructed: unknown[] = [];
  return { mockCreate: vi.fn(), constructed, MockApiError };
});

vi.mock("@anthropic-ai/sdk", () => {
  class Anthropic {
    static APIError = MockApiError;
    messages = { create: mockCreate };

    constructor(options: unknown) {
      constructed.push(options);
    }
  }
  return { default: Anthropic, APIError: MockApiError };
});

import { AnthropicProvider } from "../anthropic-provider.js";
import { ProviderApiError } from "../errors.js";

const params: CompletionParams = {
  model: "claude-haiku-4-5-20251001",
  system: "You translate news.",
  messages: [{ role: "user", content: "Hola" }],
  maxTokens: 1024,
  temperature: 0.3,
};

describe("AnthropicProvider", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    constructed.length = 0;
  });

  it("has correct id and name", () => {
    const provider = new AnthropicProvider({ apiKey: "test-key" });
    expect(provider.id).toBe("anthropic");
    expect(provider.name).toBe("Anthropic");
  });

  it("disables SDK retries", () => {
    new AnthropicProvider({ apiKey: "test-key" });
    expect(constructed).toEqual([{ apiKey: "test-key", maxRetries: 0 }]);
  });

  it("joins text blocks and reports usage", async () => {
    mockCreate.mockResolvedValue({
      content: [
        { type: "text", text: "Hello" },
        { type: "text", text: " world" },
      ],
      stop_reason: "end_turn",
      usage: { input_tokens: 12, output_tokens: 3 },
    });

    const provider = new AnthropicProvider({ apiKey: "test-key" });
    const result = await provider.complete(params);

    expect(result).toEqual({ text: "Hello world", stopReason: "end_turn", usage: { input: 12, output: 3 } });
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: "claude-haiku-4-5-20251001",
        max_tokens: 1024,
        messages: [{ role: "user", content: "Hola" }],
        system: "You translate news.",
        temperature: 0.3,
      },
      { signal: undefined },
    );
  });

  it("appends the JSON instruction to the system prompt", async () => {
    mockCreate.mockResolvedValue({
      content: [{ type: "text", text: "{}" }],
      stop_reason: "end_turn",
      usage: { input_tokens: 1, output_tokens: 1 },
    });

    const provider = new AnthropicProvider({ apiKey: "test-key" });
    await provider.complete({ ...params, responseFormat: { type: "json_object" } });

    const [body] = mockCreate.mock.calls[0] ?? [];
    expect(body).toMatchObject({
      system: "You translate news.\n\nYou must respond with valid JSON. No other text, explanations, or formatting.",
    });
  });

  it("maps API errors to ProviderApiError with the retry-after delay", async () => {
    mockCreate.mockRejectedValue(new MockApiError(429, "rate_limit_error", { "retry-after": "30" }));

    const provider = new AnthropicProvider({ apiKey: "test-key" });
    const err = await provider.complete(params).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderApiError);
    if (!(err instanceof ProviderApiError)) return;
    expect(err.status).toBe(429);
    expect(err.retryAfterMs).toBe(30_000);
    expect(err.providerId).toBe("anthropic");
    expect(err.message).toBe("Anthropic API error 429: rate_limit_error");
  });

  it("passes other errors through unchanged", async () => {
    const boom = new Error("socket hang up");
    mockCreate.mockRejectedValue(boom);

    const provider = new AnthropicProvider({ apiKey: "test-key" });
    await expect(provider.complete(params)).rejects.toBe(boom);
  });
});
