import Anthropic from "@anthropic-ai/sdk";
import type { Completion, CompletionParams, LLMProvider } from "@coinwire/shared";
import { parseRetryAfter, ProviderApiError } from "./errors.js";

export type AnthropicProviderOptions = {
  apiKey: string;
  id?: string;
  name?: string;
};

function jsonInstruction(params: CompletionParams): string | undefined {
  if (params.responseFormat?.type !== "json_object") return undefined;
  return params.responseFormat.schema
    ? `You must respond with valid JSON matching this schema: ${JSON.stringify(params.responseFormat.schema)}`
    : "You must respond with valid JSON. No other text, explanations, or formatting.";
}

export class AnthropicProvider implements LLMProvider {
  readonly id: string;
  readonly name: string;
  private client: Anthropic;

  constructor(options: AnthropicProviderOptions) {
    this.id = options.id ?? "anthropic";
    this.name = options.name ?? "Anthropic";
    // Callers own backoff; the SDK must not retry 429s behind their back.
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async complete(params: CompletionParams): Promise<Completion> {
    const instruction = jsonInstruction(params);
    const system = params.system && instruction
      ? `${params.system}\n\n${instruction}`
      : params.system ?? instruction;

    let message: Anthropic.Message;
    try {
      message = await this.client.messages.create(
        {
          model: params.model,
          max_tokens: params.maxTokens,
          messages: params.messages.map((m) => ({ role: m.role, content: m.content })),
          ...(system !== undefined && { system }),
          ...(params.temperature !== undefined && { temperature: params.temperature }),
        },
        { signal: params.signal },
      );
    } catch (err) {
      if (err instanceof Anthropic.APIError && typeof err.status === "number") {
        throw new ProviderApiError(
          this.id,
          err.status,
          `Anthropic API error ${err.status}: ${err.message}`,
          parseRetryAfter(err.headers?.["retry-after"]),
        );
      }
      throw err;
    }

    let text = "";
    for (const block of message.content) {
      if (block.type === "text") text += block.text;
    }

    return {
      text,
      stopReason: message.stop_reason ?? "end_turn",
      usage: { input: message.usage.input_tokens, output: message.usage.output_tokens },
    };
  }
}
