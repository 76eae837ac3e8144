import { z } from "zod";
import type { Completion, CompletionParams, LLMProvider } from "@coinwire/shared";
import { parseRetryAfter, ProviderApiError } from "./errors.js";

export type OpenRouterProviderOptions = {
  apiKey: string;
  id?: string;
  name?: string;
  referer?: string;
  title?: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
};

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1/chat/completions";

const ChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

export class OpenRouterProvider implements LLMProvider {
  readonly id: string;
  readonly name: string;
  private apiKey: string;
  private referer: string | undefined;
  private title: string;
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(options: OpenRouterProviderOptions) {
    this.id = options.id ?? "openrouter";
    this.name = options.name ?? "OpenRouter";
    this.apiKey = options.apiKey;
    this.referer = options.referer;
    this.title = options.title ?? "Coinwire";
    this.baseUrl = options.baseUrl ?? OPENROUTER_BASE_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(params: CompletionParams): Promise<Completion> {
    const messages: Array<{ role: string; content: string }> = [];
    if (params.system) {
      messages.push({ role: "system", content: params.system });
    }
    for (const m of params.messages) {
      messages.push({ role: m.role, content: m.content });
    }

    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.maxTokens,
      messages,
    };
    if (params.temperature !== undefined) {
      body.temperature = params.temperature;
    }
    if (params.responseFormat) {
      body.response_format = { type: params.responseFormat.type };
    }

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Authorization: `Bearer ${this.apiKey}`,
      "X-Title": this.title,
    };
    if (this.referer) headers["HTTP-Referer"] = this.referer;

    const response = await this.fetchImpl(this.baseUrl, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: params.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ProviderApiError(
        this.id,
        response.status,
        `OpenRouter API error ${response.status}: ${errorText}`,
        parseRetryAfter(response.headers.get("retry-after")),
      );
    }

    const parsed = ChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`OpenRouter returned an unexpected body: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }

    const [choice] = parsed.data.choices;
    const usage = parsed.data.usage;
    return {
      text: choice?.message?.content ?? "",
      stopReason: choice?.finish_reason ?? "stop",
      ...(usage && {
        usage: { input: usage.prompt_tokens ?? 0, output: usage.completion_tokens ?? 0 },
      }),
    };
  }
}
