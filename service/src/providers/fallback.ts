import type { Completion, CompletionParams, LLMProvider } from "@coinwire/shared";

export type ProviderError = {
  providerId: string;
  error: Error;
};

export class AllProvidersFailedError extends Error {
  readonly errors: ProviderError[];

  constructor(errors: ProviderError[]) {
    const summary = errors.map((e) => `${e.providerId}: ${e.error.message}`).join("; ");
    super(`All providers failed: ${summary}`);
    this.name = "AllProvidersFailedError";
    this.errors = errors;
  }
}

/** Tries each provider in order and returns the first completion. */
export function withFallback(providers: LLMProvider[]): LLMProvider {
  if (providers.length === 0) {
    throw new Error("At least one provider is required");
  }

  return {
    id: "fallback",
    name: `Fallback(${providers.map((p) => p.id).join(", ")})`,

    async complete(params: CompletionParams): Promise<Completion> {
      const errors: ProviderError[] = [];

      for (const provider of providers) {
        if (params.signal?.aborted) break;
        try {
          return await provider.complete(params);
        } catch (err) {
          errors.push({
            providerId: provider.id,
            error: err instanceof Error ? err : new Error(String(err)),
          });
        }
      }

      throw new AllProvidersFailedError(errors);
    },
  };
}
