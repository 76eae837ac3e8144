import { z } from "zod";
import type { LLMProvider } from "@coinwire/shared";
import { createLogger } from "../utils/logger.js";

const log = createLogger("translator");

export type TranslationResult = {
  title: string;
  description: string;
  fromLanguage: string;
};

export type TranslatorOptions = {
  provider: LLMProvider;
  model: string;
  targetLanguage?: string;
};

const LANGUAGE_NAMES: Record<string, string> = {
  ar: "Arabic",
  de: "German",
  en: "English",
  es: "Spanish",
  fa: "Persian",
  fr: "French",
  id: "Indonesian",
  it: "Italian",
  ja: "Japanese",
  ko: "Korean",
  nl: "Dutch",
  pl: "Polish",
  pt: "Portuguese",
  ru: "Russian",
  th: "Thai",
  tr: "Turkish",
  uk: "Ukrainian",
  vi: "Vietnamese",
  zh: "Chinese",
};

export const MAX_PROMPT_DESCRIPTION_LENGTH = 2000;

const SYSTEM_PROMPT =
  "You are a professional translator specializing in cryptocurrency and financial news. " +
  "Translate accurately while preserving technical terms and coin names. Respond ONLY with valid JSON.";

const TranslationSchema = z.object({
  title: z.string(),
  description: z.string().default(""),
});

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code.toLowerCase()] ?? code;
}

function parseTranslation(text: string): z.infer<typeof TranslationSchema> | null {
  const unfenced = text.replace(/^\s*```(?:json)?\s*/i, "").replace(/\s*```\s*$/, "").trim();
  const candidates = [unfenced];
  const braces = unfenced.match(/\{[\s\S]*\}/);
  if (braces && braces[0] !== unfenced) candidates.push(braces[0]);

  for (const candidate of candidates) {
    let raw: unknown;
    try {
      raw = JSON.parse(candidate);
    } catch {
      continue;
    }
    const parsed = TranslationSchema.safeParse(raw);
    if (parsed.success) return parsed.data;
  }
  return null;
}

export class TranslatorService {
  private readonly provider: LLMProvider;
  private readonly model: string;
  readonly targetLanguage: string;

  constructor(options: TranslatorOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.targetLanguage = (options.targetLanguage ?? "en").toLowerCase();
  }

  /** Provider errors propagate; output that is not the expected JSON falls back to the input. */
  async translateArticle(
    title: string,
    description: string,
    fromLanguage: string,
    signal?: AbortSignal,
  ): Promise<TranslationResult> {
    const original = { title, description, fromLanguage };
    if (fromLanguage.toLowerCase() === this.targetLanguage) {
      return original;
    }

    const desc = Array.from(description).slice(0, MAX_PROMPT_DESCRIPTION_LENGTH).join("");
    const prompt = `Translate this ${languageName(fromLanguage)} cryptocurrency news article to ${languageName(this.targetLanguage)}. Return ONLY valid JSON with "title" and "description" fields.

Title: ${title}

Description: ${desc}

Response format:
{"title": "translated title", "description": "translated description"}`;

    const completion = await this.provider.complete({
      model: this.model,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: prompt }],
      maxTokens: 1024,
      temperature: 0.3,
      responseFormat: { type: "json_object" },
      signal,
    });

    const parsed = parseTranslation(completion.text);
    if (!parsed) {
      log.warn("Unparseable translation, keeping original", {
        language: fromLanguage,
        response: completion.text.slice(0, 200),
      });
      return original;
    }
    return { title: parsed.title, description: parsed.description, fromLanguage };
  }
}
