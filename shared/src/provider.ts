export type LLMMessage = {
  role: "user" | "assistant";
  content: string;
};

export type ResponseFormat = {
  type: "json_object";
  schema?: Record<string, unknown>;
};

export type CompletionParams = {
  model: string;
  system?: string;
  messages: LLMMessage[];
  maxTokens: number;
  temperature?: number;
  responseFormat?: ResponseFormat;
  signal?: AbortSignal;
};

export type CompletionUsage = {
  input: number;
  output: number;
};

export type Completion = {
  text: string;
  stopReason: string;
  usage?: CompletionUsage;
};

export type LLMProvider = {
  id: string;
  name: string;
  complete(params: CompletionParams): Promise<Completion>;
};
