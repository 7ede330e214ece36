import OpenAI from "openai";

import type { InsightConfig } from "../config";

export type CompletionRequest = {
  system: string;
  user: string;
  maxTokens: number;
  temperature: number;
  signal: AbortSignal;
};

export interface LanguageModelClient {
  readonly modelId: string;
  complete(request: CompletionRequest): Promise<string>;
}

export class OpenAIChatClient implements LanguageModelClient {
  readonly modelId: string;
  readonly #client: OpenAI;

  constructor(apiKey: string, model: string) {
    this.modelId = model;
    // Retries and deadlines are owned by the pipeline.
    this.#client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const res = await this.#client.chat.completions.create(
      {
        model: this.modelId,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user }
        ],
        max_tokens: request.maxTokens,
        temperature: request.temperature
      },
      { signal: request.signal }
    );

    const content = res.choices[0]?.message?.content;
    if (!content) {
      throw new Error("OpenAI returned empty content");
    }
    return content;
  }
}

/**
* Returns `null` when the local template should be used instead: either the
* configured provider is `local` or no API key is available.
*/
export function createLanguageModelClient(
  cfg: InsightConfig,
  env: NodeJS.ProcessEnv = process.env
): LanguageModelClient | null {
  if (cfg.provider === "local") {
    return null;
  }

  const key = env.OPENAI_API_KEY;
  if (!key) {
    console.warn("[market:insight] OPENAI_API_KEY not set; using local template commentary");
    return null;
  }

  return new OpenAIChatClient(key, cfg.model);
}
