import OpenAI from "openai";
import type { Config } from "../config.js";
import { HttpError, LLMGenerationError, OllamaConnectionError, errorMessage } from "./errors.js";
import { getLogger } from "./logger.js";

const log = getLogger("llm");

export type Completion = {
  content: string;
  tokens: number;
  model: string;
};

export type LlmStatus = {
  status: "connected" | "disconnected";
  base_url: string;
  model: string;
  model_available: boolean;
  available_models: string[];
  error?: string;
};

/** Chat completion backend used by plan generation, subtasks and optimization. */
export interface LlmClient {
  readonly model: string;
  complete(prompt: string, system: string): Promise<Completion>;
  status(): Promise<LlmStatus>;
}

type OllamaOptions = Pick<Config, "ollamaBaseUrl" | "ollamaModel" | "llmTimeoutMs" | "llmMaxRetries">;

/**
 * Talks to Ollama through its OpenAI-compatible `/v1` API. Connection errors
 * and timeouts are retried by the client with exponential backoff.
 */
export class OllamaClient implements LlmClient {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly openai: OpenAI;

  constructor(options: OllamaOptions) {
    this.model = options.ollamaModel;
    this.baseUrl = options.ollamaBaseUrl;
    this.openai = new OpenAI({
      baseURL: `${options.ollamaBaseUrl}/v1`,
      apiKey: "ollama",
      timeout: options.llmTimeoutMs,
      maxRetries: options.llmMaxRetries,
    });
  }

  async complete(prompt: string, system: string): Promise<Completion> {
    const started = Date.now();
    log.info({ model: this.model, promptChars: prompt.length }, "calling LLM");
    try {
      const completion = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: prompt },
        ],
        temperature: 0.7,
        top_p: 0.9,
        max_tokens: 2000,
      });
      const content = completion.choices[0]?.message?.content ?? "";
      if (!content.trim()) throw new LLMGenerationError("LLM returned an empty response");

      const tokens = completion.usage?.total_tokens ?? 0;
      log.info({ model: this.model, tokens, ms: Date.now() - started }, "LLM call completed");
      return { content, tokens, model: completion.model || this.model };
    } catch (err) {
      throw this.translate(err);
    }
  }

  async status(): Promise<LlmStatus> {
    const base = { base_url: this.baseUrl, model: this.model };
    try {
      const page = await this.openai.models.list({ timeout: 5_000, maxRetries: 0 });
      const available_models = page.data.map(m => m.id);
      return {
        ...base,
        status: "connected",
        available_models,
        model_available: available_models.some(id => id === this.model || id.startsWith(`${this.model}:`)),
      };
    } catch (err) {
      return { ...base, status: "disconnected", available_models: [], model_available: false, error: errorMessage(err) };
    }
  }

  private translate(err: unknown): HttpError {
    if (err instanceof HttpError) return err;
    if (err instanceof OpenAI.APIConnectionTimeoutError) {
      log.error({ model: this.model }, "LLM request timed out");
      return new LLMGenerationError("LLM request timed out. Try a smaller model or a shorter goal.");
    }
    if (err instanceof OpenAI.APIConnectionError) {
      log.error({ err }, "cannot reach Ollama");
      return new OllamaConnectionError();
    }
    if (err instanceof OpenAI.NotFoundError) {
      return new LLMGenerationError(`Model '${this.model}' not found. Run: ollama pull ${this.model}`);
    }
    log.error({ err }, "LLM call failed");
    return new LLMGenerationError(`LLM call failed: ${errorMessage(err)}`);
  }
}
