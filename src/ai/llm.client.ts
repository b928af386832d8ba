import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { GenerationError, errorMessage } from "../shared/errors";
import { INTERVIEWER_SYSTEM_PROMPT } from "./system/interviewer.system";

/**
 * Text-generation collaborator consumed by the engine. `context` is an ordered list
 * of prior texts the model should take into account (e.g. questions already asked).
 */
export interface TextGenerator {
  generate(prompt: string, context: ReadonlyArray<string>): Promise<string>;
  getModelName?(): string;
}

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens: number;
}

interface ChatCompletionsResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
  json(): Promise<unknown>;
}

export type HttpFetch = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body: string;
  },
) => Promise<HttpResponseLike>;

export interface LlmClientOptions {
  apiKey?: string;
  baseUrl: string;
  model: string;
  fallbackModels?: ReadonlyArray<string>;
  temperature?: number;
  maxTokens?: number;
  fetchImpl?: HttpFetch;
}

export class LlmClient implements TextGenerator {
  private readonly models: string[];
  private readonly fetchImpl: HttpFetch;

  constructor(
    private readonly options: LlmClientOptions,
    private readonly logger: Logger,
  ) {
    this.models = Array.from(new Set([options.model, ...(options.fallbackModels ?? [])]));
    this.fetchImpl = options.fetchImpl ?? fetch;
    if (!INTERVIEWER_SYSTEM_PROMPT.trim()) {
      throw new Error("INTERVIEWER_SYSTEM_PROMPT is empty. Refusing to start.");
    }
  }

  getModelName(): string {
    return this.options.model;
  }

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async generate(prompt: string, context: ReadonlyArray<string>): Promise<string> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new GenerationError("LLM API key is not configured", "not_configured");
    }

    let lastError: unknown = null;
    for (const model of this.models) {
      try {
        return await this.requestCompletion(apiKey, model, prompt, context);
      } catch (error) {
        lastError = error;
        if (this.models.length > 1) {
          this.logger.warn("llm.model.failed", {
            modelName: model,
            error: errorMessage(error),
          });
        }
      }
    }
    if (lastError instanceof GenerationError) {
      throw lastError;
    }
    throw new GenerationError(errorMessage(lastError), "network");
  }

  buildRequestBody(
    model: string,
    prompt: string,
    context: ReadonlyArray<string>,
  ): ChatCompletionsRequestBody {
    const messages: ChatCompletionsRequestBody["messages"] = [
      {
        role: "system",
        content: INTERVIEWER_SYSTEM_PROMPT,
      },
    ];
    if (context.length) {
      messages.push({
        role: "system",
        content: ["Previously asked questions:", ...context.map((item, index) => `${index + 1}. ${item}`)].join("\n"),
      });
    }
    messages.push({
      role: "user",
      content: prompt,
    });
    return {
      model,
      temperature: this.options.temperature ?? 0.4,
      messages,
      max_tokens: this.options.maxTokens ?? 600,
    };
  }

  private async requestCompletion(
    apiKey: string,
    model: string,
    prompt: string,
    context: ReadonlyArray<string>,
  ): Promise<string> {
    const startedAt = Date.now();
    const requestBody = this.buildRequestBody(model, prompt, context);

    let response: HttpResponseLike;
    try {
      response = await this.fetchImpl(`${this.options.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });
    } catch (error) {
      throw new GenerationError(`LLM network error: ${errorMessage(error)}`, "network");
    }

    if (!response.ok) {
      const body = await response.text();
      this.logger.warn("llm.call.failed", {
        modelName: model,
        latencyMs: Date.now() - startedAt,
        status: response.status,
      });
      throw new GenerationError(
        `LLM API error: HTTP ${response.status} - ${body.slice(0, 300)}`,
        "http_error",
        response.status,
      );
    }

    const body = (await response.json()) as ChatCompletionsResponse;
    const content = body.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new GenerationError("LLM response does not contain message content", "empty_content");
    }

    this.logger.info("llm.call.completed", {
      modelName: model,
      latencyMs: Date.now() - startedAt,
      tokenEstimate: estimateTokenCount(prompt, content),
    });
    return content;
  }
}

function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}
