import { isResponseError, isValidationError, up } from "up-fetch";
import { z } from "zod";
import { DEFAULT_INFERENCE_TIMEOUT_MS, DEFAULT_INFERENCE_URL } from "./constants";
import { InferenceError, ModelAttemptError } from "./errors";
import type { Logger } from "./logger";
import type { CompletionResult } from "./types";

type ChatMessage = { role: "system" | "user"; content: string };

const completionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      }),
    )
    .min(1, "No choices in API response"),
});

/** Anything that turns a prompt into text using the first model that answers. */
export interface Completer {
  complete(prompt: string, models: readonly string[]): Promise<CompletionResult>;
}

export type InferenceClientOptions = {
  apiKey: string;
  logger: Logger;
  baseUrl?: string;
  systemPrompt?: string;
  timeoutMs?: number;
  // Stop the fallback chain on 401/403, since a rejected key fails for every model.
  stopOnAuthError?: boolean;
  fetch?: typeof fetch;
};

function describeBody(data: unknown): string {
  if (data === undefined || data === null || data === "") return "";
  const text = typeof data === "string" ? data : JSON.stringify(data);
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}

function statusFailure(model: string, status: number, data: unknown): ModelAttemptError {
  const detail = describeBody(data);
  const suffix = detail ? `: ${detail}` : "";
  if (status === 429) {
    return new ModelAttemptError(model, "rate_limited", "Rate limit exceeded (429)", status);
  }
  if (status >= 500) {
    return new ModelAttemptError(model, "server_error", `Inference server error (${status})${suffix}`, status);
  }
  if (status === 401 || status === 403) {
    return new ModelAttemptError(model, "client_error", `Unauthorized: invalid API key (${status})`, status);
  }
  if (status === 404) {
    return new ModelAttemptError(
      model,
      "client_error",
      "Model not found or data policy restriction (404)",
      status,
    );
  }
  return new ModelAttemptError(model, "client_error", `Unexpected status code ${status}${suffix}`, status);
}

function isAbort(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("name" in error)) return false;
  return error.name === "TimeoutError" || error.name === "AbortError";
}

/**
 * Chat-completion client with ordered model fallback.
 *
 * Each model gets exactly one request. The first model that answers with
 * non-blank content wins and later models are never contacted.
 */
export class InferenceClient implements Completer {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly systemPrompt: string;
  private readonly timeoutMs: number;
  private readonly stopOnAuthError: boolean;
  private readonly logger: Logger;
  private readonly upfetch;

  constructor(options: InferenceClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? DEFAULT_INFERENCE_URL;
    this.systemPrompt = options.systemPrompt ?? "";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_INFERENCE_TIMEOUT_MS;
    this.stopOnAuthError = options.stopOnAuthError ?? false;
    this.logger = options.logger;

    const apiKey = this.apiKey;
    this.upfetch = up(options.fetch ?? fetch, () => ({
      headers: { Authorization: `Bearer ${apiKey}` },
    }));
  }

  async complete(prompt: string, models: readonly string[]): Promise<CompletionResult> {
    if (!prompt.trim()) {
      throw new InferenceError("EMPTY_PROMPT", "Prompt cannot be empty");
    }
    if (models.length === 0) {
      throw new InferenceError("NO_MODELS", "Models list cannot be empty");
    }
    if (!this.apiKey) {
      throw new InferenceError("MISSING_API_KEY", "API key cannot be empty");
    }

    const attempts: ModelAttemptError[] = [];
    for (const [index, model] of models.entries()) {
      this.logger.debug("Attempting model", { model, attempt: index + 1, of: models.length });
      try {
        const text = await this.completeWithModel(prompt, model);
        this.logger.debug("Model answered", { model, length: text.length });
        return { model, text };
      } catch (error) {
        const failure = this.classify(model, error);
        attempts.push(failure);
        this.logger.warn("Model failed", {
          model,
          kind: failure.kind,
          status: failure.status,
          error: failure.message,
        });
        if (this.stopOnAuthError && failure.isAuthFailure) {
          this.logger.error("Credential rejected, skipping remaining models", { model });
          break;
        }
      }
    }

    const last = attempts[attempts.length - 1];
    throw new InferenceError(
      "ALL_MODELS_FAILED",
      `All models failed (${attempts.length}/${models.length} attempted); last error: ${last?.message ?? "unknown"}`,
      attempts,
    );
  }

  private buildMessages(prompt: string): ChatMessage[] {
    const messages: ChatMessage[] = [];
    if (this.systemPrompt) {
      messages.push({ role: "system", content: this.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });
    return messages;
  }

  private async completeWithModel(prompt: string, model: string): Promise<string> {
    const body = await this.upfetch(this.baseUrl, {
      method: "POST",
      body: { model, messages: this.buildMessages(prompt) },
      schema: completionResponseSchema,
      // One timeout signal per attempt, passed straight to fetch.
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const content = body.choices[0]?.message.content ?? "";
    if (!content.trim()) {
      throw new ModelAttemptError(model, "empty_response", "Empty completion in API response");
    }
    return content;
  }

  private classify(model: string, error: unknown): ModelAttemptError {
    if (error instanceof ModelAttemptError) {
      return error;
    }
    if (isResponseError(error)) {
      return statusFailure(model, error.status, error.data);
    }
    if (isValidationError(error)) {
      return new ModelAttemptError(model, "invalid_response", "Failed to parse inference API response", null, {
        cause: error,
      });
    }
    if (isAbort(error)) {
      return new ModelAttemptError(model, "timeout", `Request timed out after ${this.timeoutMs}ms`, null, {
        cause: error,
      });
    }
    if (error instanceof SyntaxError) {
      return new ModelAttemptError(model, "invalid_response", "Inference API returned invalid JSON", null, {
        cause: error,
      });
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new ModelAttemptError(model, "transport", `Failed to send request: ${reason}`, null, {
      cause: error,
    });
  }
}
