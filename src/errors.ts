import { RCODE, type ResponseCode } from "./constants";
import type { QuestionContext } from "./types";

export type DecodeErrorKind = "malformed" | "unsupported";

/**
 * A query the codec could not turn into a prompt. `rcode` is what the reply
 * should carry; `id` is absent when not even the header could be read.
 */
export class DecodeError extends Error {
  override readonly name = "DecodeError";

  constructor(
    readonly kind: DecodeErrorKind,
    message: string,
    readonly rcode: ResponseCode,
    readonly id: number | null,
    readonly question: QuestionContext | null = null,
  ) {
    super(message);
  }

  static malformed(message: string, id: number | null) {
    return new DecodeError("malformed", message, RCODE.FORMERR, id);
  }

  static unsupported(message: string, question: QuestionContext, rcode: ResponseCode = RCODE.NOTIMP) {
    return new DecodeError("unsupported", message, rcode, question.id, question);
  }
}

export type AttemptFailureKind =
  | "rate_limited"
  | "server_error"
  | "client_error"
  | "timeout"
  | "transport"
  | "invalid_response"
  | "empty_response";

export class ModelAttemptError extends Error {
  override readonly name = "ModelAttemptError";

  constructor(
    readonly model: string,
    readonly kind: AttemptFailureKind,
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  get isAuthFailure() {
    return this.status === 401 || this.status === 403;
  }
}

export type InferenceErrorCode =
  | "EMPTY_PROMPT"
  | "NO_MODELS"
  | "MISSING_API_KEY"
  | "ALL_MODELS_FAILED";

export class InferenceError extends Error {
  override readonly name = "InferenceError";

  constructor(
    readonly code: InferenceErrorCode,
    message: string,
    readonly attempts: readonly ModelAttemptError[] = [],
  ) {
    super(message, { cause: attempts.at(-1) });
  }
}

export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";

  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
  }
}
