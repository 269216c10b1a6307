import { join } from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import {
  ANSWER_TTL_SECONDS,
  DEFAULT_HOST,
  DEFAULT_INFERENCE_TIMEOUT_MS,
  DEFAULT_INFERENCE_URL,
  DEFAULT_MODELS,
  DEFAULT_PORT,
  DEFAULT_RATE_LIMIT_BLOCK_SECONDS,
  DEFAULT_RATE_LIMIT_BURST,
  DEFAULT_RATE_LIMIT_QPS,
  DEFAULT_SYSTEM_PROMPT,
  MAX_CHUNK_BYTES,
  MAX_TOTAL_BYTES,
} from "./constants";
import { ConfigurationError } from "./errors";
import type { Configuration } from "./types";

type Env = Record<string, string | undefined>;

const ENV_FILES = [".env.local", ".env"];

const numberFrom = (message: string, min: number, max: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, message)
    .transform(Number)
    .pipe(z.number().int().min(min, message).max(max, message));

const booleanFrom = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const modelList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((model) => model.trim())
      .filter(Boolean),
  )
  .pipe(z.array(z.string()).min(1, "model list cannot be empty"));

const apiKeySchema = z.string().trim().min(1, "environment variable not set");
const urlSchema = z.string().trim().url("must be an absolute URL");
const hostSchema = z.string().trim().min(1, "cannot be empty");
const portSchema = numberFrom("Invalid PORT/DNS_PORT value", 0, 65_535);
const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function read<T extends z.ZodTypeAny>(variable: string, schema: T, raw: string): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(variable, issue?.message ?? "invalid value");
  }
  return result.data;
}

function pick(env: Env, ...names: string[]): { name: string; value: string } | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value !== "") return { name, value };
  }
  return undefined;
}

function readOr<T extends z.ZodTypeAny>(
  env: Env,
  names: string[],
  schema: T,
  fallback: string,
): z.infer<T> {
  const found = pick(env, ...names);
  return read(found?.name ?? names[0] ?? "", schema, found?.value ?? fallback);
}

/**
 * Builds the gateway configuration from environment variables.
 * `PORT` and `HOST` take precedence over `DNS_PORT` and `DNS_ADDRESS`.
 */
export function loadConfiguration(env: Env = process.env): Configuration {
  // An explicitly empty model list is an error rather than a request for the defaults.
  const models: string[] = read("OPENROUTER_MODEL", modelList, env.OPENROUTER_MODEL ?? DEFAULT_MODELS);

  return Object.freeze({
    apiKey: read("OPENROUTER_API_KEY", apiKeySchema, env.OPENROUTER_API_KEY ?? ""),
    models: Object.freeze(models),
    baseUrl: readOr(env, ["OPENROUTER_BASE_URL"], urlSchema, DEFAULT_INFERENCE_URL),
    systemPrompt: env.SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    timeoutMs: readOr(
      env,
      ["INFERENCE_TIMEOUT_MS"],
      numberFrom("INFERENCE_TIMEOUT_MS must be a whole number", 1, 600_000),
      String(DEFAULT_INFERENCE_TIMEOUT_MS),
    ),
    stopOnAuthError: readOr(env, ["INFERENCE_STOP_ON_AUTH_ERROR"], booleanFrom, "false"),
    host: readOr(env, ["HOST", "DNS_ADDRESS"], hostSchema, DEFAULT_HOST),
    port: readOr(env, ["PORT", "DNS_PORT"], portSchema, String(DEFAULT_PORT)),
    logLevel: readOr(env, ["LOG_LEVEL"], logLevelSchema, "info"),
    production: env.NODE_ENV === "production",
    maxChunkBytes: MAX_CHUNK_BYTES,
    maxTotalBytes: MAX_TOTAL_BYTES,
    answerTtl: ANSWER_TTL_SECONDS,
    rateLimit: Object.freeze({
      qps: readOr(
        env,
        ["DNS_RATE_LIMIT_QPS"],
        numberFrom("DNS_RATE_LIMIT_QPS must be a whole number", 0, 1_000_000),
        String(DEFAULT_RATE_LIMIT_QPS),
      ),
      burst: readOr(
        env,
        ["DNS_RATE_LIMIT_BURST"],
        numberFrom("DNS_RATE_LIMIT_BURST must be a whole number", 1, 1_000_000),
        String(DEFAULT_RATE_LIMIT_BURST),
      ),
      blockSeconds: readOr(
        env,
        ["DNS_RATE_LIMIT_BLOCK_SECONDS"],
        numberFrom("DNS_RATE_LIMIT_BLOCK_SECONDS must be a whole number", 0, 86_400),
        String(DEFAULT_RATE_LIMIT_BLOCK_SECONDS),
      ),
    }),
  });
}

/**
 * Loads `.env.local`, then `.env`, from `directory`. Missing files are skipped.
 * Values already present in the target win, and `.env.local` wins over `.env`.
 * Writes to `process.env` unless another target is given.
 */
export function loadEnvFiles(directory = process.cwd(), target?: Record<string, string>): void {
  const path = ENV_FILES.map((file) => join(directory, file));
  loadDotenv(target ? { path, processEnv: target } : { path });
}

/** Shows the first 8 characters of a key, or only asterisks when it is shorter. */
export function maskApiKey(key: string): string {
  const visible = 8;
  if (key.length <= visible) {
    return "*".repeat(key.length);
  }
  return `${key.slice(0, visible)}...***`;
}
