import type { LevelWithSilent } from "pino";

export type RateLimitSettings = {
  qps: number;
  burst: number;
  blockSeconds: number;
};

export type Configuration = Readonly<{
  apiKey: string;
  models: readonly string[];
  baseUrl: string;
  systemPrompt: string;
  timeoutMs: number;
  stopOnAuthError: boolean;
  host: string;
  port: number;
  logLevel: LevelWithSilent;
  production: boolean;
  maxChunkBytes: number;
  maxTotalBytes: number;
  answerTtl: number;
  rateLimit: Readonly<RateLimitSettings>;
}>;

export type QuestionContext = {
  id: number;
  flags: number;
  qtype: number;
  qclass: number;
  labels: string[];
  questionSection: Uint8Array;
};

export type DnsQuery = QuestionContext & {
  prompt: string;
};

export type ChunkSet = readonly Uint8Array[];

export type CompletionResult = {
  model: string;
  text: string;
};
