export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 53;
export const DEFAULT_INFERENCE_URL = "https://openrouter.ai/api/v1/chat/completions";
export const DEFAULT_MODELS =
  "nvidia/nemotron-nano-9b-v2:free,meituan/longcat-flash-chat:free,minimax/minimax-m2:free";
export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful assistant. Keep responses concise and under 200 words.";
export const DEFAULT_INFERENCE_TIMEOUT_MS = 30_000;
export const DEFAULT_RATE_LIMIT_QPS = 0;
export const DEFAULT_RATE_LIMIT_BURST = 20;
export const DEFAULT_RATE_LIMIT_BLOCK_SECONDS = 10;

// 255 is the character-string ceiling; 250 leaves headroom.
export const MAX_CHUNK_BYTES = 250;
export const MAX_TOTAL_BYTES = 4096;
export const MAX_CHARACTER_STRING_BYTES = 255;
export const ANSWER_TTL_SECONDS = 300;

export const QTYPE = {
  TXT: 16,
} as const;

export const QCLASS = {
  IN: 1,
} as const;

export const OPCODE = {
  QUERY: 0,
} as const;

export const RCODE = {
  NOERROR: 0,
  FORMERR: 1,
  SERVFAIL: 2,
  NOTIMP: 4,
  REFUSED: 5,
} as const;

export type ResponseCode = (typeof RCODE)[keyof typeof RCODE];
