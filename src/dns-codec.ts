import {
  ANSWER_TTL_SECONDS,
  MAX_CHARACTER_STRING_BYTES,
  OPCODE,
  QCLASS,
  QTYPE,
  RCODE,
  type ResponseCode,
} from "./constants";
import { DecodeError } from "./errors";
import type { ChunkSet, DnsQuery, QuestionContext } from "./types";

const textDecoder = new TextDecoder();

const HEADER_LENGTH = 12;
// Pointer to the question name, which always starts right after the header.
const QUESTION_NAME_POINTER = 0xc000 | HEADER_LENGTH;

export type DecodeResult = { ok: true; query: DnsQuery } | { ok: false; error: DecodeError };

export type EncodeOptions = {
  ttl?: number;
};

function u16(view: DataView, offset: number) {
  return view.getUint16(offset, false);
}

function writeU16(buf: Uint8Array, offset: number, value: number) {
  buf[offset] = (value >> 8) & 0xff;
  buf[offset + 1] = value & 0xff;
}

function writeU32(buf: Uint8Array, offset: number, value: number) {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

function decodeLabels(bytes: Uint8Array, start: number): { labels: string[]; next: number } {
  let offset = start;
  let jumped = false;
  let jumpNext = 0;
  const labels: string[] = [];
  let guard = 0;

  while (guard++ < 200) {
    if (offset >= bytes.length) {
      throw new Error("Name decode out of range");
    }

    const len = bytes[offset];
    if (len === 0) {
      offset += 1;
      break;
    }

    if ((len & 0xc0) === 0xc0) {
      if (offset + 1 >= bytes.length) {
        throw new Error("Compression pointer out of range");
      }
      const ptr = ((len & 0x3f) << 8) | bytes[offset + 1];
      if (!jumped) {
        jumpNext = offset + 2;
        jumped = true;
      }
      offset = ptr;
      continue;
    }

    if ((len & 0xc0) !== 0) {
      throw new Error(`Unsupported label type 0x${len.toString(16)}`);
    }

    const labelEnd = offset + 1 + len;
    if (labelEnd > bytes.length) {
      throw new Error("Label out of range");
    }
    labels.push(textDecoder.decode(bytes.subarray(offset + 1, labelEnd)));
    offset = labelEnd;
  }

  if (guard > 200) {
    throw new Error("Name decode guard reached");
  }

  return { labels, next: jumped ? jumpNext : offset };
}

/**
 * Dots between labels become single spaces, hyphens stay as they are, and
 * the result is lowercased and trimmed.
 */
export function labelsToPrompt(labels: readonly string[]): string {
  return labels.join(" ").toLowerCase().trim();
}

export function decodeQuery(query: Uint8Array): DecodeResult {
  const fail = (error: DecodeError): DecodeResult => ({ ok: false, error });

  if (query.length < HEADER_LENGTH) {
    const id = query.length >= 2 ? (query[0] << 8) | query[1] : null;
    return fail(DecodeError.malformed(`Packet too short (${query.length} bytes)`, id));
  }

  const view = new DataView(query.buffer, query.byteOffset, query.byteLength);
  const id = u16(view, 0);
  const flags = u16(view, 2);
  const qdcount = u16(view, 4);

  const qr = (flags >> 15) & 1;
  if (qr !== 0) {
    return fail(DecodeError.malformed("Packet is a response, not a query", id));
  }
  if (qdcount !== 1) {
    return fail(DecodeError.malformed(`Expected one question, got ${qdcount}`, id));
  }

  let labels: string[];
  let next: number;
  try {
    ({ labels, next } = decodeLabels(query, HEADER_LENGTH));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(DecodeError.malformed(reason, id));
  }
  if (next + 4 > query.length) {
    return fail(DecodeError.malformed("Question truncated before QTYPE/QCLASS", id));
  }

  const question: QuestionContext = {
    id,
    flags,
    qtype: u16(view, next),
    qclass: u16(view, next + 2),
    labels,
    questionSection: query.slice(HEADER_LENGTH, next + 4),
  };

  const opcode = (flags >> 11) & 0x0f;
  if (opcode !== OPCODE.QUERY) {
    return fail(DecodeError.unsupported(`Unsupported opcode ${opcode}`, question));
  }
  if (question.qclass !== QCLASS.IN) {
    return fail(DecodeError.unsupported(`Unsupported class ${question.qclass}`, question));
  }
  if (question.qtype !== QTYPE.TXT) {
    return fail(DecodeError.unsupported(`Unsupported type ${question.qtype}`, question));
  }

  const prompt = labelsToPrompt(labels);
  if (!prompt) {
    return fail(DecodeError.unsupported("Empty prompt", question, RCODE.REFUSED));
  }

  return { ok: true, query: { ...question, prompt } };
}

function encodeTxtRdata(chunks: ChunkSet): Uint8Array {
  const total = chunks.reduce((sum, part) => sum + 1 + part.length, 0);
  const rdata = new Uint8Array(total);
  let offset = 0;
  for (const part of chunks) {
    if (part.length > MAX_CHARACTER_STRING_BYTES) {
      throw new RangeError(`TXT character-string too long (${part.length} bytes)`);
    }
    rdata[offset] = part.length;
    rdata.set(part, offset + 1);
    offset += 1 + part.length;
  }
  return rdata;
}

/**
 * Builds a response to `id`. The question is echoed when known; `chunks`, if
 * given, becomes the single TXT answer.
 */
export function encodeResponse(
  id: number,
  question: QuestionContext | null,
  chunks: ChunkSet | null,
  rcode: ResponseCode,
  options: EncodeOptions = {},
): Uint8Array {
  const answerParts: Uint8Array[] = [];
  if (chunks && question) {
    const rdata = encodeTxtRdata(chunks);
    const rrHeader = new Uint8Array(12);
    writeU16(rrHeader, 0, QUESTION_NAME_POINTER);
    writeU16(rrHeader, 2, QTYPE.TXT);
    writeU16(rrHeader, 4, QCLASS.IN);
    writeU32(rrHeader, 6, options.ttl ?? ANSWER_TTL_SECONDS);
    writeU16(rrHeader, 10, rdata.length);
    answerParts.push(rrHeader, rdata);
  }

  const rd = question ? (question.flags >> 8) & 1 : 0;
  const respFlags =
    (1 << 15) | // QR
    (0 << 11) | // OPCODE
    (1 << 10) | // AA
    (0 << 9) | // TC
    (rd << 8) | // RD copied
    (0 << 7) | // RA
    (rcode & 0x0f);

  const questionSection = question?.questionSection ?? new Uint8Array(0);

  const header = new Uint8Array(HEADER_LENGTH);
  writeU16(header, 0, id);
  writeU16(header, 2, respFlags);
  writeU16(header, 4, question ? 1 : 0);
  writeU16(header, 6, answerParts.length > 0 ? 1 : 0);
  writeU16(header, 8, 0);
  writeU16(header, 10, 0);

  const totalLength =
    header.length +
    questionSection.length +
    answerParts.reduce((sum, part) => sum + part.length, 0);

  const out = new Uint8Array(totalLength);
  let offset = 0;
  out.set(header, offset);
  offset += header.length;
  out.set(questionSection, offset);
  offset += questionSection.length;
  for (const part of answerParts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function buildSuccessResponse(query: DnsQuery, chunks: ChunkSet, ttl?: number): Uint8Array {
  return encodeResponse(query.id, query, chunks, RCODE.NOERROR, { ttl });
}

export function buildErrorResponse(
  id: number,
  rcode: ResponseCode,
  question: QuestionContext | null = null,
): Uint8Array {
  return encodeResponse(id, question, null, rcode);
}
