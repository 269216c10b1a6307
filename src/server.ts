import dgram, { type RemoteInfo, type Socket } from "node:dgram";
import { type AddressInfo, isIPv6 } from "node:net";
import { byteLength, chunk } from "./chunker";
import { RCODE } from "./constants";
import { buildErrorResponse, buildSuccessResponse, decodeQuery } from "./dns-codec";
import { InferenceError } from "./errors";
import type { Completer } from "./inference-client";
import { describeError, type Logger } from "./logger";
import type { RateLimiter } from "./rate-limiter";
import type { Configuration } from "./types";

/** Everything a request needs. Shared by all in-flight requests and never mutated. */
export type GatewayContext = Readonly<{
  config: Configuration;
  completer: Completer;
  logger: Logger;
  limiter?: RateLimiter | null;
}>;

export type GatewayServer = {
  address: AddressInfo;
  close: () => Promise<void>;
};

/**
 * Runs one datagram through decode, inference, chunking and encoding.
 * Resolves to the reply, or to null when the packet is too broken to answer.
 */
export async function handlePacket(
  context: GatewayContext,
  packet: Uint8Array,
  address: string,
): Promise<Uint8Array | null> {
  const { config, completer, logger, limiter } = context;
  const decoded = decodeQuery(packet);

  const id = decoded.ok ? decoded.query.id : decoded.error.id;
  if (id === null) {
    logger.warn("Dropping unreadable packet", { from: address, bytes: packet.length });
    return null;
  }

  if (limiter && !limiter.allow(address)) {
    logger.debug("Rate limited", { from: address });
    return buildErrorResponse(id, RCODE.REFUSED, decoded.ok ? decoded.query : decoded.error.question);
  }

  if (!decoded.ok) {
    const { error } = decoded;
    logger.warn("Rejected query", { from: address, kind: error.kind, rcode: error.rcode, error: error.message });
    return buildErrorResponse(id, error.rcode, error.question);
  }

  const { query } = decoded;
  logger.debug("Processing query", { from: address, prompt: query.prompt });

  try {
    const result = await completer.complete(query.prompt, config.models);
    const chunks = chunk(result.text, config.maxChunkBytes, config.maxTotalBytes);
    logger.info("Answered query", {
      from: address,
      prompt: query.prompt,
      model: result.model,
      bytes: byteLength(result.text),
      chunks: chunks.length,
    });
    return buildSuccessResponse(query, chunks, config.answerTtl);
  } catch (error) {
    if (error instanceof InferenceError) {
      logger.error("Inference failed", {
        from: address,
        prompt: query.prompt,
        code: error.code,
        attempts: error.attempts.map((attempt) => `${attempt.model}: ${attempt.message}`),
      });
    } else {
      logger.error("Response build failed", { from: address, ...describeError(error) });
    }
    return buildErrorResponse(id, RCODE.SERVFAIL, query);
  }
}

async function reply(socket: Socket, context: GatewayContext, message: Buffer, remote: RemoteInfo) {
  const { logger } = context;
  try {
    const response = await handlePacket(context, message, remote.address);
    if (!response) return;
    socket.send(response, remote.port, remote.address, (error) => {
      if (error) {
        logger.error("Failed to send reply", { to: remote.address, ...describeError(error) });
      }
    });
  } catch (error) {
    logger.error("Failed to handle query", { from: remote.address, ...describeError(error) });
  }
}

/**
 * Binds the UDP socket and answers every datagram independently: a slow
 * inference call for one client never holds up another.
 */
export function startServer(context: GatewayContext): Promise<GatewayServer> {
  const { config, logger } = context;
  const socket = dgram.createSocket(isIPv6(config.host) ? "udp6" : "udp4");

  socket.on("message", (message, remote) => {
    void reply(socket, context, message, remote);
  });

  return new Promise<GatewayServer>((resolve, reject) => {
    socket.once("error", reject);
    socket.bind(config.port, config.host, () => {
      socket.removeListener("error", reject);
      socket.on("error", (error) => {
        logger.error("UDP socket error", describeError(error));
      });

      const address = socket.address();
      logger.info(`DNS server listening on udp://${address.address}:${address.port}`);
      resolve({
        address,
        close: () =>
          new Promise<void>((done) => {
            socket.close(() => done());
          }),
      });
    });
  });
}
