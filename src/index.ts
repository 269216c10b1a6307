import { loadConfiguration, loadEnvFiles, maskApiKey } from "./config";
import { InferenceClient } from "./inference-client";
import { createLogger, describeError } from "./logger";
import { RateLimiter } from "./rate-limiter";
import { startServer } from "./server";

async function main() {
  loadEnvFiles();
  const config = loadConfiguration();
  const logger = createLogger("dns-llm-gateway", {
    level: config.logLevel,
    pretty: !config.production,
  });

  logger.info("Configuration loaded", {
    endpoint: config.baseUrl,
    apiKey: maskApiKey(config.apiKey),
    models: config.models,
    timeoutMs: config.timeoutMs,
    stopOnAuthError: config.stopOnAuthError,
    rateLimitQps: config.rateLimit.qps,
  });

  const completer = new InferenceClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    systemPrompt: config.systemPrompt,
    timeoutMs: config.timeoutMs,
    stopOnAuthError: config.stopOnAuthError,
    logger: logger.child("inference"),
  });
  const limiter = config.rateLimit.qps > 0 ? new RateLimiter(config.rateLimit) : null;

  const server = await startServer(
    Object.freeze({ config, completer, limiter, logger: logger.child("server") }),
  );

  logger.info(`Try: dig @127.0.0.1 -p ${server.address.port} 'what is rust' TXT +time=30 +short`);

  const shutdown = () => {
    logger.info("Shutting down DNS server...");
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Failed to close socket", describeError(error));
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("Failed to start DNS server:", error);
  process.exit(1);
});
