/**
 * @keelway/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Re-exports (package public API)
// =============================================================================

export { GatewayService } from "./services/gateway-service.js";
export type { GatewayServiceConfig, SettlementLogger } from "./services/gateway-service.js";
export { loadConfig, parseAddressList, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  if (config.API_KEYS.size === 0) {
    logger.warn("No API keys configured; every /api route is open");
  }
  if (config.BURN_SIGNERS.length === 0) {
    logger.warn("No burn signers configured; every burn will be refused");
  }
  if (config.ATTESTATION_SIGNERS.length === 0) {
    logger.warn("No attestation signers configured; every mint will be refused");
  }

  const { app, service } = createApp({
    serviceConfig: {
      localDomain: config.LOCAL_DOMAIN,
      walletAddress: config.WALLET_ADDRESS,
      minterAddress: config.MINTER_ADDRESS,
      feeRecipient: config.FEE_RECIPIENT,
      withdrawalDelay: config.WITHDRAWAL_DELAY_BLOCKS,
      startBlock: config.START_BLOCK,
      burnSigners: config.BURN_SIGNERS,
      attestationSigners: config.ATTESTATION_SIGNERS,
      supportedTokens: config.SUPPORTED_TOKENS,
    },
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    settlementLogger: logger.child({ component: "settlement" }),
    ...(config.API_KEYS.size > 0 ? { auth: { apiKeys: config.API_KEYS } } : {}),
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      localDomain: config.LOCAL_DOMAIN,
      wallet: config.WALLET_ADDRESS,
      minter: config.MINTER_ADDRESS,
      secured: config.API_KEYS.size > 0,
    },
    "Keelway node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Server did not close cleanly");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
