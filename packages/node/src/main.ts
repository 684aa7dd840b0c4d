/**
 * @rxsettle/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  if (config.ENABLE_FAUCET && config.NODE_ENV === "production") {
    logger.warn("Faucet enabled in production");
  }

  const { app } = createApp({
    serviceConfig: {
      applicationId: config.SETTLEMENT_APP_ID,
      escrowAddress: config.ESCROW_ADDRESS,
      assetId: config.SETTLEMENT_ASSET,
      adminFeeBps: config.ADMIN_FEE_BPS,
      authorization: {
        minimumStake: config.MIN_ORACLE_STAKE,
        oracle: config.ORACLE_ADDRESS,
        stakeRecipient: config.STAKE_RECIPIENT,
      },
    },
    logger,
    enableFaucet: config.ENABLE_FAUCET,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, assetDecimals: config.ASSET_DECIMALS },
    "Settlement node started",
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err !== undefined) reject(err);
        else resolve();
      });
    });
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
