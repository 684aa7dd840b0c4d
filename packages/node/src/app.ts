/**
 * Application factory: one ClearinghouseService behind the HTTP routes.
 * main.ts adds the server; tests drive the returned app in process.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { ClearinghouseService } from "./services/clearinghouse-service.js";
import type { ClearinghouseServiceConfig } from "./services/clearinghouse-service.js";
import { handleError, loggerMiddleware, requestIdMiddleware } from "./middleware/index.js";
import {
  createAccountRoutes,
  createAuditRoutes,
  createClaimRoutes,
  createEscrowRoutes,
  createGroupRoutes,
  createHealthRoutes,
  createRebateRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: ClearinghouseServiceConfig;
  /** Request logger. When omitted, requests are not logged. */
  readonly logger?: Logger | undefined;
  /** Expose POST /api/v1/accounts/:address/fund. Default: false */
  readonly enableFaucet?: boolean | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ClearinghouseService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new ClearinghouseService({
    ...options.serviceConfig,
    logger: options.serviceConfig.logger ?? options.logger,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/api/v1/claims", createClaimRoutes());
  app.route("/api/v1/rebates", createRebateRoutes());
  app.route("/api/v1/groups", createGroupRoutes());
  app.route("/api/v1/escrow", createEscrowRoutes());
  app.route("/api/v1/accounts", createAccountRoutes({ enableFaucet: options.enableFaucet ?? false }));
  app.route("/api/v1/audit", createAuditRoutes());

  return { app, service };
}
