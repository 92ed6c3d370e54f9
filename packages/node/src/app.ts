/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { BankService } from "./services/bank-service.js";
import type { BankServiceConfig } from "./services/bank-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { callerMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createBankRoutes } from "./routes/bank.js";
import { createDepositRoutes, createWithdrawalRoutes } from "./routes/transfers.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createPriceRoutes } from "./routes/price.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** A ready service, or the configuration to build one */
  readonly service: BankService | BankServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Auth configuration. When provided, every API request needs an API key. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: BankService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service =
    options.service instanceof BankService ? options.service : new BankService(options.service);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", callerMiddleware(options.auth));

  app.route("/api/v1/bank", createBankRoutes());
  app.route("/api/v1/deposits", createDepositRoutes());
  app.route("/api/v1/withdrawals", createWithdrawalRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/price", createPriceRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
