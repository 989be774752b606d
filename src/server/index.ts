import { serve } from "@hono/node-server";
import { Hono } from "hono";

import type { SettingsRepository } from "@/lib/db/ports";
import { type Logger, toError } from "@/lib/logger";
import type { AccountService } from "@/worker/accounts";
import type { GroupRegistry } from "@/worker/group-registry";
import type { SyncService } from "@/worker/sync";
import type { TransferEngine } from "@/worker/transfers";

import { toErrorResponse } from "./errors";
import { createAccountsRoute } from "./routes/accounts";
import { createHealthRoute } from "./routes/health";
import { createPartitionsRoute } from "./routes/partitions";
import { createSettingsRoute } from "./routes/settings";
import { createSyncRoute } from "./routes/sync";
import { createTransfersRoute } from "./routes/transfers";

export interface AppDeps {
  logger: Logger;
  /** Database liveness check */
  ping: () => Promise<void>;
  sync: SyncService;
  transfers: TransferEngine;
  accounts: AccountService;
  registry: GroupRegistry;
  settings: SettingsRepository;
}

export interface ServerDeps extends AppDeps {
  port: number;
}

export interface HttpServer {
  port: number;
  close: () => Promise<void>;
}

export const createApp = (deps: AppDeps): Hono => {
  const logger = deps.logger.child({ component: "http" });
  const app = new Hono();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    logger.info("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });

  app.onError((error, c) => {
    const response = toErrorResponse(error);
    if (response) {
      return c.json(response.body, response.status);
    }
    logger.error("Unhandled request error", toError(error), {
      method: c.req.method,
      path: c.req.path,
    });
    return c.json({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } }, 500);
  });

  app.notFound((c) => c.json({ error: { code: "NOT_FOUND", message: `No route for ${c.req.path}` } }, 404));

  // Routes
  app.get("/", (c) => c.json({ message: "Points Ledger Sync API" }));
  app.route("/health", createHealthRoute({ ping: deps.ping }));
  app.route("/sync", createSyncRoute(deps.sync));
  app.route("/transfers", createTransfersRoute(deps.transfers));
  app.route("/accounts", createAccountsRoute({ accounts: deps.accounts, transfers: deps.transfers }));
  app.route("/partitions", createPartitionsRoute(deps.registry));
  app.route("/settings", createSettingsRoute(deps.settings));

  return app;
};

export const startHttpServer = async (deps: ServerDeps): Promise<HttpServer> => {
  const app = createApp(deps);

  const server = serve(
    {
      fetch: app.fetch,
      port: deps.port,
    },
    (info) => {
      deps.logger.info(`HTTP server listening on port ${info.port}`);
    },
  );

  return {
    port: deps.port,
    close: async (): Promise<void> => {
      return new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          deps.logger.info("HTTP server closed");
          resolve();
        });
      });
    },
  };
};
