import express from "express";
import type { Server } from "http";
import { setupAuth } from "./auth";
import { registerRoutes, type AppServices } from "./routes";
import { createErrorHandler } from "./middleware/errorHandler";
import { requestLogger } from "./middleware/requestLogger";

export interface AppOptions {
  sessionSecret: string;
  secureCookies: boolean;
  exposeStack: boolean;
}

/** Builds the Express app with auth, routes and the error handler, wrapped in an unstarted HTTP server. */
export function createApp(services: AppServices, options: AppOptions): Server {
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use(requestLogger());

  setupAuth(app, {
    storage: services.storage,
    accounts: services.accounts,
    sessionSecret: options.sessionSecret,
    secureCookies: options.secureCookies,
  });

  const server = registerRoutes(app, services);
  app.use(createErrorHandler({ exposeStack: options.exposeStack }));

  return server;
}
