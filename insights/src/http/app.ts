import type { Logger } from "@rentdash/shared-utils";
import cors from "cors";
import express, { type Express } from "express";
import helmet from "helmet";
import { createDispatcher, type ActionDispatcher } from "../core/dispatch";
import type { AnalyzerDeps } from "../core/ports";
import { InsightsMiddleware } from "./middleware";
import { InsightsRoutes } from "./routes";

export type AppOptions = {
  deps: AnalyzerDeps;
  dispatcher?: ActionDispatcher;
  corsOrigins?: string[];
  exposeErrors?: boolean;
};

export function createApp(options: AppOptions): Express {
  const { deps } = options;
  const logger: Logger = deps.logger;
  const dispatcher = options.dispatcher ?? createDispatcher(deps);
  const middleware = new InsightsMiddleware(logger, options.exposeErrors ?? false);
  const routes = new InsightsRoutes(dispatcher, deps, middleware, logger);

  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS middleware
  app.use(
    cors({
      origin: options.corsOrigins ?? [],
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    })
  );

  app.use(express.json({ limit: "1mb" }));
  app.use(middleware.requestLogger());

  app.use(routes.getRouter());

  app.use(middleware.notFoundHandler());
  app.use(middleware.errorHandler());

  return app;
}
