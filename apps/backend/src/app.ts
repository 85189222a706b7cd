import express, { type Express } from "express";
import rateLimit from "express-rate-limit";
import { localhostCors } from "./middleware/cors.js";
import { createErrorHandler, notFound } from "./middleware/errorHandler.js";
import { requestId } from "./middleware/requestId.js";
import type { Logger } from "./logger.js";
import type { ProviderFactory } from "./providers/index.js";
import { mountPromptRoute } from "./routes/prompt.js";
import { mountSummarizeRoute } from "./routes/summarize.js";

export interface AppOptions {
  providers: ProviderFactory;
  logger: Logger;
  rateLimit?: { windowMs: number; limit: number };
}

export function createApp(options: AppOptions): Express {
  const { providers, logger } = options;
  const app = express();

  app.use(requestId);
  app.use(localhostCors());
  app.use(express.json({ limit: "1mb" }));
  app.use(
    rateLimit({
      windowMs: options.rateLimit?.windowMs ?? 60_000,
      limit: options.rateLimit?.limit ?? 30,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: "Too many requests. Try again shortly." }
    })
  );

  const api = express.Router();
  mountSummarizeRoute(api, providers, logger);
  mountPromptRoute(api);

  app.get("/health", (_req, res) => {
    res.json({ ok: true, provider: providers.name });
  });
  app.use("/api", api);
  app.use(notFound);
  app.use(createErrorHandler(logger));

  return app;
}
