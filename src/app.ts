import express from "express";
import type { RecipeServiceConfig } from "./config/serviceConfig.js";
import { createHelmet } from "./middleware/helmet.js";
import { createCors } from "./middleware/cors.js";
import { createSearchRateLimiter } from "./middleware/rateLimit.js";
import { errorHandler, notFoundHandler } from "./middleware/error.js";
import { logRequest, logResponse } from "./utils/logger.js";
import { createHealthRouter } from "./routes/health.js";
import { createV1Router } from "./routes/v1/index.js";
import type { RecipeFinder } from "./services/recipeFinder.js";

declare global {
  namespace Express {
    interface Request {
      requestTime?: number;
    }
  }
}

export type AppDeps = {
  config: RecipeServiceConfig;
  finder: RecipeFinder;
};

export function createApp({ config, finder }: AppDeps) {
  const app = express();

  app.use(express.json({ limit: "32kb" }));

  app.use(createHelmet());
  app.use(createCors());

  app.use((req, res, next) => {
    req.requestTime = Date.now();
    logRequest(req);
    const done = logResponse(req);
    res.on("finish", () => done(res.statusCode, Date.now() - (req.requestTime ?? Date.now())));
    next();
  });

  app.use(createHealthRouter(config));
  app.use("/api/v1", createSearchRateLimiter(), createV1Router(finder, config.catalog));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
