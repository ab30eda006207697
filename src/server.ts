import { createApp } from "./app.js";
import { initEnv } from "./config/env.js";
import { buildRecipeServiceConfig } from "./config/serviceConfig.js";
import { RecipeFinder } from "./services/recipeFinder.js";
import { createChildLogger, logger } from "./utils/logger.js";

const env = initEnv();
const config = buildRecipeServiceConfig(env);
const finder = new RecipeFinder(config, { logger: createChildLogger({ component: "recipe-finder" }) });
const app = createApp({ config, finder });

const server = app.listen(env.PORT, () => {
  logger.info({
    msg: "Server started",
    port: env.PORT,
    environment: env.NODE_ENV,
  });
});

function gracefulShutdown(signal: string) {
  logger.info({
    msg: "Graceful shutdown initiated",
    signal,
  });

  server.close((err) => {
    if (err) {
      logger.error({
        msg: "Error during shutdown",
        error: err.message,
      });
      process.exit(1);
    }

    logger.info({
      msg: "Server closed gracefully",
    });
    process.exit(0);
  });

  setTimeout(() => {
    logger.error({
      msg: "Forced shutdown after timeout",
    });
    process.exit(1);
  }, 10000).unref();
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

export default app;
