import { Router } from "express";
import { getEnv } from "../config/env.js";
import type { RecipeServiceConfig } from "../config/serviceConfig.js";

export function createHealthRouter(config: RecipeServiceConfig): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    const env = getEnv();

    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: env.NODE_ENV,
      memory: {
        used: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
        total: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
      },
      sources: {
        recipeApi: Boolean(config.credentials.spoonacularApiKey),
        restaurants: Boolean(config.credentials.yelpApiKey),
        recipeSite: true,
      },
      version: process.env.npm_package_version ?? "0.1.0",
    });
  });

  router.get("/health/ready", (_req, res) => {
    res.json({
      ready: Boolean(config.credentials.spoonacularApiKey),
      timestamp: new Date().toISOString(),
    });
  });

  router.get("/health/live", (_req, res) => {
    res.json({
      alive: true,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
