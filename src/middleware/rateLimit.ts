import rateLimit from "express-rate-limit";
import { getEnv } from "../config/env.js";

export function createSearchRateLimiter() {
  const env = getEnv();

  return rateLimit({
    windowMs: env.SEARCH_RATE_WINDOW_MS,
    limit: env.SEARCH_RATE_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: "rate_limited",
      message: "Too many searches, please try again later",
      retryInSeconds: Math.ceil(env.SEARCH_RATE_WINDOW_MS / 1000),
    },
    keyGenerator: (req) => {
      const forwarded = req.headers["x-forwarded-for"];
      if (typeof forwarded === "string") {
        const first = forwarded.split(",")[0]?.trim();
        if (first) return first;
      }
      return req.ip ?? "unknown";
    },
  });
}
