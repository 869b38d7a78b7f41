import rateLimit from "express-rate-limit";
import { getEnv } from "../config/env.js";

export function createRateLimiter() {
  const env = getEnv();

  return rateLimit({
    windowMs: env.RECIPE_SEARCH_RATE_WINDOW_MS,
    limit: env.RECIPE_SEARCH_RATE_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: "rate_limited",
      message: "Too many requests, please try again later",
      retryInSeconds: Math.ceil(env.RECIPE_SEARCH_RATE_WINDOW_MS / 1000),
    },
  });
}
