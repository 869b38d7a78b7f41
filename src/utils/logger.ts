import pino from "pino";
import { getEnv } from "../config/env.js";

const env = getEnv();

export const logger = pino({
  level: env.LOG_LEVEL,
  transport: env.LOG_PRETTY
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

type LoggedRequest = {
  method: string;
  originalUrl: string;
  ip?: string;
  headers: Record<string, unknown>;
  body?: unknown;
};

/** Fields shared by the request and response lines. Ingredient lists are logged by size only. */
export function requestLogFields(req: LoggedRequest) {
  return {
    method: req.method,
    path: req.originalUrl,
    ingredientCount: countIngredients(req.body),
  };
}

export function logRequest(req: LoggedRequest) {
  logger.info({
    msg: "Incoming request",
    ...requestLogFields(req),
    ip: req.ip,
    userAgent: req.headers["user-agent"],
  });
}

export function logResponse(req: LoggedRequest) {
  const fields = requestLogFields(req);
  return (statusCode: number, responseTime: number) => {
    const level = statusCode >= 500 ? "error" : statusCode >= 400 ? "warn" : "info";
    logger[level]({
      msg: "Request completed",
      ...fields,
      statusCode,
      responseTimeMs: responseTime,
    });
  };
}

function countIngredients(body: unknown): number | undefined {
  if (typeof body !== "object" || body === null || !("ingredients" in body)) {
    return undefined;
  }
  return Array.isArray(body.ingredients) ? body.ingredients.length : undefined;
}
