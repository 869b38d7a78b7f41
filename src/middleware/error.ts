import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { logger } from "../utils/logger.js";

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code?: string;

  constructor(message: string, statusCode: number, code?: string) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function missingInputError(message: string): AppError {
  return new AppError(message, 400, "missing_input");
}

export function recipeNotFoundError(message: string): AppError {
  return new AppError(message, 404, "recipe_not_found");
}

export function invalidQueryError(message: string): AppError {
  return new AppError(message, 400, "invalid_query");
}

type BodyParserError = Error & { status: number; expose: boolean; type?: unknown };

const BODY_ERROR_CODES: Record<number, string> = {
  413: "payload_too_large",
  415: "unsupported_media_type",
};

/** http-errors raised by express.json() carry a status and an expose flag. */
function isBodyParserError(err: Error): err is BodyParserError {
  return (
    "status" in err &&
    typeof err.status === "number" &&
    "expose" in err &&
    typeof err.expose === "boolean"
  );
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof ZodError) {
    logger.warn({
      msg: "Validation error",
      errors: err.errors,
    });

    return res.status(400).json({
      error: "validation_error",
      message: "Invalid request data",
      details: err.errors.map((e) => ({
        path: e.path.join("."),
        message: e.message,
      })),
    });
  }

  // Raised by express.json() for a body it cannot parse.
  if (err instanceof SyntaxError && "body" in err) {
    logger.warn({
      msg: "Malformed JSON body",
      message: err.message,
    });

    return res.status(400).json({
      error: "invalid_json",
      message: "Request body is not valid JSON",
    });
  }

  if (isBodyParserError(err) && err.expose && err.status >= 400 && err.status < 500) {
    logger.warn({
      msg: "Rejected request body",
      statusCode: err.status,
      type: err.type,
      message: err.message,
    });

    return res.status(err.status).json({
      error: BODY_ERROR_CODES[err.status] ?? "bad_request",
      message: err.message,
    });
  }

  if (err instanceof AppError) {
    logger.warn({
      msg: "Operational error",
      code: err.code,
      statusCode: err.statusCode,
      message: err.message,
    });

    return res.status(err.statusCode).json({
      error: err.code ?? "error",
      message: err.message,
    });
  }

  logger.error({
    msg: "Internal server error",
    error: err.message,
    stack: err.stack,
  });

  res.status(500).json({
    error: "internal_error",
    message: "An unexpected error occurred",
  });
}

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({
    error: "not_found",
    message: "The requested resource was not found",
  });
}
