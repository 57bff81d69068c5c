import { randomUUID } from "crypto";
import type { ErrorRequestHandler } from "express";
import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import pinoHttp from "pino-http";
import { type HttpError, fromBodyParserError, fromExtractionError, isHttpError } from "../errors";
import { isExtractionError } from "../extraction/errors";

const loggerOptions = (level: string): LoggerOptions => ({
  level,
  redact: {
    paths: ["req.headers.authorization", "req.headers.cookie", "req.body.content"],
    remove: true,
  },
});

export function createLogger(level: string = process.env.LOG_LEVEL || "info", destination?: DestinationStream): Logger {
  return destination ? pino(loggerOptions(level), destination) : pino(loggerOptions(level));
}

export function createHttpLogger(logger: Logger) {
  return pinoHttp({
    logger,
    genReqId(req, res) {
      const headerId = req.headers["x-request-id"];
      const id = typeof headerId === "string" && headerId.trim() ? headerId.trim() : randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },
    customLogLevel(_req, res, err) {
      if (err || res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },
  });
}

function toHttpError(err: unknown): HttpError | null {
  if (isHttpError(err)) return err;
  if (isExtractionError(err)) return fromExtractionError(err);
  return fromBodyParserError(err);
}

export function errorResponder(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const httpError = toHttpError(err);
    if (!httpError) {
      logger.error({ err, requestId: req.id }, "request_error");
      res.status(500).json({ success: false, error: "internal_error", detail: "Internal server error", retryable: false });
      return;
    }
    res.status(httpError.status).json({
      success: false,
      error: httpError.code,
      detail: httpError.message,
      retryable: httpError.retryable,
      ...(httpError.details ? { details: httpError.details } : {}),
    });
  };
}
