import { Request, Response, NextFunction } from "express";
import { config } from "../config/config";
import {
  AssemblyError,
  EncodingError,
  ErrorDetail,
  ShDataError,
  ValidationError,
} from "../errors/shData.errors";
import logger from "../utils/logger";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

interface ErrorResponseBody {
  error: string;
  path: string;
  code?: string;
  details?: ErrorDetail[];
  stack?: string;
}

const statusFor = (err: Error): number => {
  if (err instanceof AppError) return err.statusCode;
  if (err instanceof ValidationError) return 400;
  if (err instanceof EncodingError) return 422;
  if (err instanceof AssemblyError) return 500;
  return 500;
};

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  const statusCode = statusFor(err);
  const message = err.message || "Internal Server Error";

  const meta = {
    error: message,
    path: req.path,
    method: req.method,
    requestId: req.id,
    statusCode,
  };
  if (statusCode >= 500) {
    logger.error("Error handler caught exception", { ...meta, stack: err.stack });
  } else {
    logger.warn("Request rejected", meta);
  }

  const response: ErrorResponseBody = {
    error: message,
    path: req.path,
  };

  if (err instanceof ShDataError) {
    response.code = err.code;
    response.details = err.details;
  }

  if (config.NODE_ENV === "development") {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: "Route not found",
    path: req.path,
  });
};
