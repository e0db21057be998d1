import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import { logError } from "./logger";

export interface AppError extends Error {
  statusCode?: number;
  code?: string | number;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * A recognized event is missing a field required to process it
 * (e.g. a mention with no resolvable thread).
 */
export class PreconditionError extends Error implements AppError {
  statusCode = 422;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export class PersistenceError extends Error implements AppError {
  statusCode = 500;
  isOperational = true;
  path: string;
  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "PersistenceError";
    this.path = path;
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  code?: string | number;
  constructor(service: string, message: string, code?: string | number) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
    this.code = code;
  }
}

export class ConfigurationError extends Error implements AppError {
  statusCode = 500;
  isOperational = false;
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

function readStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("statusCode" in error)) {
    return undefined;
  }
  return typeof error.statusCode === "number" ? error.statusCode : undefined;
}

function readCode(error: unknown): string | number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
    return error.code;
  }
  // openai SDK errors expose the HTTP status as `status`
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  return readStatusCode(error);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  return readStatusCode(error) ?? 500;
}

export function handleRouteError(res: Pick<Response, "status" | "json">, error: unknown, context?: string): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    logError(`[${context}] ${message}`, {
      stack: error instanceof Error ? error.stack : undefined,
    });
  }

  res.status(statusCode).json({ error: message });
}

export interface ClassifiedError {
  type: "ai_quota" | "ai_auth" | "internal";
  userMessage: string;
  errorMessage: string;
  errorCode: string | number | undefined;
  stack: string | undefined;
}

export function classifyPipelineError(err: unknown): ClassifiedError {
  const errorMessage = err instanceof Error ? err.message : String(err);
  const errorCode = readCode(err);
  const stack = err instanceof Error ? err.stack : undefined;

  if (errorCode === "insufficient_quota" || errorCode === 429 ||
    errorMessage.includes("exceeded your current quota") ||
    errorMessage.includes("rate limit")) {
    return {
      type: "ai_quota",
      userMessage: "Sorry, I can't answer right now: the AI service quota has been exceeded. Please let an admin know.",
      errorMessage, errorCode, stack,
    };
  }

  if (errorCode === 401 || errorMessage.includes("Incorrect API key") ||
    errorMessage.includes("invalid_api_key")) {
    return {
      type: "ai_auth",
      userMessage: "Sorry, I can't answer right now: the AI service is misconfigured. Please let an admin know.",
      errorMessage, errorCode, stack,
    };
  }

  return {
    type: "internal",
    userMessage: "Sorry, I encountered an error while processing your message.",
    errorMessage, errorCode, stack,
  };
}
