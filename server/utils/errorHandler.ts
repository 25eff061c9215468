import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
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

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class AuthenticationError extends Error implements AppError {
  statusCode = 401;
  isOperational = true;
  constructor(message = "Authentication required") {
    super(message);
    this.name = "AuthenticationError";
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  status?: number;
  constructor(service: string, message: string, status?: number) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
    this.status = status;
  }
}

export const CLASSIFICATION_FAILURE_MESSAGE =
  "I'm having trouble understanding your request right now. Please try again.";

/**
 * The intent classifier was unreachable or returned something we could not parse.
 * Surfaced to the caller as a generic 500; the detail stays in the logs.
 */
export class ClassificationError extends Error implements AppError {
  statusCode = 500;
  isOperational = true;
  detail: string;
  constructor(detail: string, options?: { cause?: unknown }) {
    super(CLASSIFICATION_FAILURE_MESSAGE, options);
    this.name = "ClassificationError";
    this.detail = detail;
  }
}

function hasStatusCode(error: unknown): error is AppError & { statusCode: number } {
  return (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  );
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
  if (hasStatusCode(error)) {
    return error.statusCode;
  }
  return 500;
}

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error instanceof ClassificationError ? error.detail : error);
  }

  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}
