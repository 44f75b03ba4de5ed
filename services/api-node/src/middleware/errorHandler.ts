import { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import type { ApiErrorShape } from "@rosca/shared";
import { HttpError } from "../utils/errors.js";

export function notFoundHandler(_request: Request, response: Response): void {
  const body: ApiErrorShape = {
    error: {
      code: "NOT_FOUND",
      message: "Route not found.",
    },
  };
  response.status(404).json(body);
}

function toErrorResponse(error: unknown): { status: number; body: ApiErrorShape } {
  if (error instanceof HttpError) {
    return {
      status: error.status,
      body: { error: { code: error.code, message: error.message, details: error.details } },
    };
  }
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: { code: "VALIDATION_ERROR", message: "Request validation failed.", details: error.issues },
      },
    };
  }
  return {
    status: 500,
    body: {
      error: {
        code: "INTERNAL_SERVER_ERROR",
        message: error instanceof Error ? error.message : "Unexpected error.",
      },
    },
  };
}

export function errorHandler(
  error: unknown,
  _request: Request,
  response: Response,
  _next: NextFunction
): void {
  const { status, body } = toErrorResponse(error);
  response.status(status).json(body);
}
