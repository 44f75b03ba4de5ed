import { NextFunction, Request, Response } from "express";

export const CALLER_HEADER = "x-caller-address";

const ADDRESS_PATTERN = /^[A-Za-z0-9_.:-]{3,128}$/;

/**
 * The signing gateway in front of this service verifies the transaction
 * signature and forwards the authenticated address in `X-Caller-Address`.
 */
export function requireCaller(request: Request, response: Response, next: NextFunction): void {
  const header = request.headers[CALLER_HEADER];
  const caller = typeof header === "string" ? header.trim() : "";
  if (!ADDRESS_PATTERN.test(caller)) {
    response.status(401).json({
      error: {
        code: "UNAUTHENTICATED",
        message: "Missing or malformed X-Caller-Address header.",
      },
    });
    return;
  }
  request.callerAddress = caller;
  next();
}

export function callerOf(request: Request): string {
  if (!request.callerAddress) {
    throw new Error("requireCaller must run before this handler.");
  }
  return request.callerAddress;
}
