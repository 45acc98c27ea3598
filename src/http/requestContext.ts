import crypto from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { logLine } from "../log";

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      receivedAt?: number;
    }
  }
}

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const existing = req.header("x-request-id");
  const requestId = existing && existing.trim() ? existing.trim() : crypto.randomUUID();
  req.requestId = requestId;
  req.receivedAt = Date.now();
  res.setHeader("x-request-id", requestId);
  res.on("close", () => {
    logLine(`[${requestId}]`, "request_closed", {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      finished: res.writableFinished,
      ms: Date.now() - (req.receivedAt ?? Date.now()),
    });
  });
  next();
}

export function getRequestId(req: Request): string {
  return req.requestId ?? "unknown";
}
