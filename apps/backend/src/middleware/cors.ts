import cors from "cors";
import type { RequestHandler } from "express";

const LOCALHOST_ORIGIN = /^https?:\/\/localhost(:\d+)?$/;

export class OriginNotAllowedError extends Error {
  readonly status = 403;

  constructor(readonly origin: string) {
    super("Origin not allowed");
    this.name = "OriginNotAllowedError";
  }
}

export function localhostCors(): RequestHandler {
  return cors({
    origin(origin, callback) {
      if (!origin || LOCALHOST_ORIGIN.test(origin)) {
        callback(null, true);
        return;
      }
      callback(new OriginNotAllowedError(origin));
    }
  });
}
