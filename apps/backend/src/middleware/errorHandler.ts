import type { ErrorResponse } from "@docsum/shared";
import type { ErrorRequestHandler, Request, Response } from "express";
import { ZodError } from "zod";
import { isLLMClientError, type KnownLLMError } from "../llm/errors.js";
import type { Logger } from "../logger.js";
import { requestIdOf } from "./requestId.js";

interface MappedError {
  status: number;
  body: Omit<ErrorResponse, "requestId">;
}

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ error: "Not Found", requestId: requestIdOf(res) } satisfies ErrorResponse);
}

function mapLLMError(error: KnownLLMError): MappedError {
  switch (error.kind) {
    case "configuration":
      return { status: 400, body: { error: error.message, code: error.kind } };
    case "network":
      return { status: 504, body: { error: error.message, code: error.kind } };
    case "http":
      return {
        status: 502,
        body: { error: error.message, code: error.kind, upstreamStatus: error.status, details: error.body }
      };
    case "parse":
      return { status: 502, body: { error: error.message, code: error.kind } };
    case "unexpected_response_shape":
      return { status: 502, body: { error: error.message, code: error.kind, details: error.body } };
  }
}

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

export function mapError(error: unknown): MappedError {
  if (error instanceof ZodError) {
    const message = error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
    return { status: 400, body: { error: message, code: "validation" } };
  }
  if (isLLMClientError(error)) {
    return mapLLMError(error);
  }

  const message = error instanceof Error ? error.message : "Unexpected server error";
  // body-parser and friends tag their own 4xx errors with `status`
  return { status: clientErrorStatus(error) ?? 500, body: { error: message } };
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const mapped = mapError(err);
    const requestId = requestIdOf(res);
    const context = { err, requestId, path: req.path, status: mapped.status };
    if (mapped.status >= 500) {
      logger.error(context, "Request failed");
    } else {
      logger.warn(context, "Request rejected");
    }
    res.status(mapped.status).json({ ...mapped.body, requestId } satisfies ErrorResponse);
  };
}
