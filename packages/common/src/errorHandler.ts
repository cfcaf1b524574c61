import { MissingFieldError, ValidationError } from "./errors.js";

/**
 * Shared Fastify error handler that bypasses route-level Zod response
 * serializers by sending a pre-stringified JSON payload.  Without this,
 * an error whose shape doesn't match the route's response schema causes a
 * cascading "Failed to serialize an error" from fastify-type-provider-zod.
 *
 * Interfaces are duck-typed so @tokensmith/common doesn't need a Fastify dependency.
 */

interface SchemaValidationIssue {
  instancePath: string;
  message?: string;
}

export interface HandlerError {
  statusCode?: number;
  message: string;
  name?: string;
  code?: string;
  validation?: SchemaValidationIssue[];
}

export interface HandlerRequest {
  url: string;
  method: string;
  body?: unknown;
  log: {
    warn: (obj: Record<string, unknown>, msg: string) => void;
    error: (obj: Record<string, unknown>, msg: string) => void;
  };
}

export interface HandlerReply {
  status: (code: number) => HandlerReply;
  header: (key: string, value: string) => HandlerReply;
  send: (payload: string) => void;
}

function errorLabel(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return "Bad Request";
    case 404:
      return "Not Found";
    case 405:
      return "Method Not Allowed";
    case 413:
      return "Payload Too Large";
    case 415:
      return "Unsupported Media Type";
    case 422:
      return "Unprocessable Entity";
    default:
      return statusCode >= 500 ? "Internal Server Error" : "Error";
  }
}

function hasField(body: unknown, field: string): boolean {
  return typeof body === "object" && body !== null && field in body;
}

/**
 * Turns a schema validation failure into the matching typed error.
 * `instancePath` is "/text" for a body field and "" or "/" for the body itself.
 */
export function toValidationError(
  issues: SchemaValidationIssue[],
  body: unknown,
): ValidationError {
  const first = issues[0];
  const field = (first?.instancePath ?? "").replace(/^\//, "").split("/")[0];

  if (!field) {
    return body === undefined || body === null
      ? new MissingFieldError("body")
      : new ValidationError("Request body must be a JSON object");
  }

  if (!hasField(body, field)) {
    return new MissingFieldError(field);
  }

  return new ValidationError(`${field}: ${first?.message ?? "is invalid"}`);
}

export function commonErrorHandler(
  error: HandlerError,
  request: HandlerRequest,
  reply: HandlerReply,
): void {
  let statusCode = error.statusCode ?? 500;
  let message = error.message;

  if (error.validation) {
    const translated = toValidationError(error.validation, request.body);
    statusCode = translated.statusCode;
    message = translated.message;
  }

  if (statusCode >= 500) {
    request.log.error(
      { err: error, url: request.url, method: request.method },
      "Request error",
    );
  } else {
    request.log.warn(
      { url: request.url, method: request.method, statusCode, message },
      "Request rejected",
    );
  }

  // Pre-stringify to bypass the route's Zod response serializer
  reply
    .status(statusCode)
    .header("content-type", "application/json; charset=utf-8")
    .send(
      JSON.stringify({
        statusCode,
        error: errorLabel(statusCode),
        message,
      }),
    );
}
