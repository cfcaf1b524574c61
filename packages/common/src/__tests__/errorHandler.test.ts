import { describe, expect, jest, test } from "@jest/globals";
import {
  commonErrorHandler,
  toValidationError,
  type HandlerReply,
  type HandlerRequest,
} from "../errorHandler.js";
import {
  EntropySourceError,
  MissingFieldError,
  ValidationError,
} from "../errors.js";

function createReply() {
  const sent: {
    status?: number;
    headers: Record<string, string>;
    payload?: string;
  } = { headers: {} };
  const reply: HandlerReply = {
    status: (code) => {
      sent.status = code;
      return reply;
    },
    header: (key, value) => {
      sent.headers[key] = value;
      return reply;
    },
    send: (payload) => {
      sent.payload = payload;
    },
  };
  return { reply, sent };
}

function createRequest(body?: unknown) {
  const warn = jest.fn<HandlerRequest["log"]["warn"]>();
  const error = jest.fn<HandlerRequest["log"]["error"]>();
  const request: HandlerRequest = {
    url: "/tokens",
    method: "POST",
    body,
    log: { warn, error },
  };
  return { request, warn, error };
}

describe("toValidationError", () => {
  test("reports a missing body field", () => {
    const result = toValidationError(
      [{ instancePath: "/text", message: "Invalid input" }],
      {},
    );

    expect(result).toBeInstanceOf(MissingFieldError);
    expect(result.message).toBe("Missing required field: text");
    expect(result.statusCode).toBe(422);
  });

  test("reports a field of the wrong type", () => {
    const result = toValidationError(
      [{ instancePath: "/text", message: "expected string" }],
      { text: 1 },
    );

    expect(result).not.toBeInstanceOf(MissingFieldError);
    expect(result).toBeInstanceOf(ValidationError);
    expect(result.message).toBe("text: expected string");
  });

  test("reports a missing body", () => {
    const result = toValidationError([{ instancePath: "/" }], undefined);

    expect(result).toBeInstanceOf(MissingFieldError);
    expect(result.message).toBe("Missing required field: body");
  });

  test("reports a body that is not an object", () => {
    const result = toValidationError([{ instancePath: "" }], "text");

    expect(result).not.toBeInstanceOf(MissingFieldError);
    expect(result.message).toBe("Request body must be a JSON object");
  });
});

describe("commonErrorHandler", () => {
  test("sends typed errors with their status code", () => {
    const { reply, sent } = createReply();
    const { request, error } = createRequest();

    commonErrorHandler(
      new EntropySourceError("Random source is unavailable"),
      request,
      reply,
    );

    expect(sent.status).toBe(500);
    expect(sent.headers["content-type"]).toBe(
      "application/json; charset=utf-8",
    );
    expect(JSON.parse(sent.payload ?? "")).toEqual({
      statusCode: 500,
      error: "Internal Server Error",
      message: "Random source is unavailable",
    });
    expect(error).toHaveBeenCalledTimes(1);
  });

  test("maps schema validation failures to 422", () => {
    const { reply, sent } = createReply();
    const { request, warn, error } = createRequest({});

    commonErrorHandler(
      {
        statusCode: 400,
        message: "body/text Invalid input",
        validation: [{ instancePath: "/text", message: "Invalid input" }],
      },
      request,
      reply,
    );

    expect(sent.status).toBe(422);
    expect(JSON.parse(sent.payload ?? "")).toEqual({
      statusCode: 422,
      error: "Unprocessable Entity",
      message: "Missing required field: text",
    });
    expect(warn).toHaveBeenCalledWith(
      {
        url: "/tokens",
        method: "POST",
        statusCode: 422,
        message: "Missing required field: text",
      },
      "Request rejected",
    );
    expect(error).not.toHaveBeenCalled();
  });

  test("keeps client error codes that are not validation failures", () => {
    const { reply, sent } = createReply();
    const { request } = createRequest();

    commonErrorHandler(
      { statusCode: 400, message: "Body is not valid JSON" },
      request,
      reply,
    );

    expect(sent.status).toBe(400);
    expect(JSON.parse(sent.payload ?? "")).toEqual({
      statusCode: 400,
      error: "Bad Request",
      message: "Body is not valid JSON",
    });
  });

  test("defaults to 500 for errors without a status code", () => {
    const { reply, sent } = createReply();
    const { request } = createRequest();

    commonErrorHandler(new Error("unexpected"), request, reply);

    expect(sent.status).toBe(500);
  });
});

describe("errors", () => {
  test("carry their class name and status code", () => {
    const missing = new MissingFieldError("text");
    expect(missing.name).toBe("MissingFieldError");
    expect(missing.field).toBe("text");
    expect(missing.statusCode).toBe(422);

    const cause = new Error("EAGAIN");
    const entropy = new EntropySourceError("no bytes", cause);
    expect(entropy.name).toBe("EntropySourceError");
    expect(entropy.statusCode).toBe(500);
    expect(entropy.cause).toBe(cause);
  });
});
