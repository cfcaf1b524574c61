import path from "path";
import {
  MAX_TOKENS_PER_REQUEST,
  TokenEncodingSchema,
  type TokenEncoding,
} from "@tokensmith/shared";

export const MIN_TOKEN_BYTES = 16;
export const MAX_TOKEN_BYTES = 64;
const DEFAULT_PORT = 8000;
const DEFAULT_MAX_TOKENS = 1000;

export interface ServerConfig {
  isProd: boolean;
  host: string;
  port: number;
  logLevel: string;
  /** Pretty console output through pino-pretty; off in production and under test */
  prettyLogs: boolean;
  tokenBytes: number;
  tokenEncoding: TokenEncoding;
  maxTokens: number;
  /** Allowed CORS origins; empty disables CORS */
  corsOrigins: string[];
  apiDocs: boolean;
  publicDir: string;
}

export function createServerConfig(
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const isProd = env.NODE_ENV === "production";

  return {
    isProd,
    host: env.HOST || (isProd ? "0.0.0.0" : "localhost"),
    port: sanitizePort(env.PORT),
    logLevel: env.LOG_LEVEL || "info",
    prettyLogs: !isProd && env.NODE_ENV !== "test",
    tokenBytes: sanitizeTokenBytes(env.TOKEN_BYTES),
    tokenEncoding: sanitizeEncoding(env.TOKEN_ENCODING),
    maxTokens: sanitizeMaxTokens(env.MAX_TOKENS),
    corsOrigins: (env.CORS_ORIGIN || "")
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    apiDocs: env.API_DOCS !== "false",
    publicDir: env.PUBLIC_DIR || path.resolve(__dirname, "..", "public"),
  };
}

function sanitizePort(value: string | undefined): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0 || n > 65535) return DEFAULT_PORT;
  return n;
}

function sanitizeTokenBytes(value: string | undefined): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < MIN_TOKEN_BYTES) return MIN_TOKEN_BYTES;
  return Math.min(n, MAX_TOKEN_BYTES);
}

function sanitizeEncoding(value: string | undefined): TokenEncoding {
  const parsed = TokenEncodingSchema.safeParse(value);
  return parsed.success ? parsed.data : "hex";
}

function sanitizeMaxTokens(value: string | undefined): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) return DEFAULT_MAX_TOKENS;
  return Math.min(n, MAX_TOKENS_PER_REQUEST);
}
