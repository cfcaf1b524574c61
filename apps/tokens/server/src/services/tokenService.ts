import { createHash } from "crypto";
import { EntropySourceError, ValidationError } from "@tokensmith/common";
import type {
  GenerateResult,
  TokenEncoding,
  TokenRequest,
  TokenResult,
} from "@tokensmith/shared";
import type { FastifyBaseLogger } from "fastify";
import type { RandomSource } from "./randomSource.js";

export interface TokenServiceOptions {
  /** Entropy drawn per token */
  tokenBytes: number;
  encoding: TokenEncoding;
  /** Largest `count` a request may ask for */
  maxTokens: number;
}

// Unicode White_Space, which leaves out U+FEFF and keeps the U+001C-U+001F separators
const WHITESPACE_RUN =
  /[\t-\r\x1c-\x20\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

export const DEFAULT_TOKEN_SERVICE_OPTIONS: TokenServiceOptions = {
  tokenBytes: 16,
  encoding: "hex",
  maxTokens: 1000,
};

/**
 * Checksums text and hands out opaque random tokens, one per word.
 * Tokens never depend on the words themselves, only on how many there are.
 */
export class TokenService {
  private randomSource: RandomSource;
  private options: TokenServiceOptions;
  private logger?: Pick<FastifyBaseLogger, "debug">;

  constructor(
    randomSource: RandomSource,
    options: Partial<TokenServiceOptions> = {},
    logger?: Pick<FastifyBaseLogger, "debug">,
  ) {
    this.randomSource = randomSource;
    this.options = { ...DEFAULT_TOKEN_SERVICE_OPTIONS, ...options };
    this.logger = logger;
  }

  /** Lowercase hex SHA-256 of the UTF-8 bytes of `text`. */
  computeChecksum(text: string): string {
    return createHash("sha256").update(text, "utf8").digest("hex");
  }

  generateToken(): string {
    const size = this.options.tokenBytes;

    let bytes: Uint8Array;
    try {
      bytes = this.randomSource.randomBytes(size);
    } catch (error) {
      throw new EntropySourceError("Random source is unavailable", error);
    }

    if (bytes.length !== size) {
      throw new EntropySourceError(
        `Random source returned ${bytes.length} of ${size} bytes`,
      );
    }

    return Buffer.from(bytes).toString(this.options.encoding);
  }

  countWords(text: string): number {
    return text.split(WHITESPACE_RUN).filter((word) => word.length > 0)
      .length;
  }

  tokenize(text: string): string[] {
    return this.drawTokens(this.countWords(text));
  }

  generateTokens(count: number): string[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new ValidationError("count must be a non-negative integer");
    }
    if (count > this.options.maxTokens) {
      throw new ValidationError(
        `count must not exceed ${this.options.maxTokens}`,
      );
    }
    return this.drawTokens(count);
  }

  handleTokensRequest(request: TokenRequest): TokenResult {
    const checksum = this.computeChecksum(request.text);
    const tokens =
      request.count === undefined
        ? this.tokenize(request.text)
        : this.generateTokens(request.count);

    this.logger?.debug(
      { textLength: request.text.length, tokenCount: tokens.length },
      "Tokenized text",
    );

    return { checksum, tokens };
  }

  handleGenerateRequest(): GenerateResult {
    return { token: this.generateToken() };
  }

  private drawTokens(count: number): string[] {
    return Array.from({ length: count }, () => this.generateToken());
  }
}
